export { ElixirParser } from './elixir';
export * from './base';
export * from './syntax-tree';
export * from './elixir/';

// Register parsers in the factory
import { ParserFactory } from './base';
import { ElixirParser } from './elixir';
import { ELIXIR_EXTENSIONS } from './elixir/';

ParserFactory.registerParser('elixir', ELIXIR_EXTENSIONS, () => new ElixirParser());
