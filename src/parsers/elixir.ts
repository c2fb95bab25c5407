import Parser from 'tree-sitter';
import Elixir from 'tree-sitter-elixir';
import { BaseParser, FileParseResult, ParseOptions } from './base';
import { ELIXIR_EXTENSIONS, ModuleExtractor } from './elixir/';

export class ElixirParser extends BaseParser {
  constructor() {
    const parser = new Parser();
    parser.setLanguage(Elixir);
    super(parser, 'elixir');
  }

  getSupportedExtensions(): string[] {
    return ELIXIR_EXTENSIONS;
  }

  parseFile(filePath: string, content: string, options: ParseOptions = {}): FileParseResult {
    const outcome = this.parse(content, filePath, options);
    if (!outcome.ok) {
      return outcome;
    }

    const records = new ModuleExtractor(options).extractModules(outcome.tree);

    this.logger.debug('Extracted modules', {
      file: filePath,
      modules: records.length,
      calls: records.reduce((sum, r) => sum + r.calls.length, 0),
    });

    return { ok: true, file: filePath, records };
  }
}
