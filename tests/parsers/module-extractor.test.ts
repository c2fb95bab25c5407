import { ModuleExtractor } from '../../src/parsers/elixir/module-extractor';
import { formatModuleName } from '../../src/parsers/elixir/module-name';
import { CallSite, ModuleRecord, formatMfa } from '../../src/parsers/elixir/types';
import {
  alias,
  atom,
  binop,
  call,
  def,
  defInline,
  defmodule,
  dot,
  ident,
  integer,
  keywords,
  node,
  remote,
  source,
  tree,
  tuple,
  withField,
} from '../utils/syntax-factory';

function describeCalls(calls: CallSite[]): string[] {
  return calls.map(c => `${c.kind} ${formatMfa(c.from)} -> ${formatMfa(c.to)}`);
}

function describeRefs(record: ModuleRecord): string[] {
  return record.refs.map(r => `${r.kind} ${formatModuleName(r.target)}`);
}

describe('ModuleExtractor', () => {
  let extractor: ModuleExtractor;

  beforeEach(() => {
    extractor = new ModuleExtractor();
  });

  describe('extractModules', () => {
    it('should resolve a remote call through an alias', () => {
      const root = source(
        defmodule(alias('A.B'), [
          call('alias', [alias('A.C')]),
          defInline('f', [ident('x')], remote(alias('C'), 'g', [ident('x')])),
        ]),
        defmodule(alias('A.C'), [defInline('g', [ident('y')], ident('y'))])
      );

      const records = extractor.extractModules(tree(root, 'lib/a.ex'));

      expect(records).toHaveLength(2);
      expect(formatModuleName(records[0].name)).toBe('A.B');
      expect(records[0].file).toBe('lib/a.ex');
      expect(records[0].functions).toEqual([{ name: 'f', arity: 1 }]);
      expect(describeCalls(records[0].calls)).toEqual(['remote A.B.f/1 -> A.C.g/1']);
      expect(describeRefs(records[0])).toEqual(['alias A.C']);

      expect(formatModuleName(records[1].name)).toBe('A.C');
      expect(records[1].functions).toEqual([{ name: 'g', arity: 1 }]);
      expect(records[1].calls).toEqual([]);
    });

    it('should record local calls against the current module', () => {
      const root = source(
        defmodule(alias('M'), [
          defInline('a', null, call('b')),
          defInline('b', null, atom(':ok')),
        ])
      );

      const [record] = extractor.extractModules(tree(root));

      expect(record.functions).toEqual([
        { name: 'a', arity: 0 },
        { name: 'b', arity: 0 },
      ]);
      expect(describeCalls(record.calls)).toEqual(['local M.a/0 -> M.b/0']);
    });

    it('should resolve a call on a variable to unknown', () => {
      const root = source(
        defmodule(alias('M'), [defInline('a', [ident('mod')], remote(ident('mod'), 'run'))])
      );

      const [record] = extractor.extractModules(tree(root));

      expect(describeCalls(record.calls)).toEqual(['remote M.a/1 -> unknown.run/0']);
    });

    it('should produce one record per module definition, nested ones included', () => {
      const root = source(
        defmodule(alias('Outer'), [
          def('run', [], [call('helper')]),
          defmodule(alias('Inner'), [def('inner', [], [call('deep')])]),
          defmodule(dot(ident('__MODULE__'), alias('Nested')), []),
        ])
      );

      const records = extractor.extractModules(tree(root));

      expect(records.map(r => formatModuleName(r.name))).toEqual([
        'Outer',
        'Inner',
        'Outer.Nested',
      ]);
      expect(records[0].functions).toEqual([{ name: 'run', arity: 0 }]);
      expect(describeCalls(records[0].calls)).toEqual(['local Outer.run/0 -> Outer.helper/0']);
      expect(describeCalls(records[1].calls)).toEqual(['local Inner.inner/0 -> Inner.deep/0']);
    });

    it('should name a module defined from a variable unknown', () => {
      const root = source(defmodule(ident('name'), [def('f', [], [call('g')])]));

      const [record] = extractor.extractModules(tree(root));

      expect(formatModuleName(record.name)).toBe('unknown');
      expect(describeCalls(record.calls)).toEqual(['local unknown.f/0 -> unknown.g/0']);
    });

    it('should return nothing for a file without modules', () => {
      expect(extractor.extractModules(tree(source(call('IO.puts'))))).toEqual([]);
    });
  });

  describe('function definitions', () => {
    it('should deduplicate clauses and sort by name then arity', () => {
      const root = source(
        defmodule(alias('M'), [
          defInline('b', [integer(1)], atom(':one')),
          defInline('a', [ident('x')], ident('x')),
          defInline('b', [ident('n')], ident('n')),
          def('a', [ident('x'), ident('y')], [ident('y')], 'defp'),
        ])
      );

      const [record] = extractor.extractModules(tree(root));

      expect(record.functions).toEqual([
        { name: 'a', arity: 1 },
        { name: 'a', arity: 2 },
        { name: 'b', arity: 1 },
      ]);
    });

    it('should take the arity from a guarded head and skip the guard', () => {
      const head = binop('when', call('f', [ident('x')]), call('is_integer', [ident('x')]));
      const root = source(defmodule(alias('M'), [call('def', [head], [call('g', [ident('x')])])]));

      const [record] = extractor.extractModules(tree(root));

      expect(record.functions).toEqual([{ name: 'f', arity: 1 }]);
      expect(describeCalls(record.calls)).toEqual(['local M.f/1 -> M.g/1']);
    });

    it('should name operator definitions after the operator', () => {
      const head = binop('<~>', ident('left'), ident('right'));
      const root = source(
        defmodule(alias('M'), [
          call('def', [head, keywords({ do: call('merge', [ident('left'), ident('right')]) })]),
        ])
      );

      const [record] = extractor.extractModules(tree(root));

      expect(record.functions).toEqual([{ name: '<~>', arity: 2 }]);
      expect(describeCalls(record.calls)).toEqual(['local M.<~>/2 -> M.merge/2']);
    });

    it('should handle guarded and unary operator definitions', () => {
      const guarded = binop(
        'when',
        binop('+++', ident('left'), ident('right')),
        call('is_list', [ident('left')])
      );
      const unary = node('unary_operator', [withField(ident('value'), 'operand')], {
        operator: '~~~',
      });
      const root = source(
        defmodule(alias('M'), [
          call('def', [guarded], [remote(alias('Enum'), 'concat', [ident('left'), ident('right')])]),
          call('def', [unary, keywords({ do: call('invert', [ident('value')]) })]),
        ])
      );

      const [record] = extractor.extractModules(tree(root));

      expect(record.functions).toEqual([
        { name: '+++', arity: 2 },
        { name: '~~~', arity: 1 },
      ]);
      expect(describeCalls(record.calls)).toEqual([
        'remote M.+++/2 -> Enum.concat/2',
        'local M.~~~/1 -> M.invert/1',
      ]);
    });

    it('should record bodiless heads as signatures', () => {
      const root = source(defmodule(alias('M'), [def('f', [ident('x'), ident('y')])]));

      const [record] = extractor.extractModules(tree(root));

      expect(record.functions).toEqual([{ name: 'f', arity: 2 }]);
      expect(record.calls).toEqual([]);
    });

    it('should skip definitions whose name is computed', () => {
      const head = node('call', [
        { ...call('unquote', [ident('name')]), field: 'target' },
        node('arguments', [ident('x')]),
      ]);
      const root = source(defmodule(alias('M'), [call('def', [head], [call('g')])]));

      const [record] = extractor.extractModules(tree(root));

      expect(record.functions).toEqual([]);
      expect(record.calls).toEqual([]);
    });
  });

  describe('call sites', () => {
    it('should count an attached do block as an argument', () => {
      const root = source(
        defmodule(alias('M'), [def('run', [], [call('with_lock', [ident('key')], [call('work')])])])
      );

      const [record] = extractor.extractModules(tree(root));

      expect(describeCalls(record.calls)).toEqual([
        'local M.run/0 -> M.with_lock/2',
        'local M.run/0 -> M.work/0',
      ]);
    });

    it('should record an outer call before the calls inside its target and arguments', () => {
      const chained = remote(remote(alias('Repo'), 'all'), 'first', [call('opts')]);
      const root = source(defmodule(alias('M'), [def('run', [], [chained])]));

      const [record] = extractor.extractModules(tree(root));

      expect(describeCalls(record.calls)).toEqual([
        'remote M.run/0 -> unknown.first/1',
        'remote M.run/0 -> Repo.all/0',
        'local M.run/0 -> M.opts/0',
      ]);
    });

    it('should find calls nested in pipes and anonymous functions', () => {
      const mapper = node('anonymous_function', [
        node('stab_clause', [
          node('arguments', [ident('x')]),
          node('body', [call('transform', [ident('x')])]),
        ]),
      ]);
      const pipeline = binop(
        '|>',
        call('load'),
        remote(alias('Enum'), 'map', [mapper])
      );
      const root = source(defmodule(alias('M'), [def('run', [], [pipeline])]));

      const [record] = extractor.extractModules(tree(root));

      expect(describeCalls(record.calls)).toEqual([
        'local M.run/0 -> M.load/0',
        'remote M.run/0 -> Enum.map/1',
        'local M.run/0 -> M.transform/1',
      ]);
    });

    it('should keep every occurrence of a repeated call', () => {
      const root = source(
        defmodule(alias('M'), [def('run', [], [call('tick'), call('tick')])])
      );

      const [record] = extractor.extractModules(tree(root));

      expect(record.calls).toHaveLength(2);
    });

    it('should not treat bare identifiers or directives as calls', () => {
      const root = source(
        defmodule(alias('M'), [
          def('run', [ident('x')], [call('alias', [alias('Foo.Bar')]), ident('x')]),
        ])
      );

      const [record] = extractor.extractModules(tree(root));

      expect(record.calls).toEqual([]);
      expect(describeRefs(record)).toEqual(['alias Foo.Bar']);
    });

    it('should resolve Erlang module calls to atom names', () => {
      const root = source(
        defmodule(alias('M'), [def('run', [ident('l')], [remote(atom(':lists'), 'reverse', [ident('l')])])])
      );

      const [record] = extractor.extractModules(tree(root));

      expect(describeCalls(record.calls)).toEqual(['remote M.run/1 -> :lists.reverse/1']);
    });

    it('should ignore calls outside function bodies', () => {
      const root = source(
        defmodule(alias('M'), [
          node('unary_operator', [call('moduledoc', [node('string')])], { operator: '@' }),
          remote(alias('IO'), 'puts', [node('string')]),
        ])
      );

      const [record] = extractor.extractModules(tree(root));

      expect(record.calls).toEqual([]);
      expect(record.functions).toEqual([]);
    });
  });

  describe('directives', () => {
    it('should record alias, import and use targets in order', () => {
      const root = source(
        defmodule(alias('M'), [
          call('use', [alias('GenServer')]),
          call('import', [alias('Ecto.Query'), node('keywords')]),
          call('alias', [dot(alias('App'), tuple(alias('Repo'), alias('Accounts.User')))]),
        ])
      );

      const [record] = extractor.extractModules(tree(root));

      expect(describeRefs(record)).toEqual([
        'use GenServer',
        'import Ecto.Query',
        'alias unknown',
      ]);
    });

    it('should expand multi-target alias children for later calls', () => {
      const root = source(
        defmodule(alias('M'), [
          call('alias', [dot(alias('App'), tuple(alias('Repo'), alias('Accounts.User')))]),
          defInline('load', [ident('id')], remote(alias('User'), 'get', [ident('id')])),
        ])
      );

      const [record] = extractor.extractModules(tree(root));

      expect(describeRefs(record)).toEqual(['alias unknown']);
      expect(describeCalls(record.calls)).toEqual(['remote M.load/1 -> App.Accounts.User.get/1']);
    });

    it('should resolve __MODULE__ directives against the module being defined', () => {
      const root = source(
        defmodule(alias('App.Server'), [call('alias', [dot(ident('__MODULE__'), alias('State'))])])
      );

      const [record] = extractor.extractModules(tree(root));

      expect(describeRefs(record)).toEqual(['alias App.Server.State']);
    });

    it('should share aliases declared in one function body with later functions by default', () => {
      const root = aliasLeakSource();

      const [record] = extractor.extractModules(tree(root));

      expect(describeCalls(record.calls)).toEqual([
        'remote M.a/0 -> Foo.Bar.x/0',
        'remote M.b/0 -> Foo.Bar.y/0',
      ]);
    });

    it('should confine function-level aliases to their body with lexical scoping', () => {
      const lexical = new ModuleExtractor({ aliasScoping: 'lexical' });

      const [record] = lexical.extractModules(tree(aliasLeakSource()));

      expect(describeCalls(record.calls)).toEqual([
        'remote M.a/0 -> Foo.Bar.x/0',
        'remote M.b/0 -> Bar.y/0',
      ]);
      expect(describeRefs(record)).toEqual(['alias Foo.Bar']);
    });
  });
});

function aliasLeakSource() {
  return source(
    defmodule(alias('M'), [
      def('a', null, [call('alias', [alias('Foo.Bar')]), remote(alias('Bar'), 'x')]),
      def('b', null, [remote(alias('Bar'), 'y')]),
    ])
  );
}
