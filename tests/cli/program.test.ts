import { Command } from 'commander';
import { createProgram } from '../../src/cli/program';

jest.mock('../../src/graph', () => ({ GraphBuilder: jest.fn() }));

function subcommand(name: string): Command {
  const command = createProgram().commands.find(c => c.name() === name);
  if (!command) {
    throw new Error(`${name} command is not registered`);
  }
  return command;
}

describe('modscope CLI', () => {
  describe('analyze', () => {
    it('should keep only internal edges by default', () => {
      const analyze = subcommand('analyze');

      analyze.parseOptions([]);

      expect(analyze.opts()).toMatchObject({ internalOnly: true, format: 'json', graph: 'both' });
    });

    it('should accept --internal-only', () => {
      const analyze = subcommand('analyze');

      const { operands, unknown } = analyze.parseOptions(['lib', '--internal-only']);

      expect(operands).toEqual(['lib']);
      expect(unknown).toEqual([]);
      expect(analyze.opts().internalOnly).toBe(true);
    });

    it('should keep external edges with --no-internal-only', () => {
      const analyze = subcommand('analyze');

      const { unknown } = analyze.parseOptions(['lib', '--no-internal-only']);

      expect(unknown).toEqual([]);
      expect(analyze.opts().internalOnly).toBe(false);
    });
  });

  describe('render', () => {
    it('should default to DOT output', () => {
      const render = subcommand('render');

      render.parseOptions(['graphs.json']);

      expect(render.opts()).toMatchObject({ format: 'dot', graph: 'both' });
    });
  });
});
