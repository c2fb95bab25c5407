import process from 'process';
import path from 'path';
import fs from 'fs/promises';

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { GraphBuilder, AnalysisResult } from '../graph';
import { AliasScoping } from '../parsers/elixir/';
import {
  GRAPH_SELECTIONS,
  GraphSelection,
  OUTPUT_FORMATS,
  OutputFormat,
  decodeGraphs,
  isGraphSelection,
  isOutputFormat,
  renderOutput,
} from '../renderers';
import { config, flushLogs, logger, setLogLevel } from '../utils';

interface RenderCommandOptions {
  format: string;
  graph: string;
  prune?: string;
  output: string;
  verbose?: boolean;
}

interface AnalyzeCommandOptions extends RenderCommandOptions {
  internalOnly: boolean;
  includeTests?: boolean;
  lexicalAliases?: boolean;
  maxConcurrency: string;
  ignoreFile?: string;
}

interface RenderSettings {
  format: OutputFormat;
  graph: GraphSelection;
  prune: string[];
  outputDir: string;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// Check for Unicode support and provide fallbacks
const getEmoji = (emoji: string, fallback: string): string => {
  const supportsUnicode =
    process.env.TERM !== 'dumb' &&
    (!process.env.CI || process.env.CI === 'false') &&
    process.platform !== 'win32';

  return supportsUnicode ? emoji : fallback;
};

function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function resolveRenderSettings(options: RenderCommandOptions): RenderSettings {
  if (!isOutputFormat(options.format)) {
    throw new UsageError(
      `Unknown format "${options.format}" (expected one of: ${OUTPUT_FORMATS.join(', ')})`
    );
  }
  if (!isGraphSelection(options.graph)) {
    throw new UsageError(
      `Unknown graph "${options.graph}" (expected one of: ${GRAPH_SELECTIONS.join(', ')})`
    );
  }
  return {
    format: options.format,
    graph: options.graph,
    prune: parseList(options.prune),
    outputDir: path.resolve(options.output),
  };
}

async function writeOutput(result: AnalysisResult, settings: RenderSettings): Promise<void> {
  const rendered = renderOutput(result, settings.format, settings.graph, {
    prune: settings.prune,
  });

  await fs.mkdir(settings.outputDir, { recursive: true });
  await fs.writeFile(path.join(settings.outputDir, rendered.fileName), rendered.content + '\n');

  console.log(chalk.green(`${getEmoji('✓', '[OK]')} Saved ${rendered.fileName}`));
  console.log(chalk.blue(`Output saved to: ${settings.outputDir}`));
}

export async function fail(error: unknown): Promise<never> {
  const message = error instanceof Error ? error.message : String(error);
  if (!(error instanceof UsageError)) {
    logger.error('Command failed', { error: message });
  }
  console.error(chalk.red(`${getEmoji('❌', '[ERROR]')} ${message}`));
  await flushLogs();
  process.exit(1);
}

/**
 * Build the `modscope` command tree. Parsing is left to the caller.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('modscope')
    .description('Build module and function call graphs from Elixir sources')
    .version('0.1.0');

  // Analyze command
  program
    .command('analyze')
    .description('Analyze a project directory (or a single file) and write its graphs')
    .argument('<path>', 'Project directory or source file to analyze')
    .option('-f, --format <format>', `Output format (${OUTPUT_FORMATS.join('|')})`, 'json')
    .option('-g, --graph <graph>', `Graph to write (${GRAPH_SELECTIONS.join('|')})`, 'both')
    .option('--prune <modules>', 'Comma-separated modules to leave out of DOT output')
    .option('--internal-only', 'Keep only edges between analyzed modules', true)
    .option('--no-internal-only', 'Keep edges to modules outside the analyzed sources')
    .option('--include-tests', 'Include *_test.exs files')
    .option('--lexical-aliases', 'Scope aliases declared inside a function to that function')
    .option(
      '--max-concurrency <number>',
      'Maximum concurrent file reads',
      String(config.analysis.maxConcurrency)
    )
    .option('--ignore-file <path>', 'Ignore file to use instead of .modscopeignore')
    .option('-o, --output <dir>', 'Output directory', config.analysis.outputDir)
    .option('--verbose', 'Enable verbose logging')
    .action(async (targetPath: string, options: AnalyzeCommandOptions) => {
      if (options.verbose) {
        setLogLevel('debug');
      }

      let settings: RenderSettings;
      let maxConcurrency: number;
      try {
        settings = resolveRenderSettings(options);
        maxConcurrency = parseInt(options.maxConcurrency, 10);
        if (isNaN(maxConcurrency) || maxConcurrency <= 0) {
          throw new UsageError(`--max-concurrency must be a positive number`);
        }
      } catch (error) {
        return fail(error);
      }

      const aliasScoping: AliasScoping = options.lexicalAliases ? 'lexical' : 'shared';
      const spinner = ora('Analyzing sources...').start();

      try {
        const result = await new GraphBuilder().analyzeRepository(path.resolve(targetPath), {
          includeTestFiles: options.includeTests === true,
          internalOnly: options.internalOnly,
          aliasScoping,
          maxConcurrency,
          ignoreFilePath: options.ignoreFile,
        });
        spinner.succeed(
          `Analyzed ${result.filesParsed} files, ${result.modulesExtracted} modules in ${(result.durationMs / 1000).toFixed(2)}s`
        );

        if (result.errors.length > 0) {
          console.log(
            chalk.yellow(`${getEmoji('⚠️', '[WARN]')}  ${result.errors.length} files skipped:`)
          );
          result.errors.slice(0, 10).forEach((error, index) => {
            console.log(chalk.gray(`  ${index + 1}. ${error.filePath}: ${error.message}`));
          });
          if (result.errors.length > 10) {
            console.log(chalk.gray(`  ... and ${result.errors.length - 10} more`));
          }
        }

        await writeOutput(result.graphs, settings);
        await flushLogs();
      } catch (error) {
        spinner.fail('Analysis failed');
        await fail(error);
      }
    });

  // Render command
  program
    .command('render')
    .description('Render a previously written graphs.json in another format or selection')
    .argument('<json>', 'Path to a graphs.json file')
    .option('-f, --format <format>', `Output format (${OUTPUT_FORMATS.join('|')})`, 'dot')
    .option('-g, --graph <graph>', `Graph to write (${GRAPH_SELECTIONS.join('|')})`, 'both')
    .option('--prune <modules>', 'Comma-separated modules to leave out of DOT output')
    .option('-o, --output <dir>', 'Output directory', config.analysis.outputDir)
    .option('--verbose', 'Enable verbose logging')
    .action(async (jsonPath: string, options: RenderCommandOptions) => {
      if (options.verbose) {
        setLogLevel('debug');
      }

      try {
        const settings = resolveRenderSettings(options);
        const content = await fs.readFile(path.resolve(jsonPath), 'utf-8');
        await writeOutput(decodeGraphs(content), settings);
        await flushLogs();
      } catch (error) {
        await fail(error);
      }
    });

  program.configureHelp({
    sortSubcommands: true,
  });

  program.on('command:*', () => {
    console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
    console.log(chalk.blue('See --help for a list of available commands.'));
    process.exit(1);
  });

  return program;
}
