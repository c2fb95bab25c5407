import winston from 'winston';
import { createComponentLogger } from '../utils/logger';
import {
  BuildOptions,
  BuildResult,
  FileDiscoveryService,
  FileParsingOrchestrator,
} from './builder/';
import { filterInternal } from './internal-filter';
import { ModuleGraphBuilder } from './module-graph';

const logger = createComponentLogger('graph-builder');

/**
 * GraphBuilder - orchestrates one analysis run
 *
 * - FileDiscoveryService: finds sources under the root
 * - FileParsingOrchestrator: reads, parses and extracts module records
 * - ModuleGraphBuilder: folds records into the graph artifacts
 *
 * Nothing is cached between runs.
 */
export class GraphBuilder {
  private logger: winston.Logger;
  private fileDiscoveryService: FileDiscoveryService;
  private fileParsingOrchestrator: FileParsingOrchestrator;
  private moduleGraphBuilder: ModuleGraphBuilder;

  constructor() {
    this.logger = logger;
    this.fileDiscoveryService = new FileDiscoveryService();
    this.fileParsingOrchestrator = new FileParsingOrchestrator(logger);
    this.moduleGraphBuilder = new ModuleGraphBuilder();
  }

  async analyzeRepository(rootPath: string, options: BuildOptions = {}): Promise<BuildResult> {
    const startTime = Date.now();

    this.logger.info('Starting analysis', {
      path: rootPath,
      includeTestFiles: options.includeTestFiles ?? false,
      internalOnly: options.internalOnly ?? false,
    });

    const files = await this.fileDiscoveryService.discoverFiles(rootPath, options);
    this.logger.info(`Discovered ${files.length} files`);

    const { parsed, errors } = await this.fileParsingOrchestrator.parseFiles(files, options);
    const records = parsed.flatMap(file => file.records);

    const graphs = this.moduleGraphBuilder.buildGraphs(records);
    const result = options.internalOnly ? filterInternal(graphs) : graphs;

    const durationMs = Date.now() - startTime;
    this.logger.info('Analysis completed', {
      filesParsed: parsed.length,
      filesSkipped: errors.length,
      modules: records.length,
      durationMs,
    });

    return {
      graphs: result,
      filesDiscovered: files.length,
      filesParsed: parsed.length,
      modulesExtracted: records.length,
      errors,
      durationMs,
    };
  }
}
