/**
 * GraphBuilder building blocks
 */

export * from './types';

export { FileDiscoveryService } from './file-discovery-service';
export { FileParsingOrchestrator, ParseFilesResult } from './file-parsing-orchestrator';
