export { ModuleGraphBuilder } from './module-graph';
export { GraphBuilder } from './builder';
export { filterInternal } from './internal-filter';
export * from './module-graph';
export * from './builder/';
