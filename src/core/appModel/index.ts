export * from './types';
export { parseRoutesTable, type RoutesTable } from './routesTable';
export { summarizeRubySource, type RubyClassSummary, type RubyMethodDef } from './rubySource';
export { SourceTreeApplicationModel, type SourceTreeModelOptions } from './sourceTreeModel';
export { ManifestApplicationModel, ManifestSchema, type Manifest } from './manifestModel';
