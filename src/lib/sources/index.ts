/**
 * Source module exports
 */

export * from './types';
export { normalize, canonicalField, isRelationField } from './normalizer';
export type { NormalizeOptions, NormalizeResult } from './normalizer';
export { SourceRegistry } from './registry';
export {
  ZenHubClient,
  ZenHubSource,
  createZenHubTransport,
  selectWorkspaces,
  ZENHUB_ENDPOINT,
} from './zenhub-source';
export type { GraphQLTransport, ZenHubWorkspace, ZenHubPipeline } from './zenhub-source';
