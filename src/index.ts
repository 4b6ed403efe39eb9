/**
 * Tracker Merge - Programmatic API
 *
 * Export all classes and types for programmatic usage
 */

export { GitHubProjectClient, parseProjectUrl } from './lib/github-client';
export { FieldMapper, buildRules, parseRule, DEFAULT_MAPPING } from './lib/field-mapper';
export { SyncEngine } from './lib/sync-engine';
export { ActionReviewer } from './lib/action-reviewer';
export { merge } from './lib/workspace-merger';
export { reconcile, apply } from './lib/reconciler';
export { encode, spliceBlock, extractBlock } from './lib/relation-encoder';
export { match, matchExact, matchClosest, matchScale } from './lib/option-matcher';
export * from './lib/errors';
export * from './lib/sources';

export * from './lib/types';
