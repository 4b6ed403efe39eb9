/**
 * Source adapter interface types for multi-workspace support
 */

import { CanonicalField } from '../types';

/**
 * One item as a source reports it: identity, native field values and
 * relation references (`owner/repo#N`, a GitHub URL or `{ owner, repo, number }`).
 */
export interface RawItem {
  owner: string;
  repo: string;
  number: number;
  title: string;
  isPullRequest: boolean;
  /** Stable id of the underlying GitHub content, used to detect identity conflicts */
  contentId?: string;
  updatedAt?: string | null;
  fields: Record<string, unknown>;
  relations: Record<string, unknown[]>;
}

/**
 * Common interface for all sources
 */
export interface SourceAdapter {
  /** Unique identifier, e.g. the workspace name */
  readonly sourceId: string;

  /** Fetch every item the source currently holds */
  fetchWorkspace(): Promise<RawItem[]>;

  /** Ordered labels of an ordinal field, or null when the source can't tell */
  listOrderedScaleLabels(field: CanonicalField): Promise<string[] | null>;
}
