/**
 * Renders issue relations as a regenerated markdown block
 *
 * The block is located by its top-level heading and replaced as a whole; text
 * before and after it in the body is never touched.
 */

import { formatIssueKey, parseIssueRef, compareIssueKeys, shortRef } from './issue-key';
import { IssueKey, Relation } from './types';

export const DEPENDENCIES_HEADING = 'Dependencies';
export const LINKED_ISSUES_HEADING = 'Linked issues';

export interface TextSection {
  title: string;
  lines: string[];
}

export interface EncodedRelations {
  checklistBlock: string;
  prLinkDirectives: string[];
}

export interface EncodeOptions {
  /** Organization that owns the target project; cross-org "fixes" links are dropped */
  targetOrg: string;
  /** Extra sections rendered after the relation checklists */
  sections?: TextSection[];
}

function uniqueSorted(keys: IssueKey[]): IssueKey[] {
  return [...new Set(keys)].sort(compareIssueKeys);
}

export function renderBlock(heading: string, sections: TextSection[]): string {
  const filled = sections.filter((section) => section.lines.length > 0);
  if (filled.length === 0) {
    return '';
  }
  const parts = [`# ${heading}`];
  for (const section of filled) {
    parts.push(`## ${section.title}`, section.lines.join('\n'));
  }
  return parts.join('\n\n');
}

export function renderDirectiveBlock(directives: string[]): string {
  if (directives.length === 0) {
    return '';
  }
  return `# ${LINKED_ISSUES_HEADING}\n\n${directives.join('\n')}`;
}

export function encode(key: IssueKey, relations: Relation[], options: EncodeOptions): EncodedRelations {
  const base = parseIssueRef(key);
  if (!base) {
    throw new Error(`Invalid issue key: ${key}`);
  }

  const children = uniqueSorted(relations.filter((r) => r.kind === 'Epic' && r.from === key).map((r) => r.to));
  const blockers = uniqueSorted(relations.filter((r) => r.kind === 'Blocks' && r.to === key).map((r) => r.from));
  const fixes = uniqueSorted(relations.filter((r) => r.kind === 'LinkedPR' && r.from === key).map((r) => r.to));

  const checklist = (keys: IssueKey[]): string[] =>
    keys.flatMap((k) => {
      const ref = parseIssueRef(k);
      return ref ? [`- [ ] ${shortRef(ref, base)}`] : [];
    });

  const sections: TextSection[] = [
    { title: 'Epic', lines: checklist(children) },
    { title: 'Blocked by', lines: checklist(blockers) },
    ...(options.sections ?? []),
  ];

  const prLinkDirectives = fixes.flatMap((k) => {
    const ref = parseIssueRef(k);
    if (!ref || ref.owner !== options.targetOrg) {
      return [];
    }
    return [`fixes ${formatIssueKey(ref)}`];
  });

  return {
    checklistBlock: renderBlock(DEPENDENCIES_HEADING, sections),
    prLinkDirectives,
  };
}

function locate(text: string, heading: string): { start: number; end: number } | null {
  const lines = text.split('\n');
  let offset = 0;
  let start = -1;
  for (const line of lines) {
    if (start < 0) {
      if (line.trimEnd() === `# ${heading}`) {
        start = offset;
      }
    } else if (line.startsWith('# ')) {
      return { start, end: offset };
    }
    offset += line.length + 1;
  }
  return start < 0 ? null : { start, end: text.length };
}

/**
 * Current block under `heading`, line endings normalized, trailing whitespace dropped.
 * Empty string when the body has no such block.
 */
export function extractBlock(body: string, heading: string): string {
  const text = body.replace(/\r\n/g, '\n');
  const region = locate(text, heading);
  if (!region) {
    return '';
  }
  return text.slice(region.start, region.end).trimEnd();
}

/**
 * Replace (or append, or remove when `block` is empty) the block under `heading`.
 * Returns `body` unchanged when the block already matches.
 */
export function spliceBlock(body: string, heading: string, block: string): string {
  const wanted = block.replace(/\r\n/g, '\n').trimEnd();
  if (extractBlock(body, heading) === wanted) {
    return body;
  }

  // only the inserted block takes the body's line ending; the rest is kept as read
  const eol = body.includes('\r\n') ? '\r\n' : '\n';
  const inserted = wanted.replace(/\n/g, eol);
  const region = locate(body, heading);

  if (region) {
    const before = body.slice(0, region.start);
    const after = body.slice(region.end);
    if (inserted) {
      return before + inserted + (after ? eol + eol + after : eol);
    }
    const head = before.trimEnd();
    return head + (after ? (head ? eol + eol : '') + after : head ? eol : '');
  }

  return body.trim() ? `${body.trimEnd()}${eol}${eol}${inserted}${eol}` : `${inserted}${eol}`;
}
