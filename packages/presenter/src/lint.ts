/**
 * Slide linter - checks slide documents against the authoring rules the
 * renderer relies on: a title heading, and content lines of exactly the
 * target width so box drawings line up.
 */

import { displayWidth } from '@termslides/shared';
import type { SlideDocument } from './deck.js';
import { DEFAULT_NOTES_HEADING, scanSlide } from './parser.js';

export type LintSeverity = 'error' | 'warning';

export interface LintIssue {
  source: string;
  /** 1-based line in the document; 0 when the issue is about the whole file */
  line: number;
  severity: LintSeverity;
  message: string;
}

export interface LintOptions {
  lineWidth: number;
  notesHeading?: string;
}

export function lintDocument(doc: SlideDocument, options: LintOptions): LintIssue[] {
  const issues: LintIssue[] = [];
  const scan = scanSlide(doc.text, options.notesHeading ?? DEFAULT_NOTES_HEADING);

  if (scan.heading === undefined) {
    issues.push({ source: doc.name, line: 0, severity: 'error', message: 'missing title heading' });
  }

  if (scan.body === null) {
    issues.push({ source: doc.name, line: 0, severity: 'warning', message: 'no fenced content block (title-only slide)' });
    return issues;
  }

  scan.body.forEach((text, i) => {
    const width = displayWidth(text);
    if (width !== options.lineWidth) {
      issues.push({
        source: doc.name,
        line: scan.bodyStartLine + i,
        severity: 'error',
        message: `line is ${width} columns, expected ${options.lineWidth}`,
      });
    }
  });

  return issues;
}

export function lintDocuments(docs: readonly SlideDocument[], options: LintOptions): LintIssue[] {
  return docs.flatMap((doc) => lintDocument(doc, options));
}

/**
 * "01-intro.md:7: error: line is 70 columns, expected 72"
 */
export function formatIssue(issue: LintIssue): string {
  const location = issue.line > 0 ? `${issue.source}:${issue.line}` : issue.source;
  return `${location}: ${issue.severity}: ${issue.message}`;
}
