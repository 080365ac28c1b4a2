import type { SuiteRecord } from '@ballotbench/core';
import { JsonFormatter } from './json.js';
import { MarkdownFormatter } from './markdown.js';
import { PlainFormatter } from './plain.js';

export interface OutputFormatter {
  renderComplete(suite: SuiteRecord): void;
  renderError(error: string): void;
}

export type ReportFormat = 'plain' | 'md' | 'json';

export function createFormatter(format: ReportFormat): OutputFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'md':
      return new MarkdownFormatter();
    case 'plain':
      return new PlainFormatter();
  }
}
