import type { SuiteRecord } from '@ballotbench/core';
import type { OutputFormatter } from './formatter.js';

export class JsonFormatter implements OutputFormatter {
  renderComplete(suite: SuiteRecord): void {
    console.log(JSON.stringify(suite, null, 2));
  }

  renderError(error: string): void {
    console.error(JSON.stringify({ error }));
  }
}
