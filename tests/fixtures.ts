/**
 * Shared test data
 */

import { createIssueCatalog } from '../src/lib/catalog/index.js';
import type { Finding, ReportData } from '../src/lib/findings/index.js';

export const BASE_URL = 'https://repo/blob/main';

export const catalog = createIssueCatalog({
  NullAway: { severity: 'ERROR', url: 'https://docs.example/NullAway' },
  ReferenceEquality: { severity: 'WARNING', tags: '[correctness]' },
  UnusedVariable: { severity: 'WARNING', url: 'https://docs.example/UnusedVariable' },
});

export function finding(overrides: Partial<Finding> = {}): Finding {
  return {
    path: 'Foo.java',
    line: 10,
    column: 5,
    severity: 'ERROR',
    type: 'NullAway',
    message: 'x may be null',
    extra: null,
    ...overrides,
  };
}

export const nullAwayOnly: ReportData = new Map([['NullAway', [finding()]]]);

export const mixedData: ReportData = new Map([
  ['ReferenceEquality', [
    finding({
      type: 'ReferenceEquality',
      severity: 'WARNING',
      path: 'src/Bar.java',
      line: 20,
      column: 9,
      message: 'Comparison using ==',
      extra: "Did you mean 'a.equals(b)'?",
    }),
    finding({
      type: 'ReferenceEquality',
      severity: 'WARNING',
      path: 'src/Baz.java',
      line: 3,
      column: 1,
      message: 'Comparison using <b>',
      extra: 'Prefer equals() for value types',
    }),
  ]],
  ['NullAway', [finding()]],
  ['Unlisted', [finding({ type: 'Unlisted', severity: 'INFO', path: 'Qux.java', line: 1, column: 1, message: 'odd' })]],
]);
