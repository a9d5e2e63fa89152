/**
 * Formatting rules shared by every report format.
 */

import type { IssueCatalog } from '../catalog/index.js';
import type { Finding } from '../findings/index.js';

export interface RenderContext {
  catalog: IssueCatalog;
  /** Prefix for source links, used verbatim */
  baseUrl: string;
  /** Full report title, timestamp included */
  title: string;
}

const SUGGESTION = /^Did you mean '(.*)'\?$/s;

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

/** `Foo.java:[10,5]` */
export function formatLocation(finding: Finding): string {
  return `${finding.path}:[${finding.line},${finding.column}]`;
}

export function sourceUrl(baseUrl: string, finding: Finding): string {
  return `${baseUrl}/${finding.path}#L${finding.line}`;
}

/**
 * The replacement text of a `Did you mean '<replacement>'?` hint, or
 * undefined when the extra text has any other shape.
 */
export function parseSuggestion(extra: string): string | undefined {
  const match = SUGGESTION.exec(extra);
  return match ? match[1] : undefined;
}

/** `2025-March-05, 14:03:22 GMT+01:00` in local time; plain `GMT` at zero offset */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const offset = -date.getTimezoneOffset();
  const abs = Math.abs(offset);
  const zone = offset === 0
    ? 'GMT'
    : `GMT${offset > 0 ? '+' : '-'}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;

  return `${date.getFullYear()}-${MONTHS[date.getMonth()]}-${pad(date.getDate())}, ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())} ${zone}`;
}
