/**
 * Markdown Report
 *
 * A single pipe table, one row per finding. Tool-supplied text is
 * backslash-escaped; the table structure itself never is.
 */

import { describeIssue } from '../catalog/index.js';
import type { Finding, ReportData } from '../findings/index.js';
import { formatLocation, parseSuggestion, type RenderContext } from './format.js';

export const MARKDOWN_SPECIAL_CHARS = '\\*_|#`[]{}()<>+-.!';

export function escapeMarkdown(text: string): string {
  let escaped = '';
  for (const ch of text) {
    if (MARKDOWN_SPECIAL_CHARS.includes(ch)) escaped += '\\';
    escaped += ch;
  }
  return escaped;
}

export function renderMarkdown(data: ReportData, context: Pick<RenderContext, 'catalog'>): string {
  const lines = [
    '| Issue type | Severity | Location | Message |',
    '| ---------- | -------- | -------- | ------- |',
  ];

  for (const [issueType, findings] of data) {
    const info = describeIssue(context.catalog, issueType, findings);
    let label = info.url ? `[\`${issueType}\`](${info.url})` : `\`${issueType}\``;
    if (info.tags) label += ` ${escapeMarkdown(info.tags)}`;

    for (const finding of findings) {
      lines.push(`| ${label} | ${finding.severity} | \`${formatLocation(finding)}\` | ${describe(finding)} |`);
    }
  }

  return lines.join('\n') + '\n';
}

/** Line breaks would end the table row */
function singleLine(text: string): string {
  return text.replace(/\r?\n/g, '<br>');
}

/**
 * Code spans keep their content literal, but a table still splits cells on
 * a bare pipe inside them.
 */
function codeSpan(text: string): string {
  return `\`${singleLine(text.replace(/\|/g, '\\|'))}\``;
}

function describe(finding: Finding): string {
  let text = singleLine(escapeMarkdown(finding.message));
  if (finding.extra == null) return text;

  text += '<hr>';
  const replacement = parseSuggestion(finding.extra);
  return replacement !== undefined
    ? `${text}Did you mean <br> ${codeSpan(replacement)}`
    : text + singleLine(escapeMarkdown(finding.extra));
}
