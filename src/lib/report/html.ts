/**
 * HTML Reports
 *
 * Two views over the same data: a flat sortable table with one row per
 * finding, and a report grouped by issue type with a severity summary.
 * Both pull in the bundled stylesheet and sort script by relative path.
 */

import { describeIssue, type IssueInfo } from '../catalog/index.js';
import type { Finding, ReportData } from '../findings/index.js';
import { HtmlWriter } from './html-writer.js';
import { formatLocation, parseSuggestion, sourceUrl, type RenderContext } from './format.js';

export const STYLESHEET_FILE = 'report.css';
export const SORT_SCRIPT_FILE = 'sorttable.js';

const LINK_SYMBOL = '\u{1F517}';
const SUMMARY_SEPARATOR = ' • ';

// ============================================================================
// Flat Report
// ============================================================================

export function renderFlatHtml(data: ReportData, context: RenderContext): string {
  const html = new HtmlWriter();
  openDocument(html, context.title);

  html.openTag('table', { class: 'sortable' }).nl();
  writeHeaderRow(html, ['File and line number', 'Severity', 'Issue type', 'Message']);
  html.openTag('tbody').nl();

  for (const [issueType, findings] of data) {
    const info = describeIssue(context.catalog, issueType, findings);

    for (const finding of findings) {
      html.openTag('tr');
      writeLocationCell(html, finding, context.baseUrl);
      html.element('td', finding.severity, { class: `severity_${finding.severity}` });

      html.openTag('td', { class: 'tag' });
      if (info.url) {
        html.element('a', issueType, { href: info.url, target: 'errWin' });
      } else {
        html.text(issueType);
      }
      writeTags(html, info);
      html.closeTag('td');

      writeDescriptionCell(html, finding);
      html.closeTag('tr').nl();
    }
  }

  html.closeTag('tbody').nl();
  html.closeTag('table').nl();
  return closeDocument(html);
}

// ============================================================================
// Grouped Report
// ============================================================================

export function renderGroupedHtml(data: ReportData, context: RenderContext): string {
  const html = new HtmlWriter();
  openDocument(html, context.title);

  const issues = [...data].map(([issueType, findings]) => ({
    issueType,
    findings,
    info: describeIssue(context.catalog, issueType, findings),
  }));

  html.openTag('div').nl();
  html.element('h2', 'Summary').nl();
  for (const level of context.catalog.severityLevels) {
    const atLevel = issues.filter(issue => issue.info.severity === level);
    if (atLevel.length === 0) continue;

    html.element('h3', level).nl();
    html.openTag('p');
    atLevel.forEach(({ issueType, findings, info }, index) => {
      if (index > 0) html.text(SUMMARY_SEPARATOR);
      html.openTag('a', { href: `#${anchorId(issueType)}`, class: `severity_${level}` })
        .element('span', issueType, { class: 'tag' })
        .closeTag('a');
      writeTags(html, info);
      html.text(` (${findings.length})`);
    });
    html.closeTag('p').nl();
  }
  html.closeTag('div').nl();

  html.openTag('hr').nl();
  html.element('h2', 'Detailed report').nl();

  for (const { issueType, findings, info } of issues) {
    html.openTag('h3', { id: anchorId(issueType) })
      .text(`[${info.severity}] `)
      .element('span', issueType, { class: 'tag' });
    writeTags(html, info);
    html.text(` (${findings.length})`);
    if (info.url) {
      html.text(' ').element('a', LINK_SYMBOL, { href: info.url, target: 'errWin' });
    }
    html.closeTag('h3').nl();

    html.openTag('table', { class: 'sortable' }).nl();
    writeHeaderRow(html, ['File and line number', 'Message']);
    html.openTag('tbody').nl();
    for (const finding of findings) {
      html.openTag('tr');
      writeLocationCell(html, finding, context.baseUrl);
      writeDescriptionCell(html, finding);
      html.closeTag('tr').nl();
    }
    html.closeTag('tbody').nl();
    html.closeTag('table').nl();
  }

  return closeDocument(html);
}

// ============================================================================
// Helpers
// ============================================================================

function anchorId(issueType: string): string {
  return `name_${issueType}`;
}

function openDocument(html: HtmlWriter, title: string): void {
  html.raw('<!DOCTYPE html>').nl();
  html.openTag('html', { lang: 'en' }).nl();
  html.openTag('head').nl();
  html.openTag('meta', { charset: 'UTF-8' }).nl();
  html.element('title', title).nl();
  html.openTag('link', { rel: 'stylesheet', href: STYLESHEET_FILE }).nl();
  html.openTag('script', { src: SORT_SCRIPT_FILE }).closeTag('script').nl();
  html.closeTag('head').nl();
  html.openTag('body').nl();
  html.element('h1', title).nl();
}

function closeDocument(html: HtmlWriter): string {
  html.closeTag('body').nl();
  html.closeTag('html').nl();
  return html.finish();
}

function writeHeaderRow(html: HtmlWriter, columns: string[]): void {
  html.openTag('thead').nl().openTag('tr');
  for (const column of columns) html.element('th', column);
  html.closeTag('tr').nl().closeTag('thead').nl();
}

function writeTags(html: HtmlWriter, info: IssueInfo): void {
  if (info.tags) {
    html.element('span', ` ${info.tags}`, { class: 'tags' });
  }
}

function writeLocationCell(html: HtmlWriter, finding: Finding, baseUrl: string): void {
  html.openTag('td', { class: 'file_name' })
    .element('a', formatLocation(finding), { href: sourceUrl(baseUrl, finding), target: 'codeWin' })
    .closeTag('td');
}

function writeDescriptionCell(html: HtmlWriter, finding: Finding): void {
  html.openTag('td', { class: 'desc' }).text(finding.message);

  if (finding.extra != null) {
    html.openTag('hr');
    const replacement = parseSuggestion(finding.extra);
    if (replacement !== undefined) {
      html.text('Did you mean ').openTag('br').element('code', replacement);
    } else {
      html.text(finding.extra);
    }
  }

  html.closeTag('td');
}
