/**
 * Report Module
 *
 * Provides:
 * - Flat and grouped HTML reports
 * - TSV issue-type summary
 * - Markdown findings table
 * - Bundled stylesheet and sort script copying
 */

export {
  ReportGenerator,
  createReportGenerator,
  REPORT_FILES,
  ASSET_FILES,
  DEFAULT_ASSETS_DIR,
  DEFAULT_TITLE,
  type ReportOptions,
  type ReportResult,
} from './generator.js';

export { HtmlWriter, escapeHtml, type HtmlAttributes } from './html-writer.js';
export { renderFlatHtml, renderGroupedHtml, STYLESHEET_FILE, SORT_SCRIPT_FILE } from './html.js';
export { renderMarkdown, escapeMarkdown, MARKDOWN_SPECIAL_CHARS } from './markdown.js';
export { renderTsv } from './tsv.js';
export {
  formatLocation,
  formatTimestamp,
  parseSuggestion,
  sourceUrl,
  type RenderContext,
} from './format.js';
