/**
 * Report Generator
 *
 * Renders one set of findings into every report format and copies the
 * stylesheet and sort script the HTML reports load next to them.
 */

import { access, copyFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { createIssueCatalog, type IssueCatalog } from '../catalog/index.js';
import type { ReportData } from '../findings/index.js';
import { formatTimestamp, type RenderContext } from './format.js';
import { renderFlatHtml, renderGroupedHtml, SORT_SCRIPT_FILE, STYLESHEET_FILE } from './html.js';
import { renderMarkdown } from './markdown.js';
import { renderTsv } from './tsv.js';

// ============================================================================
// Types
// ============================================================================

export interface ReportOptions {
  /** Issue type lookup (default: empty catalog) */
  catalog?: IssueCatalog;
  /** Title prefix; the generation time is appended */
  title?: string;
  /** Clock for the title timestamp */
  now?: () => Date;
  /** Directory holding the bundled assets */
  assetsDir?: string;
}

export interface ReportResult {
  flatHtmlPath: string;
  groupedHtmlPath: string;
  tsvPath: string;
  markdownPath: string;
  assetPaths: string[];
}

export const REPORT_FILES = {
  flatHtml: 'report-flat.html',
  groupedHtml: 'report-grouped.html',
  tsv: 'report.tsv',
  markdown: 'report.md',
} as const;

export const ASSET_FILES: readonly string[] = [SORT_SCRIPT_FILE, STYLESHEET_FILE];

export const DEFAULT_ASSETS_DIR = fileURLToPath(new URL('../../../assets', import.meta.url));

export const DEFAULT_TITLE = 'Static analysis report';

// ============================================================================
// Report Generator
// ============================================================================

export class ReportGenerator {
  private catalog: IssueCatalog;
  private options: Required<Omit<ReportOptions, 'catalog'>>;

  constructor(options: ReportOptions = {}) {
    this.catalog = options.catalog ?? createIssueCatalog();
    this.options = {
      title: options.title || DEFAULT_TITLE,
      now: options.now ?? (() => new Date()),
      assetsDir: options.assetsDir ?? DEFAULT_ASSETS_DIR,
    };
  }

  /**
   * Write all reports into an existing directory, replacing earlier ones.
   * Rejects on the first filesystem error; later files are not written.
   */
  async generate(data: ReportData, outputDir: string, baseUrl: string): Promise<ReportResult> {
    const assetPaths = await this.copyAssets(outputDir);

    const context: RenderContext = {
      catalog: this.catalog,
      baseUrl,
      title: `${this.options.title}, ${formatTimestamp(this.options.now())}`,
    };

    const flatHtmlPath = await this.writeReport(outputDir, REPORT_FILES.flatHtml, renderFlatHtml(data, context));
    const groupedHtmlPath = await this.writeReport(outputDir, REPORT_FILES.groupedHtml, renderGroupedHtml(data, context));
    const tsvPath = await this.writeReport(outputDir, REPORT_FILES.tsv, renderTsv(data, context));
    const markdownPath = await this.writeReport(outputDir, REPORT_FILES.markdown, renderMarkdown(data, context));

    return { flatHtmlPath, groupedHtmlPath, tsvPath, markdownPath, assetPaths };
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async copyAssets(outputDir: string): Promise<string[]> {
    // All must exist before anything lands in the output directory
    for (const name of ASSET_FILES) {
      await access(join(this.options.assetsDir, name));
    }

    const copied: string[] = [];
    for (const name of ASSET_FILES) {
      const target = join(outputDir, name);
      await copyFile(join(this.options.assetsDir, name), target);
      copied.push(target);
    }
    return copied;
  }

  private async writeReport(outputDir: string, fileName: string, content: string): Promise<string> {
    const path = join(outputDir, fileName);
    await writeFile(path, content, 'utf-8');
    console.log(`[Report] Generated: ${path}`);
    return path;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createReportGenerator(options?: ReportOptions): ReportGenerator {
  return new ReportGenerator(options);
}
