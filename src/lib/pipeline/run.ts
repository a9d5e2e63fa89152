/**
 * Report Pipeline
 *
 * Configuration plus build output (or a findings file) in, reports on
 * disk out.
 */

import { createConfigParser, type ResolvedReportConfig } from '../config/index.js';
import {
  countFindings,
  createCompilerOutputParser,
  loadFindingsFile,
  type ReportData,
} from '../findings/index.js';
import { createReportGenerator, type ReportResult } from '../report/index.js';

export interface RunOptions {
  config: ResolvedReportConfig;
  /** Raw build output to parse */
  compilerOutput?: string;
  /** JSON findings file, as an alternative to compilerOutput */
  findingsFile?: string;
  /** Clock for report titles */
  now?: () => Date;
}

export async function runReports(options: RunOptions): Promise<ReportResult> {
  const { config } = options;
  const data = await loadReportData(options);

  console.log(`[Pipeline] ${countFindings(data)} findings across ${data.size} issue types`);

  const generator = createReportGenerator({
    ...createConfigParser().toReportOptions(config),
    now: options.now,
  });
  return generator.generate(data, config.output_dir, config.base_url);
}

async function loadReportData(options: RunOptions): Promise<ReportData> {
  const { compilerOutput, findingsFile, config } = options;

  if (compilerOutput !== undefined && findingsFile !== undefined) {
    throw new Error('Pass either compilerOutput or findingsFile, not both');
  }
  if (findingsFile !== undefined) {
    return loadFindingsFile(findingsFile);
  }
  if (compilerOutput !== undefined) {
    return createCompilerOutputParser({ rootDir: config.source_root }).parse(compilerOutput);
  }
  throw new Error('No findings source: pass compilerOutput or findingsFile');
}
