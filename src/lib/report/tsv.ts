import { describeIssue } from '../catalog/index.js';
import type { ReportData } from '../findings/index.js';
import type { RenderContext } from './format.js';

const TSV_HEADER = ['Issue type', 'Count', 'Severity', 'URL'];

/**
 * One row per issue type with its finding count. Unknown URLs leave the
 * cell empty.
 */
export function renderTsv(data: ReportData, context: Pick<RenderContext, 'catalog'>): string {
  const rows = [TSV_HEADER.join('\t')];

  for (const [issueType, findings] of data) {
    const info = describeIssue(context.catalog, issueType, findings);
    const label = info.tags ? `${issueType} ${info.tags}` : issueType;
    rows.push([label, String(findings.length), info.severity, info.url ?? ''].join('\t'));
  }

  return rows.join('\n') + '\n';
}
