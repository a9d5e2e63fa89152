/**
 * Finding Types
 *
 * One static-analysis result per compiler diagnostic, and the ordered
 * issue-type mapping every report is rendered from.
 */

import { z } from 'zod';

// ============================================================================
// Schemas
// ============================================================================

export const FindingSchema = z.object({
  path: z.string().min(1),
  line: z.number().int().positive(),
  column: z.number().int().positive(),
  severity: z.string().min(1),
  type: z.string().min(1),
  message: z.string(),
  extra: z.string().nullish(),
  url: z.string().nullish(),
});

// ============================================================================
// Types
// ============================================================================

export type Finding = Readonly<z.infer<typeof FindingSchema>>;

/**
 * Issue type -> findings of that type. Insertion order is rendering order.
 */
export type ReportData = ReadonlyMap<string, readonly Finding[]>;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Group a flat list by issue type, keeping first-seen order of types
 * and of findings within each type.
 */
export function groupFindings(findings: Iterable<Finding>): Map<string, Finding[]> {
  const grouped = new Map<string, Finding[]>();
  for (const finding of findings) {
    const bucket = grouped.get(finding.type);
    if (bucket) {
      bucket.push(finding);
    } else {
      grouped.set(finding.type, [finding]);
    }
  }
  return grouped;
}

export function countFindings(data: ReportData): number {
  let total = 0;
  for (const findings of data.values()) total += findings.length;
  return total;
}
