/**
 * Issue Catalog
 *
 * Read-only lookup from issue type to the display data reports need:
 * severity bucket, tag annotation and documentation URL. Injected into
 * the generator so callers (and tests) choose the table.
 */

import type { Finding } from '../findings/index.js';

// ============================================================================
// Types
// ============================================================================

export interface IssueInfo {
  severity: string;
  tags?: string;
  url?: string;
}

export interface IssueCatalogEntry {
  severity?: string;
  tags?: string;
  url?: string;
}

export interface IssueCatalog {
  /** Severity levels to summarize, highest priority first */
  readonly severityLevels: readonly string[];
  resolve(issueType: string): IssueInfo;
}

export interface CatalogOptions {
  severityLevels?: readonly string[];
  /** Severity for issue types missing from the table */
  fallbackSeverity?: string;
  /** Documentation URL pattern; `{type}` is replaced by the issue type */
  urlTemplate?: string;
}

export const DEFAULT_SEVERITY_LEVELS: readonly string[] = ['ERROR', 'WARNING', 'SUGGESTION'];
export const DEFAULT_FALLBACK_SEVERITY = 'UNKNOWN';

// ============================================================================
// Static Catalog
// ============================================================================

export class StaticIssueCatalog implements IssueCatalog {
  readonly severityLevels: readonly string[];
  private entries: ReadonlyMap<string, IssueCatalogEntry>;
  private fallbackSeverity: string;
  private urlTemplate: string | undefined;

  constructor(entries: Record<string, IssueCatalogEntry> = {}, options: CatalogOptions = {}) {
    this.entries = new Map(Object.entries(entries));
    this.severityLevels = [...(options.severityLevels ?? DEFAULT_SEVERITY_LEVELS)];
    this.fallbackSeverity = options.fallbackSeverity ?? DEFAULT_FALLBACK_SEVERITY;
    this.urlTemplate = options.urlTemplate;
  }

  resolve(issueType: string): IssueInfo {
    const entry = this.entries.get(issueType);
    return {
      severity: entry?.severity ?? this.fallbackSeverity,
      tags: entry?.tags,
      url: entry?.url ?? this.expandTemplate(issueType),
    };
  }

  private expandTemplate(issueType: string): string | undefined {
    if (!this.urlTemplate) return undefined;
    return this.urlTemplate.split('{type}').join(encodeURIComponent(issueType));
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Resolve an issue type, falling back to the first documentation URL the
 * tool attached to one of its findings.
 */
export function describeIssue(
  catalog: IssueCatalog,
  issueType: string,
  findings: readonly Finding[]
): IssueInfo {
  const info = catalog.resolve(issueType);
  if (info.url) return info;

  const fromFinding = findings.find(f => f.url)?.url;
  return fromFinding ? { ...info, url: fromFinding } : info;
}

// ============================================================================
// Factory
// ============================================================================

export function createIssueCatalog(
  entries?: Record<string, IssueCatalogEntry>,
  options?: CatalogOptions
): StaticIssueCatalog {
  return new StaticIssueCatalog(entries, options);
}
