/**
 * Catalog Module
 *
 * Provides:
 * - Injected issue-type lookup (severity, tags, documentation URL)
 * - Ordered severity levels for report summaries
 * - URL templates for issue types without an explicit link
 */

export {
  StaticIssueCatalog,
  createIssueCatalog,
  describeIssue,
  DEFAULT_SEVERITY_LEVELS,
  DEFAULT_FALLBACK_SEVERITY,
  type IssueInfo,
  type IssueCatalog,
  type IssueCatalogEntry,
  type CatalogOptions,
} from './catalog.js';
