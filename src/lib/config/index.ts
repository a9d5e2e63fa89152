/**
 * Config Module
 *
 * Provides:
 * - YAML and JSON config parsing
 * - Zod-validated schemas
 * - Default configuration merging
 * - Conversion into an issue catalog and generator options
 */

export {
  ConfigParser,
  createConfigParser,
  loadConfig,
  DEFAULT_CONFIG,
  ReportConfigSchema,
  type IssueEntry,
  type ReportConfig,
  type ResolvedReportConfig,
} from './parser.js';
