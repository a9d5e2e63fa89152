/**
 * Configuration Parser
 *
 * Parse findings-report.yml (or .json) files describing where reports go,
 * how source links are built and how issue types are displayed.
 */

import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  createIssueCatalog,
  DEFAULT_FALLBACK_SEVERITY,
  DEFAULT_SEVERITY_LEVELS,
  type StaticIssueCatalog,
} from '../catalog/index.js';
import { DEFAULT_TITLE, type ReportOptions } from '../report/index.js';

// ============================================================================
// Schemas
// ============================================================================

const IssueEntrySchema = z.object({
  severity: z.string().min(1).optional(),
  tags: z.string().optional(),
  url: z.string().url().optional(),
});

export const ReportConfigSchema = z.object({
  project_name: z.string().min(1).optional(),
  base_url: z.string().optional(),
  output_dir: z.string().optional(),
  source_root: z.string().optional(),
  severity_levels: z.array(z.string().min(1)).min(1).optional(),
  fallback_severity: z.string().min(1).optional(),
  url_template: z.string().optional(),
  issues: z.record(z.string(), IssueEntrySchema).optional(),
});

// ============================================================================
// Types
// ============================================================================

export type IssueEntry = z.infer<typeof IssueEntrySchema>;
export type ReportConfig = z.infer<typeof ReportConfigSchema>;

export interface ResolvedReportConfig extends ReportConfig {
  project_name: string;
  base_url: string;
  output_dir: string;
  severity_levels: string[];
  fallback_severity: string;
  issues: Record<string, IssueEntry>;
}

// ============================================================================
// Default Config
// ============================================================================

export const DEFAULT_CONFIG = {
  project_name: DEFAULT_TITLE,
  base_url: '',
  output_dir: './reports',
  severity_levels: [...DEFAULT_SEVERITY_LEVELS],
  fallback_severity: DEFAULT_FALLBACK_SEVERITY,
  issues: {},
} satisfies ResolvedReportConfig;

// ============================================================================
// Config Parser
// ============================================================================

export class ConfigParser {
  /**
   * Load and parse config from file
   */
  async loadFile(path: string): Promise<ResolvedReportConfig> {
    const content = await readFile(path, 'utf-8');
    return this.parse(content, path);
  }

  /**
   * Parse config from string content
   */
  parse(content: string, filename: string = 'config'): ResolvedReportConfig {
    const parsed: unknown = filename.endsWith('.json')
      ? JSON.parse(content)
      : parseYaml(content);

    // An empty YAML document is an empty config
    const validated = this.validate(parsed ?? {});
    return this.mergeWithDefaults(validated);
  }

  /**
   * Merge config with defaults
   */
  mergeWithDefaults(config: ReportConfig): ResolvedReportConfig {
    return {
      ...config,
      project_name: config.project_name ?? DEFAULT_CONFIG.project_name,
      base_url: (config.base_url ?? DEFAULT_CONFIG.base_url).replace(/\/+$/, ''),
      output_dir: config.output_dir ?? DEFAULT_CONFIG.output_dir,
      severity_levels: config.severity_levels ?? [...DEFAULT_CONFIG.severity_levels],
      fallback_severity: config.fallback_severity ?? DEFAULT_CONFIG.fallback_severity,
      issues: { ...DEFAULT_CONFIG.issues, ...config.issues },
    };
  }

  /**
   * Validate config object
   */
  validate(config: unknown): ReportConfig {
    return ReportConfigSchema.parse(config);
  }

  /**
   * Build the issue catalog described by the config
   */
  toCatalog(config: ResolvedReportConfig): StaticIssueCatalog {
    return createIssueCatalog(config.issues, {
      severityLevels: config.severity_levels,
      fallbackSeverity: config.fallback_severity,
      urlTemplate: config.url_template,
    });
  }

  /**
   * Convert config to generator options
   */
  toReportOptions(config: ResolvedReportConfig): ReportOptions {
    return {
      catalog: this.toCatalog(config),
      title: config.project_name,
    };
  }

  /**
   * Generate example config
   */
  static generateExample(): string {
    return `# findings-report configuration

project_name: "Static analysis report"
base_url: "https://example.org/repo/blob/main"
output_dir: ./reports
source_root: /path/to/checkout

severity_levels: [ERROR, WARNING, SUGGESTION]
fallback_severity: UNKNOWN
url_template: "https://docs.example.org/checks/{type}"

issues:
  ReferenceEquality:
    severity: WARNING
    tags: "[correctness]"
  UnusedVariable:
    severity: SUGGESTION
`;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createConfigParser(): ConfigParser {
  return new ConfigParser();
}

/**
 * Quick load function
 */
export async function loadConfig(path: string): Promise<ResolvedReportConfig> {
  return new ConfigParser().loadFile(path);
}
