/**
 * Compiler Output Parser
 *
 * Extracts findings from Maven/javac build output where each diagnostic
 * carries a bracketed issue type:
 *
 *   [WARNING] /src/Foo.java:[10,5] [NullAway] x may be null
 *       (see https://docs.example/NullAway)
 *     Did you mean 'y'?
 */

import { readFile } from 'fs/promises';
import { isAbsolute, relative, sep } from 'path';
import { z } from 'zod';
import { FindingSchema, groupFindings, type Finding } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface ParserOptions {
  /** Paths under this directory are reported relative to it */
  rootDir?: string;
  /** Drop repeated identical diagnostics (default: true) */
  dedupe?: boolean;
}

interface PendingFinding {
  path: string;
  line: number;
  column: number;
  severity: string;
  type: string;
  message: string;
  url: string | null;
  extraLines: string[];
}

const DIAGNOSTIC_LINE =
  /^\[(ERROR|WARNING|INFO)\]\s+(.+?):\[(\d+),(\d+)\]\s+\[([\w.-]+)\]\s?(.*)$/;
const SEE_LINE = /^\s*\(see\s+(\S+)\)\s*$/;

// ============================================================================
// Parser
// ============================================================================

export class CompilerOutputParser {
  private rootDir: string | undefined;
  private dedupe: boolean;

  constructor(options: ParserOptions = {}) {
    this.rootDir = options.rootDir;
    this.dedupe = options.dedupe ?? true;
  }

  /**
   * Parse raw build output into findings grouped by issue type
   */
  parse(output: string): Map<string, Finding[]> {
    const findings: Finding[] = [];
    const seen = new Set<string>();
    let pending: PendingFinding | null = null;

    const flush = () => {
      if (!pending) return;
      const finding = this.toFinding(pending);
      pending = null;

      if (this.dedupe) {
        const key = [finding.path, finding.line, finding.column, finding.type, finding.message].join('\u0000');
        if (seen.has(key)) return;
        seen.add(key);
      }
      findings.push(finding);
    };

    for (const line of output.split(/\r?\n/)) {
      const match = DIAGNOSTIC_LINE.exec(line);
      if (match) {
        flush();
        pending = {
          severity: match[1],
          path: this.relativize(match[2]),
          line: Number(match[3]),
          column: Number(match[4]),
          type: match[5],
          message: match[6],
          url: null,
          extraLines: [],
        };
        continue;
      }

      if (!pending) continue;

      if (line.trim() === '' || line.startsWith('[')) {
        flush();
        continue;
      }

      const see = SEE_LINE.exec(line);
      if (see) {
        pending.url = see[1];
      } else {
        pending.extraLines.push(line.trim());
      }
    }
    flush();

    return groupFindings(findings);
  }

  private toFinding(pending: PendingFinding): Finding {
    return {
      path: pending.path,
      line: pending.line,
      column: pending.column,
      severity: pending.severity,
      type: pending.type,
      message: pending.message,
      extra: pending.extraLines.length > 0 ? pending.extraLines.join('\n') : null,
      url: pending.url,
    };
  }

  private relativize(path: string): string {
    if (!this.rootDir || !isAbsolute(path)) return path;

    const rel = relative(this.rootDir, path);
    if (rel.startsWith('..') || isAbsolute(rel)) return path;
    return rel.split(sep).join('/');
  }
}

// ============================================================================
// Findings File
// ============================================================================

const KeyedFindingSchema = FindingSchema.extend({ type: z.string().min(1).optional() });

const FindingsFileSchema = z.union([
  z.array(FindingSchema),
  z.record(z.string(), z.array(KeyedFindingSchema)),
]);

/**
 * Load findings from JSON: a flat array, or an object keyed by issue type
 */
export async function loadFindingsFile(path: string): Promise<Map<string, Finding[]>> {
  const content = await readFile(path, 'utf-8');
  const parsed = FindingsFileSchema.parse(JSON.parse(content));

  if (Array.isArray(parsed)) {
    return groupFindings(parsed);
  }

  const data = new Map<string, Finding[]>();
  for (const [type, entries] of Object.entries(parsed)) {
    data.set(type, entries.map(entry => ({ ...entry, type: entry.type ?? type })));
  }
  return data;
}

// ============================================================================
// Factory
// ============================================================================

export function createCompilerOutputParser(options?: ParserOptions): CompilerOutputParser {
  return new CompilerOutputParser(options);
}
