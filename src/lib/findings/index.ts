/**
 * Findings Module
 *
 * Provides:
 * - Finding and ReportData types with zod schemas
 * - Grouping by issue type in first-seen order
 * - Maven/javac build output parsing
 * - JSON findings file loading
 */

export {
  FindingSchema,
  groupFindings,
  countFindings,
  type Finding,
  type ReportData,
} from './types.js';

export {
  CompilerOutputParser,
  createCompilerOutputParser,
  loadFindingsFile,
  type ParserOptions,
} from './parser.js';
