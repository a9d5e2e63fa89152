/**
 * Pipeline Module
 *
 * Provides:
 * - One-call report generation from config and build output
 */

export { runReports, type RunOptions } from './run.js';
