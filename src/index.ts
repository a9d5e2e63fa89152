/**
 * findings-report - static-analysis reports for humans
 *
 * Turn compiler diagnostics into HTML, TSV and Markdown reports that link
 * each finding back to its source line.
 */

// Findings: types, build output parsing, findings files
export * from './lib/findings/index.js';

// Issue type lookup
export * from './lib/catalog/index.js';

// Report rendering and generation
export * from './lib/report/index.js';

// Configuration
export * from './lib/config/index.js';

// Config + findings -> reports
export * from './lib/pipeline/index.js';

// Version
export const VERSION = '0.1.0';
