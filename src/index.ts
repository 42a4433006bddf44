/**
 * diskrings - disk usage as a drill-down sunburst
 *
 * This package ties the scanner and the ring layout together with:
 * - Layered JSON configuration (~/.diskrings, ./.diskrings, environment)
 * - Debug logging to ~/.diskrings/debug.log
 * - Size formatting, entry kinds, and a text report of the rings
 *
 * Main entry point for library usage. For CLI usage, run:
 *   npm start -- <path>
 */

export * from '@diskrings/scanner';
export * from '@diskrings/sunburst';

export { loadConfig, mergeConfigs, configFromEnv, resolveSettings, CONFIG_FOLDER } from './config';
export type { DiskringsConfig, Settings } from './config';

export { debugLog, ensureDebugDir, getDebugLog, isDebugEnabled, setDebugEnabled, createScanLogger } from './debug';

export { formatBytes, formatPercent } from './format';
export { entryKind } from './entry-kind';
export type { EntryKind } from './entry-kind';
export { renderReport, toJsonTree } from './report';
export type { JsonEntry, ReportOptions } from './report';
export { runCli, USAGE } from './cli';
export type { CliIO } from './cli';
