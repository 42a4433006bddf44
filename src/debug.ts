/**
 * Debug Logging Utility
 *
 * Provides centralized debug logging that:
 * - Is off unless DISKRINGS_DEBUG=true or the config enables it
 * - Writes to ~/.diskrings/debug.log with owner-only permissions
 * - Never blocks the caller (fire-and-forget file writes)
 */

import * as fsp from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { ScanLogger } from '@diskrings/scanner';

export const DEBUG_DIR = path.join(os.homedir(), '.diskrings');
export const DEBUG_LOG = path.join(DEBUG_DIR, 'debug.log');

let enabled = process.env.DISKRINGS_DEBUG === 'true';

export function isDebugEnabled(): boolean {
  return enabled;
}

export function setDebugEnabled(value: boolean): void {
  enabled = value;
}

/**
 * Ensure debug directory exists (call once during init)
 */
export const ensureDebugDir = async (): Promise<void> => {
  if (!enabled) return;

  try {
    await fsp.mkdir(DEBUG_DIR, { recursive: true, mode: 0o700 });
  } catch (error) {
    enabled = false;
    console.error(`[debug] Cannot create ${DEBUG_DIR}, debug logging disabled:`, error);
  }
};

/**
 * Append a timestamped line to the debug log (non-blocking)
 */
export const debugLog = (msg: string): void => {
  if (!enabled) return;

  const timestamp = new Date().toISOString();
  fsp
    .appendFile(DEBUG_LOG, `[${timestamp}] ${msg}\n`, { mode: 0o600 })
    .catch((error: unknown) => {
      // One failed write turns logging off rather than failing every later call
      enabled = false;
      console.error(`[debug] Cannot write ${DEBUG_LOG}, debug logging disabled:`, error);
    });
};

/**
 * Get current debug log content (for inspection)
 */
export const getDebugLog = async (): Promise<string | null> => {
  try {
    return await fsp.readFile(DEBUG_LOG, 'utf-8');
  } catch {
    return null;
  }
};

/**
 * Scan logger that sends absorbed per-entry failures to the debug log
 */
export function createScanLogger(): ScanLogger {
  return {
    warn: (message) => debugLog(`[scan] ${message}`),
    debug: (message) => debugLog(`[scan] ${message}`)
  };
}
