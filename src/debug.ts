/**
 * Debug Logging
 *
 * Appends timestamped lines to debug.log when enabled with --debug.
 * The terminal is in raw mode while the editor runs, so nothing is ever
 * printed to stdout from here.
 */

import * as fs from 'fs';
import * as path from 'path';

let debugEnabled = false;
let logPath = path.join(process.cwd(), 'debug.log');

export function setDebugEnabled(enabled: boolean, file?: string): void {
  debugEnabled = enabled;
  if (file) {
    logPath = file;
  }
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export function debugLog(message: string): void {
  if (!debugEnabled) return;

  try {
    fs.appendFileSync(logPath, `${new Date().toISOString()} ${message}\n`);
  } catch {
    // Unwritable log file: stop trying.
    debugEnabled = false;
  }
}
