// Session debug log
// Components report through an onDebugLog callback; the file writer below
// is what the CLI wires in.

import * as fs from 'node:fs';
import * as path from 'node:path';

/** Debug log file path (temporary, cleared each session) */
export const DEBUG_LOG_PATH = path.join(process.cwd(), '.loader', 'loader-menu.tmp.log');

export type DebugLogEntry = {
  type: 'menu' | 'input' | 'autoboot' | 'loader' | 'config' | 'system';
  text: string;
  details?: Record<string, unknown>;
};

export type DebugLogger = (entry: DebugLogEntry) => void;

/**
 * Formats an entry as a log line (trailing newline included)
 */
export function formatLogLine(entry: DebugLogEntry, timestamp: string): string {
  let logLine = `[${timestamp}] [${entry.type.toUpperCase()}] ${entry.text}`;

  // Add full details as JSON if present
  if (entry.details) {
    logLine += `\n    DETAILS: ${JSON.stringify(entry.details, null, 2).split('\n').join('\n    ')}`;
  }

  return `${logLine}\n`;
}

/**
 * Truncates the log file and writes the session header
 */
export function startDebugLog(logPath: string = DEBUG_LOG_PATH): void {
  try {
    const dir = path.dirname(logPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(logPath, `=== Loader Menu Session ${new Date().toISOString()} ===\n\n`);
  } catch (_err) {
    // Ignore errors
  }
}

/**
 * Creates an onDebugLog callback that appends to the log file
 */
export function createFileLogger(logPath: string = DEBUG_LOG_PATH): DebugLogger {
  return (entry) => {
    try {
      fs.appendFileSync(logPath, formatLogLine(entry, new Date().toISOString()));
    } catch (_err) {
      // Silently ignore write errors
    }
  };
}

/** Logger for components constructed without one */
export const noopLogger: DebugLogger = () => {};
