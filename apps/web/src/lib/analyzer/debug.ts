/**
 * Debug logging utilities for the analyzer
 *
 * Console logging plus an optional append-only log file.
 * Configured via environment variables:
 * - TL_DEBUG_LOG_FILE=true enables the file sink
 * - TL_DEBUG_LOG_PATH overrides its location (default ./debug-analyzer.log)
 *
 * @module analyzer/debug
 */

import * as fs from "fs";
import * as path from "path";

// ============================================================================
// CONFIGURATION
// ============================================================================

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

function isFileLoggingEnabled(): boolean {
  return (process.env.TL_DEBUG_LOG_FILE ?? "false").toLowerCase() === "true";
}

function getDebugLogPath(): string {
  return process.env.TL_DEBUG_LOG_PATH || path.join(process.cwd(), "debug-analyzer.log");
}

let fileWriteWarned = false;

// ============================================================================
// DEBUG LOGGING FUNCTIONS
// ============================================================================

/**
 * Render a log line: ISO timestamp, message, and an optional serialized payload.
 */
export function formatDebugLine(message: string, data?: unknown, now: Date = new Date()): string {
  let logLine = `[${now.toISOString()}] ${message}`;

  if (data !== undefined) {
    let payload: string;
    try {
      payload = typeof data === "string" ? data : JSON.stringify(data, null, 2);
    } catch {
      payload = "[unserializable]";
    }
    if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
      payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "…[truncated]";
    }
    logLine += ` | ${payload}`;
  }
  return logLine;
}

/**
 * Log a message to the console and, when enabled, the debug file
 */
export function debugLog(message: string, data?: unknown): void {
  const logLine = formatDebugLine(message, data);

  if (isFileLoggingEnabled()) {
    fs.promises.appendFile(getDebugLogPath(), logLine + "\n").catch((err: unknown) => {
      if (!fileWriteWarned) {
        fileWriteWarned = true;
        console.warn("[Debug] Could not write debug log file:", err);
      }
    });
  }

  console.log(logLine);
}
