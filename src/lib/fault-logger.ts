/**
 * Centralized fault logger for mnemos.
 *
 * Three channels:
 * 1. stderr: one line per entry (always)
 * 2. Local file: JSON lines at error_reporting.file_path, with rotation
 * 3. Webhook: POST to configurable URL (fire-and-forget)
 */

import fs from 'node:fs';
import path from 'node:path';
import { getErrorReportingConfig } from './config.js';
import type { ErrorReportingConfig, FaultLevel } from './config-types.js';

export type { FaultLevel } from './config-types.js';

export interface FaultEntry {
  timestamp: string;
  level: FaultLevel;
  component: string;
  message: string;
  stack?: string;
  context?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<FaultLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function reportChannelFailure(channel: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`[mnemos] fault-logger ${channel} channel failed: ${message}\n`);
}

// ---------------------------------------------------------------------------
// Channel 1: stderr
// ---------------------------------------------------------------------------

export function formatFaultLine(entry: FaultEntry): string {
  const context = entry.context && Object.keys(entry.context).length > 0
    ? ` ${JSON.stringify(entry.context)}`
    : '';
  return `[mnemos] ${entry.level.toUpperCase()} ${entry.component}: ${entry.message}${context}\n`;
}

function writeToStderr(entry: FaultEntry): void {
  process.stderr.write(formatFaultLine(entry));
}

// ---------------------------------------------------------------------------
// Channel 2: Local file with rotation
// ---------------------------------------------------------------------------

function rotateIfNeeded(logPath: string, maxSizeMb: number): void {
  if (!fs.existsSync(logPath)) return;
  const stats = fs.statSync(logPath);
  if (stats.size > maxSizeMb * 1024 * 1024) {
    fs.renameSync(logPath, logPath + '.1');
  }
}

function writeToFile(entry: FaultEntry, logPath: string, maxSizeMb: number): void {
  try {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    rotateIfNeeded(logPath, maxSizeMb);
    fs.appendFileSync(logPath, JSON.stringify(entry) + '\n');
  } catch (error) {
    reportChannelFailure('file', error);
  }
}

// ---------------------------------------------------------------------------
// Channel 3: Webhook (fire-and-forget)
// ---------------------------------------------------------------------------

function sendToWebhook(entry: FaultEntry, url: string, headers?: Record<string, string>): void {
  fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(entry),
  }).catch((error: unknown) => reportChannelFailure('webhook', error));
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Log a fault to all configured channels.
 * Never throws into the caller; channel failures are reported on stderr.
 */
export function logFault(
  level: FaultLevel,
  component: string,
  message: string,
  opts?: { error?: unknown; context?: Record<string, unknown> }
): void {
  let config: ErrorReportingConfig;
  try {
    config = getErrorReportingConfig();
  } catch (error) {
    reportChannelFailure('config', error);
    return;
  }
  if (!config.enabled) return;
  if (LEVEL_ORDER[level] < LEVEL_ORDER[config.level]) return;

  const entry: FaultEntry = {
    timestamp: new Date().toISOString(),
    level,
    component,
    message,
    stack: opts?.error instanceof Error ? opts.error.stack : undefined,
    context: opts?.context,
  };

  writeToStderr(entry);

  if (config.file_path) {
    writeToFile(entry, config.file_path, config.max_file_size_mb);
  }

  if (config.webhook_url) {
    sendToWebhook(entry, config.webhook_url, config.webhook_headers);
  }
}

/** Log an error (convenience wrapper). */
export function logError(
  component: string,
  message: string,
  error?: unknown,
  context?: Record<string, unknown>
): void {
  logFault('error', component, message, { error, context });
}

/** Log a warning (convenience wrapper). */
export function logWarn(
  component: string,
  message: string,
  context?: Record<string, unknown>
): void {
  logFault('warn', component, message, { context });
}

/** Log an info message (convenience wrapper). */
export function logInfo(
  component: string,
  message: string,
  context?: Record<string, unknown>
): void {
  logFault('info', component, message, { context });
}
