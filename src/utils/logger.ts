import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import type { CommandExecutionResult } from '../types/release.js';

const SENSITIVE_ENV_NAME = /(SECRET|TOKEN|PASSWORD|PASSWD|API_KEY|PRIVATE_KEY)/i;
const MIN_ENV_VALUE_LENGTH = 8;

const KEY_VALUE_PATTERN =
  /\b([A-Za-z0-9_]*(?:password|passwd|secret|token|api[_-]?key)[A-Za-z0-9_]*)(\s*[=:]\s*)("[^"]*"|'[^']*'|[^\s&]+)/gi;
const BEARER_PATTERN = /\b(Bearer)\s+[A-Za-z0-9._~+/=-]+/g;
const URL_CREDENTIALS_PATTERN = /(\b[a-z][a-z0-9+.-]*:\/\/)[^/\s:@]+:[^/\s@]+@/gi;

interface LoggerState {
  logDir: string | null;
  echo: boolean;
  /** Set after a failed file write; cleared by the next successful one. */
  fileWriteFailing: boolean;
}

const state: LoggerState = {
  logDir: null,
  echo: true,
  fileWriteFailing: false,
};

/**
 * Points the daily log at a directory (usually `<state>/logs`).
 * With no directory configured, lines only go to the console.
 */
export function configureLogger(options: { logDir?: string | null; echo?: boolean }): void {
  if (options.logDir !== undefined) {
    state.logDir = options.logDir;
    state.fileWriteFailing = false;
  }
  if (options.echo !== undefined) {
    state.echo = options.echo;
  }
}

export function getLogFilePath(date: Date = new Date()): string | null {
  if (!state.logDir) {
    return null;
  }
  return path.join(state.logDir, `${date.toISOString().slice(0, 10)}.md`);
}

export function scrubSensitiveText(text: string): string {
  let scrubbed = text
    .replace(URL_CREDENTIALS_PATTERN, '$1[REDACTED]@')
    .replace(BEARER_PATTERN, '$1 [REDACTED]')
    .replace(KEY_VALUE_PATTERN, '$1$2[REDACTED]');

  for (const [name, value] of Object.entries(process.env)) {
    if (!value || value.length < MIN_ENV_VALUE_LENGTH || !SENSITIVE_ENV_NAME.test(name)) {
      continue;
    }
    scrubbed = scrubbed.split(value).join('[REDACTED]');
  }
  return scrubbed;
}

async function writeLine(level: 'info' | 'warn' | 'error', message: string): Promise<void> {
  const now = new Date();
  const line = scrubSensitiveText(message);

  if (state.echo) {
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  const logPath = getLogFilePath(now);
  if (!logPath) {
    return;
  }
  const prefix = level === 'info' ? '' : `**${level.toUpperCase()}** `;
  try {
    await mkdir(path.dirname(logPath), { recursive: true });
    await appendFile(logPath, `- ${now.toISOString().slice(11, 19)} ${prefix}${line}\n`, 'utf8');
    state.fileWriteFailing = false;
  } catch (error: unknown) {
    // A log file that cannot be written never stops a deployment or its rollback.
    if (!state.fileWriteFailing) {
      state.fileWriteFailing = true;
      const detail = error instanceof Error ? error.message : String(error);
      console.error(`[Logger] Cannot write ${logPath}: ${detail}. Continuing with console output only.`);
    }
  }
}

export async function logThought(message: string): Promise<void> {
  await writeLine('info', message);
}

export async function logWarning(message: string): Promise<void> {
  await writeLine('warn', message);
}

export async function logError(message: string): Promise<void> {
  await writeLine('error', message);
}

export async function logSystemCommand(
  command: string,
  cwd: string,
  result: CommandExecutionResult,
): Promise<void> {
  const status = result.ok
    ? 'ok'
    : result.timedOut
      ? `timed out (exit ${result.exitCode})`
      : `exit ${result.exitCode}`;
  await writeLine(
    result.ok ? 'info' : 'warn',
    `[Command] \`${command}\` in ${cwd} → ${status} (${result.durationMs}ms)`,
  );
}
