import { exec } from 'node:child_process';
import { promisify } from 'node:util';
import type { CommandExecutionResult, CommandRunner, CommandRunOptions } from '../types/release.js';
import { logSystemCommand } from '../utils/logger.js';

const execAsync = promisify(exec);
const MAX_BUFFER_BYTES = 10 * 1024 * 1024;

function isExecError(
  error: unknown,
): error is Error & { code?: number | string | null; killed?: boolean; signal?: string | null; stdout?: string; stderr?: string } {
  return error instanceof Error;
}

export function summarizeOutput(output: string): string {
  const trimmed = output.trim();
  if (!trimmed) {
    return 'No command output captured.';
  }
  const lines = trimmed.split('\n').slice(-5);
  return lines.join('\n');
}

/**
 * Runs a shell command and reports its exit status instead of throwing.
 * A timeout or an aborted signal kills the child and yields `ok: false`.
 */
export async function defaultCommandRunner(
  command: string,
  options: CommandRunOptions,
): Promise<CommandExecutionResult> {
  const startedAt = Date.now();
  let result: CommandExecutionResult;
  try {
    const { stdout, stderr } = await execAsync(command, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      timeout: options.timeoutMs,
      signal: options.signal,
      windowsHide: true,
      maxBuffer: MAX_BUFFER_BYTES,
    });
    const output = [stdout, stderr].filter(Boolean).join('\n').trim();
    result = {
      ok: true,
      exitCode: 0,
      output,
      durationMs: Date.now() - startedAt,
    };
  } catch (error: unknown) {
    if (!isExecError(error)) {
      throw error;
    }
    const output = [error.stdout, error.stderr, error.message]
      .filter((part): part is string => typeof part === 'string' && part.length > 0)
      .join('\n')
      .trim();
    result = {
      ok: false,
      exitCode: typeof error.code === 'number' ? error.code : 1,
      output,
      durationMs: Date.now() - startedAt,
      timedOut: error.killed === true && error.signal === 'SIGTERM' && !options.signal?.aborted,
    };
  }

  await logSystemCommand(command, options.cwd, result);
  return result;
}

/** Describes a failed command in one line for error messages. */
export function describeFailure(command: string, result: CommandExecutionResult): string {
  const reason = result.timedOut ? 'timed out' : `exit ${result.exitCode}`;
  return `\`${command}\` failed (${reason}): ${summarizeOutput(result.output)}`;
}

/** Quotes a value for safe interpolation into a POSIX shell command. */
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_./:@%+=-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Everything a collaborator needs to run external tools for one invocation. */
export interface CommandContext {
  runner: CommandRunner;
  timeoutMs: number;
  signal?: AbortSignal;
}

export function runInContext(context: CommandContext, command: string, cwd: string): Promise<CommandExecutionResult> {
  return context.runner(command, {
    cwd,
    timeoutMs: context.timeoutMs,
    signal: context.signal,
  });
}
