import type { DeployConfig } from '../config/deploy-config.js';
import { DeployError } from '../release/deploy-error.js';
import type {
  HealthProbe,
  HealthProbeResult,
  ProbeAttempt,
  ProbeFailureClass,
  ProbeReport,
} from '../types/release.js';
import { logThought } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { describeFailure, runInContext, type CommandContext } from './command-runner.js';

export function classifyStatus(statusCode: number): ProbeFailureClass | null {
  if (statusCode >= 200 && statusCode < 300) {
    return null;
  }
  if (statusCode >= 500) {
    return 'server-error';
  }
  if (statusCode >= 400) {
    return 'client-error';
  }
  return 'unexpected';
}

/** fetch() rejects with TypeError for refused connections and DNS failures, and TimeoutError on timeout. */
export function classifyError(error: unknown): ProbeFailureClass {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError' || error.name === 'TypeError')) {
    return 'unreachable';
  }
  return 'unexpected';
}

export async function defaultHealthProbe(url: string, options: { timeoutMs: number }): Promise<HealthProbeResult> {
  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: { accept: 'application/json, text/plain, */*' },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    await response.body?.cancel();
    const failureClass = classifyStatus(response.status);
    if (failureClass) {
      return {
        ok: false,
        detail: `Health endpoint returned HTTP ${response.status}.`,
        statusCode: response.status,
        failureClass,
      };
    }
    return { ok: true, detail: `HTTP ${response.status}`, statusCode: response.status };
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    return { ok: false, detail: `Health probe failed: ${detail}`, failureClass: classifyError(error) };
  }
}

export interface HealthGateOptions {
  config: DeployConfig;
  commands: CommandContext;
  probe?: HealthProbe;
  sleep?: (ms: number) => Promise<void>;
  signal?: AbortSignal;
}

class ProbeFailure extends Error {}

/**
 * Two gates: an in-process self-check before the switch, and an external
 * HTTP probe against the live path after it.
 */
export class HealthGate {
  readonly #config: DeployConfig;
  readonly #commands: CommandContext;
  readonly #probe: HealthProbe;
  readonly #sleep: ((ms: number) => Promise<void>) | undefined;
  readonly #signal: AbortSignal | undefined;

  constructor(options: HealthGateOptions) {
    this.#config = options.config;
    this.#commands = options.commands;
    this.#probe = options.probe ?? defaultHealthProbe;
    this.#sleep = options.sleep;
    this.#signal = options.signal;
  }

  async selfCheck(releasePath: string): Promise<void> {
    const command = this.#config.health.selfCheckCommand.trim();
    if (!command) {
      await logThought('[Deploy] No self-check command configured; skipping self-check.');
      return;
    }
    const result = await runInContext(this.#commands, command, releasePath);
    if (!result.ok) {
      throw DeployError.selfCheckFailed(describeFailure(command, result));
    }
  }

  async probe(url: string = this.#config.health.url): Promise<ProbeReport> {
    if (!url.trim()) {
      throw DeployError.configInvalid('health.url is empty; refusing to treat an unprobed release as healthy.');
    }

    const { attempts: maxAttempts, delayMs, timeoutMs } = this.#config.health;
    const attempts: ProbeAttempt[] = [];

    const result = await withRetry(
      async () => {
        const outcome = await this.#probeOnce(url, timeoutMs);
        attempts.push({ attempt: attempts.length + 1, ...outcome });
        if (!outcome.ok) {
          throw new ProbeFailure(`${outcome.failureClass ?? 'unexpected'}: ${outcome.detail}`);
        }
        return outcome;
      },
      {
        maxAttempts,
        baseDelayMs: delayMs,
        backoffFactor: 1,
        maxDelayMs: delayMs,
        label: `health:${url}`,
        signal: this.#signal,
        sleep: this.#sleep,
      },
    );

    return { ok: result.ok, url, attempts, totalDurationMs: result.totalDurationMs };
  }

  async assertHealthy(url: string = this.#config.health.url): Promise<ProbeReport> {
    const report = await this.probe(url);
    if (!report.ok) {
      const last = report.attempts.at(-1);
      const detail = last ? `${last.failureClass ?? 'unexpected'} (${last.detail})` : 'no attempt completed';
      throw DeployError.probeExhausted(
        `Health probe of ${url} failed after ${report.attempts.length} attempt(s); last failure: ${detail}`,
      );
    }
    return report;
  }

  async #probeOnce(url: string, timeoutMs: number): Promise<HealthProbeResult> {
    try {
      return await this.#probe(url, { timeoutMs });
    } catch (error: unknown) {
      const detail = error instanceof Error ? error.message : String(error);
      return { ok: false, detail, failureClass: classifyError(error) };
    }
  }
}
