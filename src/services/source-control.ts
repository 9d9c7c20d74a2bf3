import path from 'node:path';
import { DeployError } from '../release/deploy-error.js';
import { describeFailure, runInContext, shellQuote, type CommandContext } from './command-runner.js';

const REF_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._/-]*$/;

export function assertValidRef(ref: string): void {
  if (!REF_PATTERN.test(ref) || ref.includes('..') || ref.endsWith('/') || ref.endsWith('.lock')) {
    throw DeployError.invalidRef(ref);
  }
}

/**
 * Git as the source collaborator: fetch a ref from the remote and hard-reset a
 * working tree to it. Every failure is a `SOURCE_SYNC_FAILED`.
 */
export class SourceControl {
  readonly #context: CommandContext;
  readonly #remote: string;

  constructor(context: CommandContext, remote = 'origin') {
    this.#context = context;
    this.#remote = remote;
  }

  async clone(repository: string, targetPath: string): Promise<void> {
    const command = `git clone --no-checkout ${shellQuote(repository)} ${shellQuote(path.basename(targetPath))}`;
    const result = await runInContext(this.#context, command, path.dirname(targetPath));
    if (!result.ok) {
      throw DeployError.sourceSyncFailed(describeFailure(command, result));
    }
  }

  /** Fetches `ref` and resets the tree to exactly that revision. */
  async syncTo(workTree: string, ref: string): Promise<void> {
    assertValidRef(ref);
    const fetch = `git fetch ${shellQuote(this.#remote)} ${shellQuote(ref)}`;
    const fetched = await runInContext(this.#context, fetch, workTree);
    if (!fetched.ok) {
      throw DeployError.sourceSyncFailed(describeFailure(fetch, fetched));
    }

    const reset = 'git reset --hard FETCH_HEAD';
    const wasReset = await runInContext(this.#context, reset, workTree);
    if (!wasReset.ok) {
      throw DeployError.sourceSyncFailed(describeFailure(reset, wasReset));
    }
  }

  async resolveHead(workTree: string): Promise<string | null> {
    const result = await runInContext(this.#context, 'git rev-parse HEAD', workTree);
    if (!result.ok) {
      return null;
    }
    const commit = result.output.trim().split('\n').at(-1)?.trim();
    return commit && /^[0-9a-f]{7,64}$/i.test(commit) ? commit : null;
  }
}
