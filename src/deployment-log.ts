/**
 * @fileoverview Append-only JSONL audit log for deployment lifecycle events.
 *
 * Records session creation, staging, handshake, tunnel setup, failures and
 * teardown to ~/.ephemeral-deploy/deployments.jsonl (or a caller-supplied
 * path). Useful for tracing which of many deployments leaked or stalled.
 *
 * Appends and trims share one queue, so a trim never drops a line recorded
 * while it was rewriting the file.
 *
 * @module deployment-log
 */

import { mkdirSync } from 'node:fs';
import { appendFile, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { EVENT_LOG_MAX_LINES, EVENT_LOG_TRIM_TO } from './config/deploy-defaults.js';
import { getErrorMessage } from './errors.js';
import { deploymentEventSchema, type DeploymentEvent, type DeploymentEventType } from './types/lifecycle.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('DeploymentLog');

const DEFAULT_QUERY_LIMIT = 200;

export interface DeploymentEventQuery {
  deploymentId?: string;
  event?: DeploymentEventType;
  /** Only entries with `ts >= since` */
  since?: number;
  /** Newest entries to return (default 200) */
  limit?: number;
}

export class DeploymentEventLog {
  readonly filePath: string;
  private queue: Promise<void> = Promise.resolve();

  constructor(filePath?: string) {
    this.filePath = filePath || join(homedir(), '.ephemeral-deploy', 'deployments.jsonl');
    mkdirSync(dirname(this.filePath), { recursive: true, mode: 0o700 });
  }

  /** Queue one event for appending. Write failures are logged, never thrown. */
  record(entry: Omit<DeploymentEvent, 'ts'> & { ts?: number }): void {
    const { ts = Date.now(), ...rest } = entry;
    const line = `${JSON.stringify({ ts, ...rest })}\n`;
    this.queue = this.queue
      .then(() => appendFile(this.filePath, line, 'utf-8'))
      .catch((err: unknown) => {
        log.error(`Failed to append to ${this.filePath}: ${getErrorMessage(err)}`);
      });
  }

  /** Resolves once every record() issued so far has hit the file */
  flush(): Promise<void> {
    return this.queue;
  }

  /** Matching events, newest first */
  async query(filter: DeploymentEventQuery = {}): Promise<DeploymentEvent[]> {
    const limit = filter.limit ?? DEFAULT_QUERY_LIMIT;
    if (limit <= 0) return [];
    await this.flush();
    const matching = (await this.readLines()).flatMap((line) => {
      const entry = parseEntry(line);
      return entry && matches(entry, filter) ? [entry] : [];
    });
    return matching.slice(-limit).reverse();
  }

  /**
   * Keep only the newest EVENT_LOG_TRIM_TO lines once the file holds more
   * than EVENT_LOG_MAX_LINES.
   */
  trimIfNeeded(): Promise<void> {
    const run = this.queue.then(async () => {
      const lines = await this.readLines();
      if (lines.length <= EVENT_LOG_MAX_LINES) return;
      const kept = lines.slice(-EVENT_LOG_TRIM_TO);
      await writeFile(this.filePath, `${kept.join('\n')}\n`, 'utf-8');
      log.info(`Trimmed from ${lines.length} to ${kept.length} entries`);
    });
    // Later records must not wait on a failed trim
    this.queue = run.then(
      () => undefined,
      (err: unknown) => log.warn(`Trim of ${this.filePath} failed: ${getErrorMessage(err)}`)
    );
    return run;
  }

  private async readLines(): Promise<string[]> {
    try {
      const raw = await readFile(this.filePath, 'utf-8');
      return raw.split('\n').filter((line) => line.trim() !== '');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }
  }
}

function matches(entry: DeploymentEvent, filter: DeploymentEventQuery): boolean {
  if (filter.deploymentId !== undefined && entry.deploymentId !== filter.deploymentId) return false;
  if (filter.event !== undefined && entry.event !== filter.event) return false;
  if (filter.since !== undefined && entry.ts < filter.since) return false;
  return true;
}

function parseEntry(line: string): DeploymentEvent | null {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    log.debug(`Skipping malformed line: ${line.slice(0, 80)}`);
    return null;
  }
  const result = deploymentEventSchema.safeParse(json);
  return result.success ? result.data : null;
}
