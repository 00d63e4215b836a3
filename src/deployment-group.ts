/**
 * @fileoverview DeploymentGroup - one DeploymentSession per machine, managed as a unit.
 *
 * start() builds sessions in input order and appends each one before starting
 * it. If a later machine fails, the sessions already built (and the one that
 * failed) stay in the group for close() to reclaim; nothing is rolled back
 * automatically, so the caller can see which machine failed and decide what to
 * do with the rest.
 *
 * @module deployment-group
 */

import type { DeploymentConnection, ConnectOptions } from './connection.js';
import type { DeploymentOptions } from './deployment-options.js';
import { DeploymentSession } from './deployment-session.js';
import { DeploymentStateError, getErrorMessage } from './errors.js';
import type { RemoteMachine } from './remote-machine.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('DeploymentGroup');

export class DeploymentGroup implements Iterable<DeploymentSession> {
  private readonly machines: readonly RemoteMachine[];
  private readonly options: DeploymentOptions;
  private readonly sessions: DeploymentSession[] = [];
  private started = false;

  constructor(machines: readonly RemoteMachine[], options: DeploymentOptions = {}) {
    this.machines = [...machines];
    this.options = options;
  }

  /** Deploy to every machine, one after another, in input order */
  async start(): Promise<this> {
    if (this.started) {
      throw new DeploymentStateError('DeploymentGroup.start() may only be called once');
    }
    this.started = true;
    for (const machine of this.machines) {
      // Fresh options per session so no session sees another's defaults object
      const session = new DeploymentSession(machine, { ...this.options });
      this.sessions.push(session);
      await session.start();
    }
    return this;
  }

  get size(): number {
    return this.sessions.length;
  }

  at(index: number): DeploymentSession | undefined {
    return this.sessions.at(index);
  }

  [Symbol.iterator](): Iterator<DeploymentSession> {
    return this.sessions[Symbol.iterator]();
  }

  /** Connect to every session; result i belongs to machine i */
  async connectAll(options: ConnectOptions = {}): Promise<DeploymentConnection[]> {
    const connections: DeploymentConnection[] = [];
    for (const session of this.sessions) {
      connections.push(await session.connect({ service: options.service, config: { ...(options.config ?? {}) } }));
    }
    return connections;
  }

  async classicConnectAll(): Promise<DeploymentConnection[]> {
    const connections: DeploymentConnection[] = [];
    for (const session of this.sessions) {
      connections.push(await session.classicConnect());
    }
    return connections;
  }

  /**
   * Close sessions front to back until none are left. A failing session does
   * not stop the rest; failures are rethrown afterwards (one as-is, several as
   * an AggregateError).
   */
  async close(timeoutMs?: number): Promise<void> {
    const errors: unknown[] = [];
    for (let session = this.sessions.shift(); session; session = this.sessions.shift()) {
      try {
        await session.close(timeoutMs);
      } catch (err) {
        log.warn(`Closing deployment ${session.id} on ${session.machineName} failed: ${getErrorMessage(err)}`);
        errors.push(err);
      }
    }
    if (errors.length === 1) throw errors[0];
    if (errors.length > 1) {
      throw new AggregateError(errors, `${errors.length} deployments failed to close`);
    }
  }
}

/**
 * Deploy to every machine, run `fn`, and close the group on every exit path.
 * A close() failure after start() or `fn` has failed is logged, and the first
 * error is the one thrown.
 */
export async function deployGroup<T>(
  machines: readonly RemoteMachine[],
  options: DeploymentOptions,
  fn: (group: DeploymentGroup) => Promise<T> | T,
  closeTimeoutMs?: number
): Promise<T> {
  const group = new DeploymentGroup(machines, options);
  let result: T;
  try {
    await group.start();
    result = await fn(group);
  } catch (err) {
    try {
      await group.close(closeTimeoutMs);
    } catch (closeErr) {
      log.warn(`Closing the group after a failure also failed: ${getErrorMessage(closeErr)}`);
    }
    throw err;
  }
  await group.close(closeTimeoutMs);
  return result;
}
