/**
 * @fileoverview DeploymentSession - one short-lived listener on one remote machine.
 *
 * start() acquires, in order: a remote temp dir, a copy of the code tree, the
 * rendered bootstrap script, an interpreter, the spawned script, its port
 * (read from the first stdout line) and, for tunnel-only machines, a local
 * forward to that port. Each resource is stored on the session before the next
 * step runs, so a failed start() leaves everything it got reachable by close().
 *
 * close() is the only release path. It walks process → tunnel → machine
 * transport → temp dir, clearing each slot whatever happens. A bounded wait
 * that expires force-kills the resource and rethrows TimeoutExpiredError;
 * every other release error is logged and ignored.
 *
 * Lifecycle states:
 *   CREATED → STARTING → READY → CLOSED
 *                      ↘ FAILED → CLOSED
 *
 * @module deployment-session
 */

import type { Duplex } from 'node:stream';
import { v4 as uuidv4 } from 'uuid';
import { SERVER_SCRIPT_NAME } from './config/deploy-defaults.js';
import { ClassicService, DeploymentConnection, type ConnectOptions } from './connection.js';
import {
  resolveDeploymentOptions,
  type DeploymentOptions,
  type ResolvedDeploymentOptions,
} from './deployment-options.js';
import {
  DeploymentStateError,
  ProcessExecutionError,
  ScriptTemplateError,
  StagingError,
  TimeoutExpiredError,
  getErrorMessage,
} from './errors.js';
import type { RemoteMachine, RemoteProcess, RemoteTempDir, TransportSession, Tunnel } from './remote-machine.js';
import { parseImplementationRef, renderServerScript } from './templates/server-script.js';
import type { DeploymentEvent } from './types/lifecycle.js';
import { connectLoopback, getFreePort } from './utils/ports.js';
import { resolveInterpreter } from './utils/interpreter-resolver.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('DeploymentSession');

export type DeploymentState = 'created' | 'starting' | 'ready' | 'failed' | 'closed';

export type ConnectionMode = 'direct' | 'tunnel';

const MAX_PORT = 65_535;

/**
 * Parse a handshake line. Returns null unless the trimmed line is a plain
 * decimal port number.
 */
export function parsePortLine(line: string | null): number | null {
  if (line === null) return null;
  const trimmed = line.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const port = Number(trimmed);
  return port <= MAX_PORT ? port : null;
}

export class DeploymentSession {
  readonly id: string;
  readonly machineName: string;
  readonly mode: ConnectionMode;

  private machine: RemoteMachine | null;
  private readonly options: ResolvedDeploymentOptions;

  private tempDir: RemoteTempDir | null = null;
  private process: RemoteProcess | null = null;
  private tunnel: Tunnel | null = null;

  private _remotePort: number | null = null;
  private _localPort: number | null = null;
  private _state: DeploymentState = 'created';

  constructor(machine: RemoteMachine, options: DeploymentOptions = {}) {
    this.options = resolveDeploymentOptions(options);
    this.id = uuidv4();
    this.machine = machine;
    this.machineName = machine.name;
    this.mode = machine.connectivity;
    this.record({ event: 'created' });
  }

  get state(): DeploymentState {
    return this._state;
  }

  /** Port the remote listener reported; null before the handshake */
  get remotePort(): number | null {
    return this._remotePort;
  }

  /** Local end of the tunnel; always null in direct mode */
  get localPort(): number | null {
    return this._localPort;
  }

  /** Whether any resource is still held */
  get holdsResources(): boolean {
    return this.process !== null || this.tunnel !== null || this.machine !== null || this.tempDir !== null;
  }

  /**
   * Stage, launch and expose the listener.
   * On failure the session moves to 'failed'; call close() to release what
   * was acquired.
   */
  async start(): Promise<this> {
    if (this._state !== 'created') {
      throw new DeploymentStateError(`Cannot start deployment ${this.id} in state '${this._state}'`);
    }
    this._state = 'starting';
    try {
      await this.acquire();
    } catch (err) {
      this._state = 'failed';
      this.record({
        event: 'start_failed',
        reason: getErrorMessage(err),
        exitCode: err instanceof ProcessExecutionError ? err.exitCode : undefined,
      });
      throw err;
    }
    this._state = 'ready';
    this.record({ event: 'ready', remotePort: this._remotePort ?? undefined, localPort: this._localPort ?? undefined });
    log.info(
      `Deployment ${this.id} ready on ${this.machineName}: remote port ${this._remotePort}` +
        (this._localPort !== null ? `, local port ${this._localPort}` : ' (direct)')
    );
    return this;
  }

  private async acquire(): Promise<void> {
    const machine = this.requireMachine();
    const { options } = this;

    let scriptPath: string;
    try {
      this.tempDir = await machine.tempDir();
      await machine.upload(options.codeDir, this.tempDir.path);

      const server = parseImplementationRef(options.serverClass);
      const service = parseImplementationRef(options.serviceClass);
      const script = renderServerScript(options.serverScript, {
        serverModule: server.module,
        serverClass: server.name,
        serviceModule: service.module,
        serviceClass: service.name,
        extraSetup: options.extraSetup,
      });
      scriptPath = machine.joinPath(this.tempDir.path, SERVER_SCRIPT_NAME);
      await machine.writeFile(scriptPath, script);
    } catch (err) {
      if (err instanceof ScriptTemplateError) throw err;
      throw new StagingError(`Failed to stage deployment on ${machine.name}: ${getErrorMessage(err)}`, {
        cause: err,
      });
    }
    this.record({ event: 'staged' });

    const interpreter = await resolveInterpreter(machine, options.interpreter);
    try {
      this.process = interpreter.spawn([scriptPath], { newSession: true });
    } catch (err) {
      throw new ProcessExecutionError(
        [...interpreter.argv, scriptPath],
        null,
        Buffer.alloc(0),
        Buffer.from(getErrorMessage(err))
      );
    }
    this.record({ event: 'spawned' });

    // The listener port is only ever reported on stdout, so direct mode reads it too
    this._remotePort = await this.handshake(this.process);
    this.record({ event: 'handshake', remotePort: this._remotePort });
    // Nothing reads the listener's output after the port line
    this.process.discardOutput();

    if (machine.connectivity === 'direct') {
      this._localPort = null;
      return;
    }

    this._localPort = await getFreePort();
    this.tunnel = await machine.tunnel(this._localPort, this._remotePort);
    this.record({ event: 'tunnel_opened', remotePort: this._remotePort, localPort: this._localPort });
  }

  /**
   * Read the port line. On any failure the process is terminated, drained,
   * and reported with everything it wrote.
   */
  private async handshake(proc: RemoteProcess): Promise<number> {
    try {
      const port = parsePortLine(await this.readHandshakeLine(proc));
      if (port !== null) return port;
    } catch (err) {
      log.debug(`Handshake read failed for ${this.id}: ${getErrorMessage(err)}`);
    }

    try {
      proc.terminate();
    } catch (err) {
      log.debug(`Terminate after failed handshake: ${getErrorMessage(err)}`);
    }
    const rest = await this.drainAfterHandshake(proc);
    throw new ProcessExecutionError(
      proc.argv,
      proc.exitCode,
      Buffer.concat([proc.consumedStdout, rest.stdout]),
      rest.stderr
    );
  }

  private readHandshakeLine(proc: RemoteProcess): Promise<string | null> {
    const timeoutMs = this.options.handshakeTimeoutMs;
    if (timeoutMs === undefined) return proc.readLine();

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TimeoutExpiredError('the port handshake', timeoutMs)), timeoutMs);
    });
    return Promise.race([proc.readLine(), timeout]).finally(() => clearTimeout(timer));
  }

  private async drainAfterHandshake(proc: RemoteProcess): Promise<{ stdout: Buffer; stderr: Buffer }> {
    const timeoutMs = this.options.handshakeTimeoutMs;
    if (timeoutMs === undefined) return proc.communicate();
    try {
      return await proc.communicate(timeoutMs);
    } catch (err) {
      if (!(err instanceof TimeoutExpiredError)) throw err;
      proc.kill();
      return proc.communicate();
    }
  }

  // ========== Connections ==========

  /**
   * A raw byte stream to the deployed listener.
   * Direct mode connects to the remote port read in the handshake; start()
   * reads that line in both modes because stdout is the only place the
   * listener reports its port.
   */
  async connectSocket(): Promise<Duplex> {
    const machine = this.machine;
    const remotePort = this._remotePort;
    if (this._state !== 'ready' || machine === null || remotePort === null) {
      throw new DeploymentStateError(`Deployment ${this.id} is not ready (state '${this._state}')`);
    }
    if (machine.connectivity === 'direct') {
      return machine.connectSocket(remotePort);
    }
    if (this._localPort === null) {
      throw new DeploymentStateError(`Deployment ${this.id} has no tunnel`);
    }
    return connectLoopback(this._localPort);
  }

  /** Connect and present `service` (VoidService unless given) with a fresh config */
  async connect(options: ConnectOptions = {}): Promise<DeploymentConnection> {
    return new DeploymentConnection(await this.connectSocket(), options);
  }

  async classicConnect(): Promise<DeploymentConnection> {
    return this.connect({ service: ClassicService });
  }

  // ========== Teardown ==========

  /**
   * Release every held resource. Safe to call repeatedly and after a failed
   * start(). `timeoutMs` bounds each individual wait.
   */
  async close(timeoutMs?: number): Promise<void> {
    if (this.process) {
      const proc = this.process;
      try {
        await this.releaseStep('process', () => proc.kill(), () => stopSession(proc, timeoutMs));
      } finally {
        this.process = null;
      }
    }

    if (this.tunnel) {
      const tunnel = this.tunnel;
      try {
        await this.releaseStep('tunnel session', () => tunnel.session.kill(), () =>
          stopSession(tunnel.session, timeoutMs)
        );
        await this.releaseStep('tunnel', null, () => tunnel.close());
      } finally {
        this.tunnel = null;
      }
    }

    if (this.machine) {
      const machine = this.machine;
      try {
        await this.releaseStep('machine session', () => machine.session.kill(), () =>
          stopSession(machine.session, timeoutMs)
        );
        await this.releaseStep('machine', null, () => machine.close());
      } finally {
        this.machine = null;
      }
    }

    if (this.tempDir) {
      const tempDir = this.tempDir;
      try {
        await this.releaseStep('temp dir', null, () => tempDir.remove());
      } finally {
        this.tempDir = null;
      }
    }

    if (this._state !== 'closed') {
      this._state = 'closed';
      this.record({ event: 'closed' });
      log.debug(`Deployment ${this.id} closed`);
    }
  }

  private async releaseStep(
    label: string,
    forceKill: (() => void) | null,
    step: () => Promise<unknown>
  ): Promise<void> {
    try {
      await step();
    } catch (err) {
      if (err instanceof TimeoutExpiredError) {
        log.warn(`${label} of ${this.id} did not stop within ${err.timeoutMs}ms, killing`);
        try {
          forceKill?.();
        } catch (killErr) {
          log.warn(`Force-kill of ${label} failed: ${getErrorMessage(killErr)}`);
        }
        this.record({ event: 'teardown_timeout', reason: label });
        throw err;
      }
      log.warn(`Ignoring error while releasing ${label} of ${this.id}: ${getErrorMessage(err)}`);
    }
  }

  private requireMachine(): RemoteMachine {
    if (!this.machine) {
      throw new DeploymentStateError(`Deployment ${this.id} has already released its machine`);
    }
    return this.machine;
  }

  private record(entry: Omit<DeploymentEvent, 'ts' | 'deploymentId' | 'machine'>): void {
    this.options.eventLog?.record({ deploymentId: this.id, machine: this.machineName, ...entry });
  }
}

/** Ask a session to stop, then wait for it (bounded when `timeoutMs` is set) */
async function stopSession(session: TransportSession, timeoutMs?: number): Promise<void> {
  session.terminate();
  await session.communicate(timeoutMs);
}

/**
 * Deploy on `machine`, run `fn`, and close the session on every exit path.
 * When start() or `fn` has already failed, that error is the one thrown; a
 * close() failure on top of it is only logged.
 */
export async function withDeployment<T>(
  machine: RemoteMachine,
  options: DeploymentOptions,
  fn: (session: DeploymentSession) => Promise<T> | T,
  closeTimeoutMs?: number
): Promise<T> {
  const session = new DeploymentSession(machine, options);
  let result: T;
  try {
    await session.start();
    result = await fn(session);
  } catch (err) {
    try {
      await session.close(closeTimeoutMs);
    } catch (closeErr) {
      log.warn(`Closing deployment ${session.id} after a failure also failed: ${getErrorMessage(closeErr)}`);
    }
    throw err;
  }
  await session.close(closeTimeoutMs);
  return result;
}
