/**
 * @fileoverview RemoteProcess implementations.
 *
 * BufferedProcess keeps stdout/stderr from the moment of spawn so that nothing
 * written before a reader attaches is lost. readLine() consumes stdout up to the
 * next newline; communicate() waits for the process to close and hands back
 * everything that was not consumed. discardOutput() ends all of that for a
 * long-lived process whose output nobody reads any more.
 *
 * ChildProcessHandle backs it with a local ChildProcess (LocalMachine, and the
 * ssh client processes of SshMachine). Ssh2Machine has its own channel-backed
 * subclass.
 *
 * @module process-handle
 */

import { spawn, type ChildProcess } from 'node:child_process';
import type { Writable } from 'node:stream';
import { TimeoutExpiredError } from './errors.js';
import type { ProcessOutput, RemoteCommand, RemoteProcess, SpawnOptions } from './remote-machine.js';

const NEWLINE = 0x0a;

export abstract class BufferedProcess implements RemoteProcess {
  readonly argv: readonly string[];

  private pendingStdout: Buffer = Buffer.alloc(0);
  private consumed: Buffer[] = [];
  private stderrChunks: Buffer[] = [];
  private stdoutEnded = false;
  private discarding = false;
  private waiters: Array<() => void> = [];

  private _exitCode: number | null = null;
  private _closed = false;
  private readonly resolveClosed: () => void;
  private readonly closedPromise: Promise<void>;

  protected constructor(argv: readonly string[]) {
    this.argv = argv;
    let resolveClosed: () => void = () => {};
    this.closedPromise = new Promise<void>((resolve) => {
      resolveClosed = resolve;
    });
    this.resolveClosed = resolveClosed;
  }

  abstract readonly pid: number | undefined;
  abstract terminate(): void;
  abstract kill(): void;

  get exitCode(): number | null {
    return this._exitCode;
  }

  /** True once the process has exited and its output streams are closed */
  get closed(): boolean {
    return this._closed;
  }

  get consumedStdout(): Buffer {
    return Buffer.concat(this.consumed);
  }

  async readLine(): Promise<string | null> {
    for (;;) {
      const idx = this.pendingStdout.indexOf(NEWLINE);
      if (idx !== -1) {
        const lineBytes = Buffer.from(this.pendingStdout.subarray(0, idx + 1));
        this.pendingStdout = this.pendingStdout.subarray(idx + 1);
        this.consumed.push(lineBytes);
        return lineBytes.subarray(0, idx).toString('utf-8');
      }
      if (this.stdoutEnded) return null;
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  discardOutput(): void {
    this.discarding = true;
    this.pendingStdout = Buffer.alloc(0);
    this.consumed = [];
    this.stderrChunks = [];
    this.endStdout();
  }

  async communicate(timeoutMs?: number): Promise<ProcessOutput> {
    if (timeoutMs === undefined) {
      await this.closedPromise;
    } else {
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new TimeoutExpiredError(`process ${this.pid ?? this.argv[0]} to exit`, timeoutMs)),
          timeoutMs
        );
      });
      try {
        await Promise.race([this.closedPromise, timeout]);
      } finally {
        clearTimeout(timer);
      }
    }
    return this.drain();
  }

  protected pushStdout(chunk: Buffer): void {
    if (this.discarding) return;
    this.pendingStdout = Buffer.concat([this.pendingStdout, chunk]);
    this.wake();
  }

  protected endStdout(): void {
    this.stdoutEnded = true;
    this.wake();
  }

  protected pushStderr(chunk: Buffer): void {
    if (this.discarding) return;
    this.stderrChunks.push(chunk);
  }

  protected markExited(code: number | null): void {
    this._exitCode = code;
  }

  protected markClosed(): void {
    if (this._closed) return;
    this._closed = true;
    this.endStdout();
    this.resolveClosed();
  }

  private drain(): ProcessOutput {
    const stdout = this.pendingStdout;
    const stderr = Buffer.concat(this.stderrChunks);
    this.pendingStdout = Buffer.alloc(0);
    this.stderrChunks = [];
    return { stdout, stderr };
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }
}

export class ChildProcessHandle extends BufferedProcess {
  private readonly child: ChildProcess;
  private readonly groupKill: boolean;

  constructor(child: ChildProcess, argv: readonly string[], options: { groupKill?: boolean } = {}) {
    super(argv);
    this.child = child;
    this.groupKill = options.groupKill ?? false;

    if (child.stdout) {
      child.stdout.on('data', (chunk: Buffer) => this.pushStdout(chunk));
      child.stdout.on('end', () => this.endStdout());
    } else {
      this.endStdout();
    }
    child.stderr?.on('data', (chunk: Buffer) => this.pushStderr(chunk));
    child.stdin?.on('error', (err) => {
      // EPIPE once the process is gone; keep it with the rest of stderr
      this.pushStderr(Buffer.from(`stdin: ${err.message}\n`));
    });

    child.on('exit', (code) => this.markExited(code));
    child.on('close', () => this.markClosed());
    child.on('error', (err) => {
      this.pushStderr(Buffer.from(`${err.message}\n`));
      // A failed spawn has no pid and may never emit 'close'
      if (child.pid === undefined) this.markClosed();
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  /** The underlying child's stdin, for callers that feed input */
  get stdin(): Writable | null {
    return this.child.stdin;
  }

  terminate(): void {
    if (this.closed) return;
    this.child.stdin?.end();
    this.signal('SIGTERM');
  }

  kill(): void {
    if (this.closed) return;
    this.signal('SIGKILL');
  }

  private signal(sig: NodeJS.Signals): void {
    const pid = this.child.pid;
    if (this.groupKill && pid !== undefined) {
      try {
        process.kill(-pid, sig);
        return;
      } catch {
        // Not a group leader (or already gone): fall back to the direct kill
      }
    }
    this.child.kill(sig);
  }
}

/**
 * Spawn a local program with piped stdio.
 * `newSession` detaches it into its own process group, which is then
 * signalled as a whole.
 */
export function spawnProcess(
  file: string,
  args: readonly string[],
  options: SpawnOptions & { cwd?: string; env?: NodeJS.ProcessEnv } = {}
): ChildProcessHandle {
  const child = spawn(file, [...args], {
    stdio: ['pipe', 'pipe', 'pipe'],
    detached: options.newSession ?? false,
    cwd: options.cwd,
    env: options.env,
  });
  return new ChildProcessHandle(child, [file, ...args], { groupKill: options.newSession ?? false });
}

/** A RemoteCommand backed by a local executable plus fixed leading arguments */
export class LocalCommand implements RemoteCommand {
  readonly argv: readonly string[];
  private readonly env?: NodeJS.ProcessEnv;

  constructor(argv: readonly string[], env?: NodeJS.ProcessEnv) {
    if (argv.length === 0) throw new Error('LocalCommand needs at least the executable');
    this.argv = argv;
    this.env = env;
  }

  spawn(args: readonly string[], options: SpawnOptions = {}): ChildProcessHandle {
    const [file, ...prefix] = this.argv;
    return spawnProcess(file, [...prefix, ...args], { ...options, env: this.env });
  }
}
