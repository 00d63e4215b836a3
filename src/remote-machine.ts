/**
 * @fileoverview Remote Execution Host abstraction.
 *
 * A RemoteMachine stages files, resolves and spawns commands, and gives the
 * caller a way to reach a port on the remote side. Machines declare how that
 * port is reached through `connectivity`:
 *
 * - `'direct'`: the machine opens a raw socket to any remote port itself
 * - `'tunnel'`: the machine can only forward a local port to a remote one
 *
 * LocalMachine, SshMachine and Ssh2Machine implement this interface.
 *
 * @module remote-machine
 */

import type { Duplex } from 'node:stream';

/** Bytes a process wrote that nobody has consumed yet */
export interface ProcessOutput {
  stdout: Buffer;
  stderr: Buffer;
}

/**
 * Something that can be asked to stop and then waited on.
 * Processes, tunnel sessions and machine transports all look like this.
 */
export interface TransportSession {
  /** Ask politely (SIGTERM, channel end) */
  terminate(): void;
  /** Stop immediately (SIGKILL, socket destroy) */
  kill(): void;
  /**
   * Wait for exit and collect unread output.
   * Rejects with TimeoutExpiredError when `timeoutMs` is given and elapses.
   */
  communicate(timeoutMs?: number): Promise<ProcessOutput>;
}

export interface RemoteProcess extends TransportSession {
  readonly argv: readonly string[];
  readonly pid: number | undefined;
  /** Exit code once the process has exited, otherwise null */
  readonly exitCode: number | null;
  /**
   * Read one line from stdout, without its terminator.
   * Resolves null when stdout ends before a newline; a partial line at EOF
   * stays unread.
   */
  readLine(): Promise<string | null>;
  /** Bytes consumed by readLine() calls so far, terminators included */
  readonly consumedStdout: Buffer;
  /**
   * Stop keeping output: drop what is buffered and everything written later.
   * readLine() then resolves null and communicate() returns empty buffers.
   */
  discardOutput(): void;
}

export interface SpawnOptions {
  /** Detach from the parent's controlling terminal (new session/process group) */
  newSession?: boolean;
}

/** A command resolved on a particular machine */
export interface RemoteCommand {
  readonly argv: readonly string[];
  spawn(args: readonly string[], options?: SpawnOptions): RemoteProcess;
}

/** A scoped temporary directory on the remote host */
export interface RemoteTempDir {
  readonly path: string;
  /** Remove the directory recursively */
  remove(): Promise<void>;
}

/** A local port forwarded to a remote port */
export interface Tunnel {
  readonly localPort: number;
  readonly remotePort: number;
  /** The transport carrying the forward (e.g. the `ssh -L` process) */
  readonly session: TransportSession;
  close(): Promise<void>;
}

interface RemoteMachineBase {
  /** Human-readable identity, e.g. `deploy@10.0.0.5` */
  readonly name: string;
  /** The transport connection to the host */
  readonly session: TransportSession;
  tempDir(): Promise<RemoteTempDir>;
  /** Copy a local directory tree into an existing remote directory */
  upload(localDir: string, remoteDir: string): Promise<void>;
  writeFile(remotePath: string, content: string): Promise<void>;
  /** Join path segments the way the remote host expects */
  joinPath(...segments: string[]): string;
  /** Resolve a command by name; rejects with CommandNotFoundError */
  which(name: string): Promise<RemoteCommand>;
  close(): Promise<void>;
}

export interface DirectConnectable extends RemoteMachineBase {
  readonly connectivity: 'direct';
  connectSocket(remotePort: number): Promise<Duplex>;
}

export interface TunneledOnly extends RemoteMachineBase {
  readonly connectivity: 'tunnel';
  tunnel(localPort: number, remotePort: number): Promise<Tunnel>;
}

export type RemoteMachine = DirectConnectable | TunneledOnly;
