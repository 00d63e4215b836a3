/**
 * @fileoverview Ssh2Machine - a remote host driven through an in-process ssh2 Client.
 *
 * Commands run on exec channels, files travel over SFTP, and the deployed
 * listener is reached with a direct-tcpip channel per connection, so no local
 * port is ever bound. That makes this machine directly connectable.
 *
 * @module machines/ssh2-machine
 */

import { readdir } from 'node:fs/promises';
import { join, posix } from 'node:path';
import type { Duplex } from 'node:stream';
import ssh2 from 'ssh2';
import type { Client as SshClient, ClientChannel, ConnectConfig, SFTPWrapper } from 'ssh2';
import { CommandNotFoundError, TimeoutExpiredError, getErrorMessage } from '../errors.js';
import { BufferedProcess } from '../process-handle.js';
import type {
  DirectConnectable,
  ProcessOutput,
  RemoteCommand,
  RemoteTempDir,
  TransportSession,
} from '../remote-machine.js';
import { createLogger } from '../utils/logger.js';
import { shellJoin, shellQuote } from '../utils/shell-quote.js';

const { Client } = ssh2;

const log = createLogger('Ssh2Machine');

const DEFAULT_READY_TIMEOUT_MS = 30_000;

interface ExecResult {
  stdout: string;
  stderr: string;
  code: number | null;
}

// ========== Transport session ==========

/** The ssh2 connection itself, seen as a TransportSession */
export class Ssh2ClientSession implements TransportSession {
  private readonly client: SshClient;
  private closed = false;
  private readonly closedPromise: Promise<void>;

  constructor(client: SshClient) {
    this.client = client;
    this.closedPromise = new Promise<void>((resolve) => {
      client.once('close', () => {
        this.closed = true;
        resolve();
      });
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  terminate(): void {
    if (!this.closed) this.client.end();
  }

  kill(): void {
    if (!this.closed) this.client.destroy();
  }

  async communicate(timeoutMs?: number): Promise<ProcessOutput> {
    if (timeoutMs === undefined) {
      await this.closedPromise;
    } else {
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutExpiredError('ssh connection to close', timeoutMs)), timeoutMs);
      });
      try {
        await Promise.race([this.closedPromise, timeout]);
      } finally {
        clearTimeout(timer);
      }
    }
    return { stdout: Buffer.alloc(0), stderr: Buffer.alloc(0) };
  }
}

// ========== Remote processes ==========

/** A remote command running on an exec channel */
export class Ssh2ChannelProcess extends BufferedProcess {
  private channel: ClientChannel | null = null;
  private pendingSignal: 'TERM' | 'KILL' | null = null;

  constructor(client: SshClient, argv: readonly string[]) {
    super(argv);
    client.exec(shellJoin(argv), (err, channel) => {
      if (err) {
        this.pushStderr(Buffer.from(`${err.message}\n`));
        this.markClosed();
        return;
      }
      this.attach(channel);
    });
  }

  /** Remote pids are not reported over exec channels */
  get pid(): undefined {
    return undefined;
  }

  terminate(): void {
    if (this.closed) return;
    if (!this.channel) {
      this.pendingSignal = 'TERM';
      return;
    }
    this.channel.end();
    this.channel.signal('TERM');
  }

  kill(): void {
    if (this.closed) return;
    if (!this.channel) {
      this.pendingSignal = 'KILL';
      return;
    }
    this.channel.signal('KILL');
    this.channel.close();
  }

  private attach(channel: ClientChannel): void {
    this.channel = channel;
    channel.on('data', (chunk: Buffer) => this.pushStdout(chunk));
    channel.on('end', () => this.endStdout());
    channel.stderr.on('data', (chunk: Buffer) => this.pushStderr(chunk));
    channel.on('exit', (code: number | null) => this.markExited(typeof code === 'number' ? code : null));
    channel.on('close', () => this.markClosed());

    const pending = this.pendingSignal;
    this.pendingSignal = null;
    if (pending === 'TERM') this.terminate();
    if (pending === 'KILL') this.kill();
  }
}

export class Ssh2Command implements RemoteCommand {
  readonly argv: readonly string[];
  private readonly client: SshClient;

  constructor(client: SshClient, argv: readonly string[]) {
    this.client = client;
    this.argv = argv;
  }

  // Channels end with their client; there is no process group to detach into
  spawn(args: readonly string[]): Ssh2ChannelProcess {
    return new Ssh2ChannelProcess(this.client, [...this.argv, ...args]);
  }
}

// ========== Machine ==========

export class Ssh2Machine implements DirectConnectable {
  readonly connectivity = 'direct' as const;
  readonly name: string;
  readonly session: Ssh2ClientSession;

  private readonly client: SshClient;

  private constructor(name: string, client: SshClient) {
    this.name = name;
    this.client = client;
    this.session = new Ssh2ClientSession(client);
    client.on('error', (err: Error) => {
      log.warn(`Connection to ${name} reported: ${err.message}`);
    });
  }

  /** Open the connection and resolve once it is authenticated */
  static connect(config: ConnectConfig): Promise<Ssh2Machine> {
    const client = new Client();
    const name = `${config.username ? `${config.username}@` : ''}${config.host ?? 'localhost'}`;
    const readyTimeout = config.readyTimeout ?? DEFAULT_READY_TIMEOUT_MS;

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        client.end();
        reject(new TimeoutExpiredError(`ssh connection to ${name}`, readyTimeout));
      }, readyTimeout);

      client.once('ready', () => {
        clearTimeout(timeout);
        log.info(`Connected to ${name}`);
        resolve(new Ssh2Machine(name, client));
      });

      client.once('error', (err: Error) => {
        clearTimeout(timeout);
        reject(err);
      });

      client.connect({ keepaliveInterval: 10_000, ...config, readyTimeout });
    });
  }

  /** Run a command line to completion and collect its output */
  exec(commandLine: string): Promise<ExecResult> {
    return new Promise((resolve, reject) => {
      this.client.exec(commandLine, (err, stream) => {
        if (err) {
          reject(err);
          return;
        }
        let stdout = '';
        let stderr = '';
        let code: number | null = null;
        stream.on('data', (data: Buffer) => {
          stdout += data.toString();
        });
        stream.stderr.on('data', (data: Buffer) => {
          stderr += data.toString();
        });
        stream.on('exit', (exitCode: number | null) => {
          code = typeof exitCode === 'number' ? exitCode : null;
        });
        stream.on('close', () => resolve({ stdout, stderr, code }));
      });
    });
  }

  private async execChecked(commandLine: string): Promise<string> {
    const result = await this.exec(commandLine);
    if (result.code !== 0) {
      throw new Error(`"${commandLine}" failed on ${this.name} (exit ${result.code}): ${result.stderr.trim()}`);
    }
    return result.stdout;
  }

  private sftp(): Promise<SFTPWrapper> {
    return new Promise((resolve, reject) => {
      this.client.sftp((err, sftp) => {
        if (err) reject(err);
        else resolve(sftp);
      });
    });
  }

  async tempDir(): Promise<RemoteTempDir> {
    const path = (await this.execChecked('mktemp -d')).trim();
    return {
      path,
      remove: async () => {
        await this.execChecked(`rm -rf -- ${shellQuote(path)}`);
      },
    };
  }

  /** Copy a local directory tree file by file over SFTP */
  async upload(localDir: string, remoteDir: string): Promise<void> {
    const sftp = await this.sftp();
    try {
      await this.uploadTree(sftp, localDir, remoteDir);
    } finally {
      sftp.end();
    }
  }

  private async uploadTree(sftp: SFTPWrapper, localDir: string, remoteDir: string): Promise<void> {
    const entries = await readdir(localDir, { withFileTypes: true });
    for (const entry of entries) {
      const localPath = join(localDir, entry.name);
      const remotePath = posix.join(remoteDir, entry.name);
      if (entry.isDirectory()) {
        await new Promise<void>((resolve, reject) => {
          sftp.mkdir(remotePath, (err) => (err ? reject(err) : resolve()));
        });
        await this.uploadTree(sftp, localPath, remotePath);
      } else if (entry.isFile()) {
        await new Promise<void>((resolve, reject) => {
          sftp.fastPut(localPath, remotePath, (err) => (err ? reject(err) : resolve()));
        });
      }
    }
  }

  async writeFile(remotePath: string, content: string): Promise<void> {
    const sftp = await this.sftp();
    try {
      await new Promise<void>((resolve, reject) => {
        sftp.writeFile(remotePath, content, (err) => (err ? reject(err) : resolve()));
      });
    } finally {
      sftp.end();
    }
  }

  joinPath(...segments: string[]): string {
    return posix.join(...segments);
  }

  async which(name: string): Promise<Ssh2Command> {
    const result = await this.exec(`command -v ${shellQuote(name)}`);
    const path = result.stdout.trim().split('\n')[0] ?? '';
    if (result.code !== 0 || !path) {
      throw new CommandNotFoundError(name, this.name);
    }
    return new Ssh2Command(this.client, [path]);
  }

  /** A direct-tcpip channel to 127.0.0.1:port on the remote side */
  connectSocket(port: number): Promise<Duplex> {
    return new Promise((resolve, reject) => {
      this.client.forwardOut('127.0.0.1', 0, '127.0.0.1', port, (err, channel) => {
        if (err) {
          reject(new Error(`Cannot reach ${this.name}:${port}: ${getErrorMessage(err)}`, { cause: err }));
          return;
        }
        resolve(channel);
      });
    });
  }

  async close(): Promise<void> {
    if (this.session.isClosed) return;
    this.session.terminate();
    await this.session.communicate();
  }
}
