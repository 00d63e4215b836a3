/**
 * @fileoverview SshMachine - a remote host reached through the OpenSSH client.
 *
 * One `ssh -M -N` control master is the transport session; every command,
 * upload and file write multiplexes over its control socket. Ports are only
 * reachable through `ssh -L` forwards, so this machine is tunnel-only.
 *
 * @module machines/ssh-machine
 */

import { spawn } from 'node:child_process';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, posix } from 'node:path';
import { CommandNotFoundError, getErrorMessage, TimeoutExpiredError } from '../errors.js';
import { ChildProcessHandle, spawnProcess } from '../process-handle.js';
import type { RemoteCommand, RemoteTempDir, SpawnOptions, Tunnel, TunneledOnly } from '../remote-machine.js';
import { createLogger } from '../utils/logger.js';
import { connectLoopback } from '../utils/ports.js';
import { shellJoin, shellQuote } from '../utils/shell-quote.js';

const log = createLogger('SshMachine');

/** How long to wait for the control master or a forward to come up (ms) */
const READY_TIMEOUT_MS = 15_000;

/** Poll interval while waiting for readiness (ms) */
const READY_POLL_MS = 100;

export interface SshHostConfig {
  host: string;
  user?: string;
  port?: number;
  identityFile?: string;
  /** Extra `-o` style arguments passed to every ssh invocation */
  sshOptions?: string[];
  /** ssh ConnectTimeout in seconds (default: 10) */
  connectTimeoutSec?: number;
  /** ssh executable (default: "ssh") */
  sshPath?: string;
}

interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class SshCommand implements RemoteCommand {
  readonly argv: readonly string[];
  private readonly machine: SshMachine;

  constructor(machine: SshMachine, argv: readonly string[]) {
    this.machine = machine;
    this.argv = argv;
  }

  spawn(args: readonly string[], options: SpawnOptions = {}): ChildProcessHandle {
    return this.machine.spawnRemote([...this.argv, ...args], options);
  }
}

export class SshTunnel implements Tunnel {
  readonly localPort: number;
  readonly remotePort: number;
  readonly session: ChildProcessHandle;

  constructor(localPort: number, remotePort: number, session: ChildProcessHandle) {
    this.localPort = localPort;
    this.remotePort = remotePort;
    this.session = session;
  }

  async close(): Promise<void> {
    if (this.session.closed) return;
    this.session.terminate();
    await this.session.communicate();
  }
}

export class SshMachine implements TunneledOnly {
  readonly connectivity = 'tunnel' as const;
  readonly name: string;
  readonly session: ChildProcessHandle;

  private readonly config: SshHostConfig;
  private readonly controlDir: string;
  private readonly controlPath: string;
  private closed = false;

  private constructor(config: SshHostConfig, master: ChildProcessHandle, controlDir: string) {
    this.config = config;
    this.name = config.user ? `${config.user}@${config.host}` : config.host;
    this.session = master;
    this.controlDir = controlDir;
    this.controlPath = join(controlDir, 'ctl');
  }

  /**
   * Open the control master and wait until it accepts multiplexed sessions.
   */
  static async connect(config: SshHostConfig): Promise<SshMachine> {
    const controlDir = mkdtempSync(join(tmpdir(), 'ephemeral-deploy-ssh-'));
    const controlPath = join(controlDir, 'ctl');
    const master = spawnProcess(config.sshPath ?? 'ssh', [
      ...SshMachine.baseArgs(config),
      '-M',
      '-N',
      '-o',
      `ControlPath=${controlPath}`,
      '-o',
      'ControlPersist=no',
      SshMachine.target(config),
    ]);
    const machine = new SshMachine(config, master, controlDir);

    try {
      await machine.waitForMaster();
    } catch (err) {
      master.kill();
      const { stderr } = await master.communicate();
      rmSync(controlDir, { recursive: true, force: true });
      const detail = stderr.toString('utf-8').trim();
      throw new Error(`Failed to connect to ${machine.name}: ${getErrorMessage(err)}${detail ? ` (${detail})` : ''}`, {
        cause: err,
      });
    }
    log.info(`Connected to ${machine.name}`);
    return machine;
  }

  private static target(config: SshHostConfig): string {
    return config.user ? `${config.user}@${config.host}` : config.host;
  }

  private static baseArgs(config: SshHostConfig): string[] {
    const args = [
      '-o',
      'BatchMode=yes',
      '-o',
      `ConnectTimeout=${config.connectTimeoutSec ?? 10}`,
    ];
    if (config.port !== undefined) args.push('-p', String(config.port));
    if (config.identityFile) args.push('-i', config.identityFile);
    for (const opt of config.sshOptions ?? []) args.push('-o', opt);
    return args;
  }

  /** ssh arguments that route through the control socket */
  private muxArgs(): string[] {
    return [...SshMachine.baseArgs(this.config), '-o', `ControlPath=${this.controlPath}`];
  }

  private async waitForMaster(): Promise<void> {
    const deadline = Date.now() + READY_TIMEOUT_MS;
    while (Date.now() < deadline) {
      if (this.session.closed) {
        throw new Error(`ssh master exited with code ${this.session.exitCode ?? 'unknown'}`);
      }
      const check = await this.runLocal([...this.muxArgs(), '-O', 'check', SshMachine.target(this.config)]);
      if (check.exitCode === 0) return;
      await delay(READY_POLL_MS);
    }
    throw new TimeoutExpiredError(`ssh master for ${this.name}`, READY_TIMEOUT_MS);
  }

  /** Spawn `ssh` itself with the given arguments and collect its output */
  private async runLocal(args: string[], input?: string): Promise<CommandResult> {
    const proc = spawnProcess(this.config.sshPath ?? 'ssh', args);
    if (input !== undefined) proc.stdin?.end(input);
    const { stdout, stderr } = await proc.communicate();
    return { stdout: stdout.toString('utf-8'), stderr: stderr.toString('utf-8'), exitCode: proc.exitCode };
  }

  /** Run a shell command line on the remote host */
  async run(commandLine: string, input?: string): Promise<CommandResult> {
    return this.runLocal([...this.muxArgs(), SshMachine.target(this.config), commandLine], input);
  }

  private async runChecked(commandLine: string, input?: string): Promise<string> {
    const result = await this.run(commandLine, input);
    if (result.exitCode !== 0) {
      throw new Error(`"${commandLine}" failed on ${this.name} (exit ${result.exitCode}): ${result.stderr.trim()}`);
    }
    return result.stdout;
  }

  /** Spawn a long-running remote command; its stdio is carried by the ssh client */
  spawnRemote(argv: readonly string[], options: SpawnOptions = {}): ChildProcessHandle {
    return spawnProcess(
      this.config.sshPath ?? 'ssh',
      [...this.muxArgs(), SshMachine.target(this.config), shellJoin(argv)],
      options
    );
  }

  async tempDir(): Promise<RemoteTempDir> {
    const path = (await this.runChecked('mktemp -d')).trim();
    return {
      path,
      remove: async () => {
        await this.runChecked(`rm -rf -- ${shellQuote(path)}`);
      },
    };
  }

  /** Stream `tar` from the local tree into `tar -x` on the remote side */
  async upload(localDir: string, remoteDir: string): Promise<void> {
    const pack = spawn('tar', ['-C', localDir, '-cf', '-', '.'], { stdio: ['ignore', 'pipe', 'pipe'] });
    const unpack = this.spawnRemote(['tar', '-C', remoteDir, '-xf', '-']);
    const packHandle = new ChildProcessHandle(pack, ['tar', '-C', localDir, '-cf', '-', '.']);

    const stdin = unpack.stdin;
    if (!pack.stdout || !stdin) throw new Error('tar pipes are not available');
    pack.stdout.pipe(stdin);

    const [packed, unpacked] = await Promise.all([packHandle.communicate(), unpack.communicate()]);
    if (packHandle.exitCode !== 0) {
      throw new Error(`Local tar failed (exit ${packHandle.exitCode}): ${packed.stderr.toString('utf-8').trim()}`);
    }
    if (unpack.exitCode !== 0) {
      throw new Error(`Remote tar failed (exit ${unpack.exitCode}): ${unpacked.stderr.toString('utf-8').trim()}`);
    }
  }

  async writeFile(remotePath: string, content: string): Promise<void> {
    await this.runChecked(`cat > ${shellQuote(remotePath)}`, content);
  }

  joinPath(...segments: string[]): string {
    return posix.join(...segments);
  }

  async which(name: string): Promise<SshCommand> {
    const result = await this.run(`command -v ${shellQuote(name)}`);
    const path = result.stdout.trim().split('\n')[0] ?? '';
    if (result.exitCode !== 0 || !path) {
      throw new CommandNotFoundError(name, this.name);
    }
    return new SshCommand(this, [path]);
  }

  /**
   * Forward 127.0.0.1:localPort to 127.0.0.1:remotePort on the remote host.
   * The forward runs in its own ssh process, which is the tunnel's session.
   */
  async tunnel(localPort: number, remotePort: number): Promise<SshTunnel> {
    const proc = spawnProcess(this.config.sshPath ?? 'ssh', [
      ...SshMachine.baseArgs(this.config),
      '-N',
      '-o',
      'ExitOnForwardFailure=yes',
      '-L',
      `127.0.0.1:${localPort}:127.0.0.1:${remotePort}`,
      SshMachine.target(this.config),
    ]);
    const tunnel = new SshTunnel(localPort, remotePort, proc);

    const deadline = Date.now() + READY_TIMEOUT_MS;
    while (Date.now() < deadline) {
      if (proc.closed) {
        const { stderr } = await proc.communicate();
        throw new Error(`ssh tunnel to ${this.name}:${remotePort} exited: ${stderr.toString('utf-8').trim()}`);
      }
      try {
        const probe = await connectLoopback(localPort);
        probe.destroy();
        return tunnel;
      } catch {
        await delay(READY_POLL_MS);
      }
    }
    proc.kill();
    await proc.communicate();
    throw new TimeoutExpiredError(`tunnel ${localPort} → ${this.name}:${remotePort}`, READY_TIMEOUT_MS);
  }

  /** Ask the master to exit and remove the local control directory */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      if (!this.session.closed) {
        await this.runLocal([...this.muxArgs(), '-O', 'exit', SshMachine.target(this.config)]);
        this.session.terminate();
        await this.session.communicate();
      }
    } finally {
      rmSync(this.controlDir, { recursive: true, force: true });
    }
  }
}
