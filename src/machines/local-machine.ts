/**
 * @fileoverview LocalMachine - the provisioning host acting as its own remote.
 *
 * Useful for development and for exercising the full deployment lifecycle
 * without a network. Listener ports are reached directly on 127.0.0.1.
 *
 * @module machines/local-machine
 */

import { constants } from 'node:fs';
import { access, cp, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { delimiter, isAbsolute, join } from 'node:path';
import type { Duplex } from 'node:stream';
import { CommandNotFoundError } from '../errors.js';
import { LocalCommand } from '../process-handle.js';
import { connectLoopback } from '../utils/ports.js';
import type { DirectConnectable, ProcessOutput, RemoteTempDir, TransportSession } from '../remote-machine.js';

/** There is no transport to tear down for the local host */
class LocalSession implements TransportSession {
  terminate(): void {}
  kill(): void {}
  async communicate(): Promise<ProcessOutput> {
    return { stdout: Buffer.alloc(0), stderr: Buffer.alloc(0) };
  }
}

export interface LocalMachineOptions {
  /** Parent directory for temp dirs (default: os.tmpdir()) */
  tempRoot?: string;
  /** Environment for spawned commands (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export class LocalMachine implements DirectConnectable {
  readonly connectivity = 'direct' as const;
  readonly name = 'localhost';
  readonly session: TransportSession = new LocalSession();
  private readonly tempRoot: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: LocalMachineOptions = {}) {
    this.tempRoot = options.tempRoot ?? tmpdir();
    this.env = options.env ?? process.env;
  }

  async tempDir(): Promise<RemoteTempDir> {
    const path = await mkdtemp(join(this.tempRoot, 'ephemeral-deploy-'));
    return {
      path,
      remove: () => rm(path, { recursive: true, force: true }),
    };
  }

  async upload(localDir: string, remoteDir: string): Promise<void> {
    await cp(localDir, remoteDir, { recursive: true });
  }

  async writeFile(remotePath: string, content: string): Promise<void> {
    await writeFile(remotePath, content, 'utf-8');
  }

  joinPath(...segments: string[]): string {
    return join(...segments);
  }

  async which(name: string): Promise<LocalCommand> {
    const candidates = isAbsolute(name) || name.includes('/')
      ? [name]
      : (this.env.PATH ?? '').split(delimiter).filter(Boolean).map((dir) => join(dir, name));

    for (const candidate of candidates) {
      try {
        await access(candidate, constants.X_OK);
        return new LocalCommand([candidate], this.env);
      } catch {
        // not here, keep looking
      }
    }
    throw new CommandNotFoundError(name, this.name);
  }

  connectSocket(remotePort: number): Promise<Duplex> {
    return connectLoopback(remotePort);
  }

  async close(): Promise<void> {}
}
