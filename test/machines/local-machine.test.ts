/**
 * @fileoverview Tests for LocalMachine, including a full deployment
 * round trip against the stock remote code tree.
 *
 * Port: ephemeral (the deployed listener binds 127.0.0.1:0)
 */

import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DeploymentSession } from '../../src/deployment-session.js';
import { CommandNotFoundError } from '../../src/errors.js';
import { LocalMachine } from '../../src/machines/local-machine.js';
import { LocalCommand } from '../../src/process-handle.js';
import { echoRoundTrip } from '../mocks/index.js';
import { registerCleanup } from '../setup.js';

function scratchDir(): string {
  const dir = mkdtempSync(join(tmpdir(), 'local-machine-'));
  registerCleanup(() => rmSync(dir, { recursive: true, force: true }));
  return dir;
}

describe('LocalMachine', () => {
  it('should create and remove temp dirs under the configured root', async () => {
    const root = scratchDir();
    const machine = new LocalMachine({ tempRoot: root });

    const dir = await machine.tempDir();
    expect(dir.path.startsWith(join(root, 'ephemeral-deploy-'))).toBe(true);
    expect(existsSync(dir.path)).toBe(true);

    await dir.remove();
    expect(existsSync(dir.path)).toBe(false);
  });

  it('should copy a directory tree and write files', async () => {
    const src = scratchDir();
    mkdirSync(join(src, 'lib'));
    writeFileSync(join(src, 'lib', 'a.mjs'), 'export const a = 1;\n');
    const machine = new LocalMachine();
    const dest = await machine.tempDir();
    registerCleanup(() => dest.remove());

    await machine.upload(src, dest.path);
    await machine.writeFile(machine.joinPath(dest.path, 'b.txt'), 'hello');

    expect(readFileSync(join(dest.path, 'lib', 'a.mjs'), 'utf-8')).toBe('export const a = 1;\n');
    expect(readFileSync(join(dest.path, 'b.txt'), 'utf-8')).toBe('hello');
  });

  it('should find executables by path or by PATH lookup', async () => {
    const machine = new LocalMachine();

    expect((await machine.which(process.execPath)).argv).toEqual([process.execPath]);
    await expect(machine.which('ephemeral-deploy-no-such-command')).rejects.toBeInstanceOf(CommandNotFoundError);
  });

  it('should search the PATH it was given', async () => {
    const bin = scratchDir();
    writeFileSync(join(bin, 'fake-node'), '#!/bin/sh\n', { mode: 0o755 });
    const machine = new LocalMachine({ env: { PATH: bin } });

    expect((await machine.which('fake-node')).argv).toEqual([join(bin, 'fake-node')]);
  });

  it('should deploy the echo listener, serve a connection and clean up', async () => {
    const root = scratchDir();
    const machine = new LocalMachine({ tempRoot: root });
    const session = new DeploymentSession(machine, {
      interpreter: new LocalCommand([process.execPath]),
      handshakeTimeoutMs: 15_000,
    });
    registerCleanup(() => session.close(5000));

    await session.start();
    expect(session.mode).toBe('direct');
    expect(session.remotePort).toEqual(expect.any(Number));
    expect(session.localPort).toBeNull();

    const conn = await session.connect();
    expect(await echoRoundTrip(conn.stream, 'hello over loopback')).toBe('hello over loopback');
    conn.close();

    await session.close(5000);
    expect(session.state).toBe('closed');
    expect(readdirSync(root)).toEqual([]);
  });
});
