/**
 * @fileoverview Tests for ChildProcessHandle and LocalCommand
 *
 * Spawns short-lived child Node.js processes (process.execPath).
 *
 * Port: N/A (no sockets)
 */

import { TimeoutExpiredError } from '../src/errors.js';
import { LocalCommand, spawnProcess } from '../src/process-handle.js';
import { registerCleanup } from './setup.js';

const node = process.execPath;

function runNode(source: string, options: { newSession?: boolean } = {}) {
  const proc = spawnProcess(node, ['-e', source], options);
  registerCleanup(() => proc.kill());
  return proc;
}

describe('ChildProcessHandle', () => {
  it('should read stdout line by line and remember what was consumed', async () => {
    const proc = runNode("process.stdout.write('first\\nsecond\\nrest')");

    expect(await proc.readLine()).toBe('first');
    expect(await proc.readLine()).toBe('second');
    expect(proc.consumedStdout.toString('utf-8')).toBe('first\nsecond\n');

    const { stdout } = await proc.communicate();
    expect(stdout.toString('utf-8')).toBe('rest');
    expect(proc.exitCode).toBe(0);
  });

  it('should return null when stdout ends before a newline', async () => {
    const proc = runNode("process.stdout.write('partial'); process.exit(4)");

    expect(await proc.readLine()).toBeNull();
    const { stdout } = await proc.communicate();
    expect(stdout.toString('utf-8')).toBe('partial');
    expect(proc.exitCode).toBe(4);
  });

  it('should collect stderr', async () => {
    const proc = runNode("process.stderr.write('oops')");

    const { stderr } = await proc.communicate();
    expect(stderr.toString('utf-8')).toBe('oops');
  });

  it('should drop buffered and later output after discardOutput()', async () => {
    const proc = runNode(
      "process.stdout.write('7000\\n'); setTimeout(() => { process.stdout.write('noise\\n'); process.stderr.write('more'); }, 50)"
    );

    expect(await proc.readLine()).toBe('7000');
    proc.discardOutput();

    expect(await proc.readLine()).toBeNull();
    const { stdout, stderr } = await proc.communicate();
    expect(stdout.length).toBe(0);
    expect(stderr.length).toBe(0);
    expect(proc.consumedStdout.length).toBe(0);
    expect(proc.exitCode).toBe(0);
  });

  it('should time out a bounded wait and allow a kill afterwards', async () => {
    const proc = runNode('setInterval(() => {}, 1000)');

    await expect(proc.communicate(50)).rejects.toBeInstanceOf(TimeoutExpiredError);
    expect(proc.closed).toBe(false);

    proc.kill();
    await proc.communicate();
    expect(proc.closed).toBe(true);
  });

  it('should stop a process group started in a new session', async () => {
    const proc = runNode("process.stdout.write('up\\n'); setInterval(() => {}, 1000)", { newSession: true });
    expect(await proc.readLine()).toBe('up');

    proc.terminate();
    await proc.communicate(5000);

    expect(proc.closed).toBe(true);
  });

  it('should report a failed spawn as closed', async () => {
    const proc = spawnProcess('/nonexistent/ephemeral-deploy-binary', []);

    const { stderr } = await proc.communicate(5000);

    expect(proc.pid).toBeUndefined();
    expect(stderr.toString('utf-8')).toContain('ENOENT');
  });
});

describe('LocalCommand', () => {
  it('should prepend its own arguments', async () => {
    const cmd = new LocalCommand([node, '-e']);
    const proc = cmd.spawn(["process.stdout.write(process.argv.slice(1).join(',') + '\\n')", 'a', 'b']);
    registerCleanup(() => proc.kill());

    expect(await proc.readLine()).toBe('a,b');
    expect(proc.argv).toEqual([node, '-e', "process.stdout.write(process.argv.slice(1).join(',') + '\\n')", 'a', 'b']);
  });

  it('should refuse an empty argv', () => {
    expect(() => new LocalCommand([])).toThrow('LocalCommand needs at least the executable');
  });
});
