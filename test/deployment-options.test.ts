/**
 * @fileoverview Tests for deployment option validation and defaults
 *
 * Port: N/A (pure validation)
 */

import { DEFAULT_CODE_DIR, DEFAULT_SERVER_CLASS, DEFAULT_SERVICE_CLASS } from '../src/config/deploy-defaults.js';
import { resolveDeploymentOptions } from '../src/deployment-options.js';
import { InvalidOptionsError } from '../src/errors.js';
import { DEFAULT_SERVER_SCRIPT } from '../src/templates/server-script.js';
import { FakeCommand, FakeProcess } from './mocks/index.js';

describe('resolveDeploymentOptions', () => {
  it('should fill in defaults', () => {
    const options = resolveDeploymentOptions();

    expect(options.serverClass).toBe(DEFAULT_SERVER_CLASS);
    expect(options.serviceClass).toBe(DEFAULT_SERVICE_CLASS);
    expect(options.serverScript).toBe(DEFAULT_SERVER_SCRIPT);
    expect(options.extraSetup).toBe('');
    expect(options.codeDir).toBe(DEFAULT_CODE_DIR);
    expect(options.interpreter).toBeUndefined();
    expect(options.handshakeTimeoutMs).toBeUndefined();
  });

  it('should return a fresh object each time', () => {
    const input = { extraSetup: 'logger = console;' };

    const first = resolveDeploymentOptions(input);
    const second = resolveDeploymentOptions(input);

    expect(first).not.toBe(second);
    expect(first).not.toBe(input);
  });

  it('should keep a resolved interpreter command by identity', () => {
    const command = new FakeCommand(['/opt/node'], (argv) => new FakeProcess(argv));

    expect(resolveDeploymentOptions({ interpreter: command }).interpreter).toBe(command);
  });

  it('should reject malformed implementation references', () => {
    expect(() => resolveDeploymentOptions({ serverClass: 'TcpServer' })).toThrow(InvalidOptionsError);
    expect(() => resolveDeploymentOptions({ serviceClass: './services.mjs#' })).toThrow(
      'Invalid deployment options: serviceClass: must look like "module#Export"'
    );
  });

  it('should list every issue', () => {
    try {
      resolveDeploymentOptions({ serverClass: 'x', handshakeTimeoutMs: -5 });
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidOptionsError);
      if (!(err instanceof InvalidOptionsError)) throw err;
      expect(err.issues).toHaveLength(2);
      expect(err.issues[0]).toBe('serverClass: must look like "module#Export"');
      expect(err.issues[1]).toMatch(/^handshakeTimeoutMs: /);
    }
  });
});
