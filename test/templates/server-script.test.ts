/**
 * @fileoverview Tests for the bootstrap script template and renderer
 *
 * Port: N/A (pure string functions)
 */

import { ScriptTemplateError } from '../../src/errors.js';
import {
  DEFAULT_SERVER_SCRIPT,
  PLACEHOLDERS,
  parseImplementationRef,
  renderServerScript,
} from '../../src/templates/server-script.js';

const VALUES = {
  serverModule: './pkg/server.js',
  serverClass: 'Srv',
  serviceModule: './pkg/services.js',
  serviceClass: 'Svc',
};

describe('parseImplementationRef', () => {
  it('should split at the last #', () => {
    expect(parseImplementationRef('./server.mjs#TcpServer')).toEqual({ module: './server.mjs', name: 'TcpServer' });
    expect(parseImplementationRef('pkg#sub#Thing')).toEqual({ module: 'pkg#sub', name: 'Thing' });
  });

  it('should reject references without both halves', () => {
    expect(() => parseImplementationRef('TcpServer')).toThrow(ScriptTemplateError);
    expect(() => parseImplementationRef('#TcpServer')).toThrow(ScriptTemplateError);
    expect(() => parseImplementationRef('./server.mjs#')).toThrow(
      'Invalid implementation reference "./server.mjs#" (expected "module#Export")'
    );
  });
});

describe('renderServerScript', () => {
  it('should bind the injected classes in the default template', () => {
    const script = renderServerScript(DEFAULT_SERVER_SCRIPT, VALUES);

    expect(script).toContain("const { Srv: ServerCls } = await import('./pkg/server.js');");
    expect(script).toContain("const { Svc: ServiceCls } = await import('./pkg/services.js');");
    for (const token of PLACEHOLDERS) {
      expect(script).not.toContain(token);
    }
  });

  it('should print the port as a single line and listen on loopback port 0', () => {
    const script = renderServerScript(DEFAULT_SERVER_SCRIPT, VALUES);

    expect(script).toContain('process.stdout.write(`${server.port}\\n`);');
    expect(script).toContain("{ hostname: '127.0.0.1', port: 0, logger }");
    expect(script).toContain("process.stdin.on('end', shutdown);");
  });

  it('should insert extra setup verbatim and default it to empty', () => {
    const template = '$SERVER_MODULE$ $SERVER_CLASS$ $SERVICE_MODULE$ $SERVICE_CLASS$ [$EXTRA_SETUP$]';

    expect(renderServerScript(template, VALUES)).toBe('./pkg/server.js Srv ./pkg/services.js Svc []');
    expect(renderServerScript(template, { ...VALUES, extraSetup: "logger = { info() {} };" })).toBe(
      './pkg/server.js Srv ./pkg/services.js Svc [logger = { info() {} };]'
    );
  });

  it('should replace every occurrence of a placeholder', () => {
    const template = '$SERVER_CLASS$/$SERVER_CLASS$ $SERVER_MODULE$ $SERVICE_MODULE$ $SERVICE_CLASS$ $EXTRA_SETUP$';

    expect(renderServerScript(template, VALUES)).toBe('Srv/Srv ./pkg/server.js ./pkg/services.js Svc ');
  });

  it('should not escape substituted values', () => {
    const template = "'$SERVER_MODULE$' $SERVER_CLASS$ $SERVICE_MODULE$ $SERVICE_CLASS$ $EXTRA_SETUP$";

    expect(renderServerScript(template, { ...VALUES, serverModule: "it's" })).toBe("'it's' Srv ./pkg/services.js Svc ");
  });

  it('should reject a template missing a placeholder', () => {
    expect(() => renderServerScript('$SERVER_MODULE$ $SERVER_CLASS$', VALUES)).toThrow(
      'Template is missing placeholder $SERVICE_MODULE$'
    );
  });

  it('should reject values that carry placeholder tokens', () => {
    expect(() =>
      renderServerScript(DEFAULT_SERVER_SCRIPT, { ...VALUES, extraSetup: 'console.log("$SERVER_CLASS$")' })
    ).toThrow('Value for $EXTRA_SETUP$ contains placeholder $SERVER_CLASS$');
  });
});
