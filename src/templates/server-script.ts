/**
 * @fileoverview Bootstrap script template for the remote listener.
 *
 * The rendered script is an ES module run by `node` inside the remote temp
 * dir. It starts the injected listener class on 127.0.0.1:0, prints the chosen
 * port as a single line on stdout, and keeps running until its stdin ends.
 *
 * Placeholders replaced: $SERVER_MODULE$, $SERVER_CLASS$, $SERVICE_MODULE$,
 * $SERVICE_CLASS$, $EXTRA_SETUP$
 *
 * @module templates/server-script
 */

import { LISTENER_JOIN_TIMEOUT_MS } from '../config/deploy-defaults.js';
import { ScriptTemplateError } from '../errors.js';

export const PLACEHOLDERS = [
  '$SERVER_MODULE$',
  '$SERVER_CLASS$',
  '$SERVICE_MODULE$',
  '$SERVICE_CLASS$',
  '$EXTRA_SETUP$',
] as const;

export type Placeholder = (typeof PLACEHOLDERS)[number];

export const DEFAULT_SERVER_SCRIPT = `import { readdirSync, rmSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const here = dirname(fileURLToPath(import.meta.url));
process.chdir(here);

process.on('exit', () => {
  try {
    rmSync(here, { recursive: true, force: true });
  } catch {
    // already gone
  }
});

const purgeCaches = (dir) => {
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name === '.cache') rmSync(path, { recursive: true, force: true });
      else purgeCaches(path);
    } else if (entry.name.endsWith('.tsbuildinfo')) {
      rmSync(path, { force: true });
    }
  }
};
try {
  purgeCaches(here);
} catch {
  // stale caches only slow the import down
}

const { $SERVER_CLASS$: ServerCls } = await import('$SERVER_MODULE$');
const { $SERVICE_CLASS$: ServiceCls } = await import('$SERVICE_MODULE$');

let logger = undefined;
$EXTRA_SETUP$

const server = new ServerCls(ServiceCls, { hostname: '127.0.0.1', port: 0, logger });
await server.start();

process.stdout.write(\`\${server.port}\\n\`);

let stopping = false;
const shutdown = async () => {
  if (stopping) return;
  stopping = true;
  const joinTimeout = new Promise((resolve) => setTimeout(resolve, ${LISTENER_JOIN_TIMEOUT_MS}).unref());
  await Promise.race([server.close(), joinTimeout]);
  process.exit(0);
};
process.stdin.on('end', shutdown);
process.stdin.on('close', shutdown);
process.on('SIGTERM', shutdown);
process.on('SIGHUP', shutdown);
process.stdin.resume();
`;

/** A module specifier plus the name of one of its exports */
export interface ImplementationRef {
  module: string;
  name: string;
}

/**
 * Split `"./server.mjs#TcpServer"` into module and export name.
 * The last `#` separates them, since module specifiers contain dots.
 */
export function parseImplementationRef(ref: string): ImplementationRef {
  const idx = ref.lastIndexOf('#');
  const module = idx === -1 ? '' : ref.slice(0, idx);
  const name = idx === -1 ? '' : ref.slice(idx + 1);
  if (!module || !name) {
    throw new ScriptTemplateError(`Invalid implementation reference "${ref}" (expected "module#Export")`);
  }
  return { module, name };
}

export interface ScriptValues {
  serverModule: string;
  serverClass: string;
  serviceModule: string;
  serviceClass: string;
  extraSetup?: string;
}

/**
 * Fill every placeholder in `template` by literal text replacement.
 * Values are not escaped.
 */
export function renderServerScript(template: string, values: ScriptValues): string {
  const substitutions: Record<Placeholder, string> = {
    $SERVER_MODULE$: values.serverModule,
    $SERVER_CLASS$: values.serverClass,
    $SERVICE_MODULE$: values.serviceModule,
    $SERVICE_CLASS$: values.serviceClass,
    $EXTRA_SETUP$: values.extraSetup ?? '',
  };

  for (const token of PLACEHOLDERS) {
    if (!template.includes(token)) {
      throw new ScriptTemplateError(`Template is missing placeholder ${token}`);
    }
    const value = substitutions[token];
    const injected = PLACEHOLDERS.find((p) => value.includes(p));
    if (injected) {
      throw new ScriptTemplateError(`Value for ${token} contains placeholder ${injected}`);
    }
  }

  let script = template;
  for (const token of PLACEHOLDERS) {
    script = script.split(token).join(substitutions[token]);
  }
  return script;
}
