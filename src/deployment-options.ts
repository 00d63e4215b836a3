/**
 * @fileoverview Deployment options schema.
 *
 * Options are validated once per DeploymentSession and defaults are filled in
 * on a fresh object, so no two sessions share a mutable configuration value.
 *
 * @module deployment-options
 */

import { z } from 'zod';
import {
  DEFAULT_CODE_DIR,
  DEFAULT_SERVER_CLASS,
  DEFAULT_SERVICE_CLASS,
} from './config/deploy-defaults.js';
import { DeploymentEventLog } from './deployment-log.js';
import { InvalidOptionsError } from './errors.js';
import type { RemoteCommand } from './remote-machine.js';
import { DEFAULT_SERVER_SCRIPT } from './templates/server-script.js';

function isRemoteCommand(value: unknown): value is RemoteCommand {
  return (
    typeof value === 'object' &&
    value !== null &&
    'argv' in value &&
    Array.isArray(value.argv) &&
    'spawn' in value &&
    typeof value.spawn === 'function'
  );
}

/** "module#Export", both halves non-empty */
const implementationRefSchema = z
  .string()
  .regex(/^.+#[^#]+$/, { message: 'must look like "module#Export"' });

export const deploymentOptionsSchema = z.object({
  serverClass: implementationRefSchema.default(DEFAULT_SERVER_CLASS),
  serviceClass: implementationRefSchema.default(DEFAULT_SERVICE_CLASS),
  serverScript: z.string().min(1).default(DEFAULT_SERVER_SCRIPT),
  extraSetup: z.string().default(''),
  interpreter: z
    .union([
      z.string().min(1),
      z.custom<RemoteCommand>(isRemoteCommand, { message: 'must be a resolved command or a selector string' }),
    ])
    .optional(),
  codeDir: z.string().min(1).default(DEFAULT_CODE_DIR),
  handshakeTimeoutMs: z.number().int().positive().optional(),
  eventLog: z.instanceof(DeploymentEventLog).optional(),
});

/** What callers pass; every field is optional */
export type DeploymentOptions = z.input<typeof deploymentOptionsSchema>;

/** Options after defaults are applied */
export type ResolvedDeploymentOptions = z.output<typeof deploymentOptionsSchema>;

export function resolveDeploymentOptions(options: DeploymentOptions = {}): ResolvedDeploymentOptions {
  const result = deploymentOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new InvalidOptionsError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}
