/**
 * @fileoverview Deployment lifecycle audit types
 *
 * The zod schema is the source of truth; lines read back from the event log
 * are validated against it.
 */

import { z } from 'zod';

export const DEPLOYMENT_EVENT_TYPES = [
  'created', // DeploymentSession object created
  'staged', // Temp dir created, code tree and script written
  'spawned', // Bootstrap script launched
  'handshake', // Port line read from stdout
  'tunnel_opened', // Local port forwarded to the remote listener
  'ready', // start() completed
  'start_failed', // start() rejected; resources left for close()
  'teardown_timeout', // A bounded wait in close() expired
  'closed', // close() finished releasing everything
] as const;

export const deploymentEventSchema = z.object({
  ts: z.number(),
  event: z.enum(DEPLOYMENT_EVENT_TYPES),
  deploymentId: z.string(),
  machine: z.string(),
  remotePort: z.number().int().optional(),
  localPort: z.number().int().optional(),
  reason: z.string().optional(),
  exitCode: z.number().int().nullable().optional(),
});

/** Types of deployment lifecycle events recorded to the audit log */
export type DeploymentEventType = (typeof DEPLOYMENT_EVENT_TYPES)[number];

/** A single entry in the deployment audit log */
export type DeploymentEvent = z.infer<typeof deploymentEventSchema>;
