/**
 * @fileoverview Deployment defaults and environment variable names.
 *
 * @module config/deploy-defaults
 */

import { fileURLToPath } from 'node:url';

// ============================================================================
// Remote runtime
// ============================================================================

/** Listener class used when no serverClass option is given */
export const DEFAULT_SERVER_CLASS = './server.mjs#TcpServer';

/** Service class used when no serviceClass option is given */
export const DEFAULT_SERVICE_CLASS = './services.mjs#EchoService';

/** Local code tree copied into the remote temp dir (the bundled remote/ directory) */
export const DEFAULT_CODE_DIR = fileURLToPath(new URL('../../remote', import.meta.url));

/** File name of the rendered bootstrap script inside the remote temp dir */
export const SERVER_SCRIPT_NAME = 'deployed-server.mjs';

/** Interpreter used when neither version-specific candidate resolves */
export const GENERIC_INTERPRETER = 'node';

/** How long the remote script waits for its listener to close (ms) */
export const LISTENER_JOIN_TIMEOUT_MS = 2000;

// ============================================================================
// Environment
// ============================================================================

/** Interpreter selector used when the caller passes none */
export const INTERPRETER_ENV_VAR = 'EPHEMERAL_DEPLOY_NODE';

/** Set to "1" to print debug log lines */
export const DEBUG_ENV_VAR = 'EPHEMERAL_DEPLOY_DEBUG';

// ============================================================================
// Event log
// ============================================================================

/** Event log size that triggers a trim */
export const EVENT_LOG_MAX_LINES = 10_000;

/** Entries kept after a trim */
export const EVENT_LOG_TRIM_TO = 8_000;
