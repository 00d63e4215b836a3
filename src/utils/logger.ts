/**
 * @fileoverview Prefixed console logger.
 *
 * Every component logs as `[Component] message`. Debug lines are printed only
 * when EPHEMERAL_DEPLOY_DEBUG=1.
 *
 * @module utils/logger
 */

import { DEBUG_ENV_VAR } from '../config/deploy-defaults.js';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function isDebugEnabled(): boolean {
  return process.env[DEBUG_ENV_VAR] === '1';
}

export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    debug(message, ...args) {
      if (isDebugEnabled()) console.log(`${prefix} ${message}`, ...args);
    },
    info(message, ...args) {
      console.log(`${prefix} ${message}`, ...args);
    },
    warn(message, ...args) {
      console.warn(`${prefix} ${message}`, ...args);
    },
    error(message, ...args) {
      console.error(`${prefix} ${message}`, ...args);
    },
  };
}
