/**
 * @fileoverview Remote interpreter selection.
 *
 * Picks the command that runs the bootstrap script. An explicit command or
 * selector wins; otherwise candidates are probed in order of closeness to the
 * local Node.js version, ending with the generic `node`.
 *
 * @module utils/interpreter-resolver
 */

import { GENERIC_INTERPRETER, INTERPRETER_ENV_VAR } from '../config/deploy-defaults.js';
import { CommandNotFoundError, InterpreterNotFoundError } from '../errors.js';
import type { RemoteCommand, RemoteMachine } from '../remote-machine.js';
import { createLogger } from './logger.js';

const log = createLogger('InterpreterResolver');

/**
 * Candidate names for a given local version, most specific first:
 * `node20.11`, `node20`, `node`.
 */
export function interpreterCandidates(nodeVersion: string = process.versions.node): string[] {
  const [major, minor] = nodeVersion.split('.');
  return [`node${major}.${minor}`, `node${major}`, GENERIC_INTERPRETER];
}

/**
 * Resolve the interpreter on `machine`.
 *
 * @param explicit - A resolved command (used as-is) or a selector name
 */
export async function resolveInterpreter(
  machine: RemoteMachine,
  explicit?: RemoteCommand | string
): Promise<RemoteCommand> {
  if (explicit !== undefined && typeof explicit !== 'string') return explicit;

  const selector = explicit ?? process.env[INTERPRETER_ENV_VAR];
  if (selector) {
    return machine.which(selector);
  }

  const candidates = interpreterCandidates();
  for (const name of candidates) {
    try {
      const cmd = await machine.which(name);
      log.debug(`Using ${name} on ${machine.name}`);
      return cmd;
    } catch (err) {
      if (!(err instanceof CommandNotFoundError)) throw err;
      log.debug(`${name} not found on ${machine.name}`);
    }
  }
  throw new InterpreterNotFoundError(machine.name, candidates);
}
