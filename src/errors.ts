/**
 * @fileoverview Error taxonomy for staging, launching and tearing down deployments.
 *
 * Construction-time errors (staging, interpreter resolution, process launch)
 * propagate to the caller of start(). During teardown only TimeoutExpiredError
 * escapes; everything else is logged and swallowed by the session.
 *
 * @module errors
 */

/** Base class for every error raised by this package */
export class DeployError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Temp dir creation, code upload or script write failed */
export class StagingError extends DeployError {}

/** A template placeholder is missing, or an injected value carries one */
export class ScriptTemplateError extends DeployError {}

/** Deployment options failed schema validation */
export class InvalidOptionsError extends DeployError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid deployment options: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** A single command lookup on a machine failed */
export class CommandNotFoundError extends DeployError {
  readonly command: string;
  readonly machine: string;

  constructor(command: string, machine: string, options?: { cause?: unknown }) {
    super(`Command "${command}" not found on ${machine}`, options);
    this.command = command;
    this.machine = machine;
  }
}

/** Every interpreter candidate failed to resolve */
export class InterpreterNotFoundError extends DeployError {
  readonly candidates: string[];

  constructor(machine: string, candidates: string[]) {
    super(`No interpreter found on ${machine} (tried: ${candidates.join(', ')})`);
    this.candidates = candidates;
  }
}

/**
 * The spawned process failed to launch or broke the handshake.
 * `stdout` holds the bytes read before the failure followed by whatever
 * the process wrote afterwards.
 */
export class ProcessExecutionError extends DeployError {
  readonly argv: readonly string[];
  readonly exitCode: number | null;
  readonly stdout: Buffer;
  readonly stderr: Buffer;

  constructor(argv: readonly string[], exitCode: number | null, stdout: Buffer, stderr: Buffer) {
    const stderrText = stderr.toString('utf-8').trim();
    super(
      `Process ${JSON.stringify(argv.join(' '))} failed (exit code ${exitCode ?? 'unknown'})` +
        (stderrText ? `: ${stderrText}` : '')
    );
    this.argv = argv;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

/** A bounded wait expired */
export class TimeoutExpiredError extends DeployError {
  readonly timeoutMs: number;

  constructor(what: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for ${what}`);
    this.timeoutMs = timeoutMs;
  }
}

/** The operation is not valid for the session's current state */
export class DeploymentStateError extends DeployError {}

/** Render an unknown thrown value for log lines */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
