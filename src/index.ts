/**
 * @fileoverview Public entry point.
 *
 * Deploy a throwaway listener to one machine (DeploymentSession) or several
 * (DeploymentGroup), connect to it, and tear everything down again.
 *
 * @module index
 */

export {
  DeploymentSession,
  parsePortLine,
  withDeployment,
  type ConnectionMode,
  type DeploymentState,
} from './deployment-session.js';
export { DeploymentGroup, deployGroup } from './deployment-group.js';
export {
  deploymentOptionsSchema,
  resolveDeploymentOptions,
  type DeploymentOptions,
  type ResolvedDeploymentOptions,
} from './deployment-options.js';
export {
  ClassicService,
  DeploymentConnection,
  VoidService,
  type ConnectOptions,
  type ConnectionConfig,
  type Service,
  type ServiceFactory,
} from './connection.js';
export { DeploymentEventLog } from './deployment-log.js';
export type { DeploymentEvent, DeploymentEventType } from './types/lifecycle.js';

export {
  DEFAULT_SERVER_SCRIPT,
  PLACEHOLDERS,
  parseImplementationRef,
  renderServerScript,
  type ImplementationRef,
  type Placeholder,
  type ScriptValues,
} from './templates/server-script.js';
export {
  DEFAULT_CODE_DIR,
  DEFAULT_SERVER_CLASS,
  DEFAULT_SERVICE_CLASS,
} from './config/deploy-defaults.js';

export type {
  DirectConnectable,
  ProcessOutput,
  RemoteCommand,
  RemoteMachine,
  RemoteProcess,
  RemoteTempDir,
  SpawnOptions,
  TransportSession,
  Tunnel,
  TunneledOnly,
} from './remote-machine.js';
export { BufferedProcess, ChildProcessHandle, LocalCommand, spawnProcess } from './process-handle.js';
export { LocalMachine, type LocalMachineOptions } from './machines/local-machine.js';
export { SshMachine, type SshHostConfig } from './machines/ssh-machine.js';
export { Ssh2ChannelProcess, Ssh2Machine } from './machines/ssh2-machine.js';
export { interpreterCandidates, resolveInterpreter } from './utils/interpreter-resolver.js';

export {
  CommandNotFoundError,
  DeployError,
  DeploymentStateError,
  InterpreterNotFoundError,
  InvalidOptionsError,
  ProcessExecutionError,
  ScriptTemplateError,
  StagingError,
  TimeoutExpiredError,
  getErrorMessage,
} from './errors.js';
