/**
 * Shared test mocks: import from here instead of defining inline.
 *
 * @example
 * import { FakeTunnelMachine, answersWith } from './mocks/index.js';
 */

export {
  FakeCommand,
  FakeDirectMachine,
  FakeProcess,
  FakeTunnel,
  FakeTunnelMachine,
  answersWith,
  type FakeMachineOptions,
  type FakeProcessOptions,
} from './fake-machine.js';
export { createDeferred, echoRoundTrip } from './test-helpers.js';
