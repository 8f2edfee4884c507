/**
 * @witness-rotator/test-helpers: Test utilities for witness-rotator consumers.
 *
 * @packageDocumentation
 */

export { FakeNodeBackend } from './fake-node-backend.js'
export type { FakeNodeBackendOptions } from './fake-node-backend.js'
export { ScriptedProcessRunner, scriptWallet } from './scripted-runner.js'
export type {
  RecordedCall,
  CallMatcher,
  ScriptedReply,
  WalletScenario,
} from './scripted-runner.js'
