/**
 * @fileoverview Agent module exports
 */

export { AgentSession, newSessionState, type AgentSessionOptions } from './session.js';
export {
  Orchestrator,
  abortableSleep,
  type OrchestratorOptions,
  type OrchestratorRunSettings,
  type TaskInput,
} from './orchestrator.js';
export {
  backoffDelay,
  consecutiveRepeats,
  decideRecovery,
  type FailureRecord,
  type RecoveryDecision,
  type RecoveryPolicy,
  type StepResult,
} from './recovery-policy.js';
export { ToolRunTracker, type ToolRun } from './tool-run-tracker.js';
export { GuidanceQueue, type GuidanceVerdict } from './guidance-queue.js';
