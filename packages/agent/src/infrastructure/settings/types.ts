/**
 * @fileoverview Settings types
 */

export interface ServerSettings {
  host: string;
  port: number;
  /** Interval between WebSocket pings; clients missing one pong are dropped */
  heartbeatIntervalMs: number;
  maxPayloadBytes: number;
}

export interface StorageSettings {
  /** SQLite file; ':memory:' keeps everything in process */
  dbPath: string;
}

export interface WorkspaceSettings {
  /** Root directory the local backend is confined to */
  root: string;
}

export interface ReasoningSettings {
  model: string;
  maxOutputTokens: number;
  /** Extended thinking budget; 0 disables thinking */
  thinkingBudgetTokens: number;
  contextWindowTokens: number;
}

export interface CompactionTierSettings {
  /** Fraction of the context budget at which the tier applies */
  threshold: number;
  /** Most recent turns kept verbatim */
  tailTurns: number;
}

export interface HistorySettings {
  summarize: CompactionTierSettings;
  summarizeAggressive: CompactionTierSettings;
  truncate: CompactionTierSettings;
  /** How many trailing turns the summary resolves pronoun referents from */
  referentWindowTurns: number;
}

export interface CheckpointSettings {
  maxRetained: number;
}

export interface RetrySettings {
  maxAttempts: number;
  repairAfterRepeats: number;
  abortAfterRepeats: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export interface OrchestratorSettings {
  maxIterations: number;
  /** Fraction of maxIterations after which the model is told to wrap up */
  wrapUpRatio: number;
  maxToolOutputChars: number;
  commandTimeoutMs: number;
  /** Delay between SIGTERM and SIGKILL for an aborted command */
  killGraceMs: number;
}

export interface GuidanceSettings {
  maxLength: number;
  cooldownMs: number;
}

export interface SessionSettings {
  defaultSessionId: string;
}

export interface TillerSettings {
  server: ServerSettings;
  storage: StorageSettings;
  workspace: WorkspaceSettings;
  reasoning: ReasoningSettings;
  history: HistorySettings;
  checkpoints: CheckpointSettings;
  retry: RetrySettings;
  orchestrator: OrchestratorSettings;
  guidance: GuidanceSettings;
  sessions: SessionSettings;
}

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export type UserSettings = DeepPartial<TillerSettings>;
