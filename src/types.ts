export type AgentEnvironment = Record<string, string>;

export type EventType = "PLAN_CREATED" | "PLAN_REJECTED";

/**
 * One shell invocation handed to the harness. The harness owns execution,
 * including killing the process once `maxTimeoutSec` elapses.
 */
export interface TerminalCommand {
  command: string;
  maxTimeoutSec: number;
  /** Whether the harness waits for the command to finish before moving on. */
  block: boolean;
}

export interface AgentSummary {
  id: string;
  name: string;
}

export interface RunPlan {
  planId: string;
  agentId: string;
  agentName: string;
  taskDescription: string;
  installScriptPath: string;
  /** Agent environment with secret values redacted. */
  env: AgentEnvironment;
  commands: TerminalCommand[];
  createdAt: string;
}

export interface AuditRecord {
  auditVersion: string;
  timestamp: string;
  planId: string;
  agentId: string;
  eventType: EventType;
  errorCode?: string;
  message?: string;
}
