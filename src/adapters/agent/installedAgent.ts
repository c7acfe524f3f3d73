import { AgentEnvironment, TerminalCommand } from "../../types.js";

export type EnvSource = Record<string, string | undefined>;

/**
 * Contract between a benchmark harness and an agent it installs into the task
 * environment. The harness injects `environment()`, runs the install script,
 * then runs the commands under its own supervision.
 */
export interface InstalledAgent {
  /** Stable identifier used for lookup, e.g. "amazon-q-cli". */
  readonly id: string;
  /** Environment keys whose values must never be echoed back. */
  readonly secretEnvKeys: readonly string[];
  name(): string;
  environment(source?: EnvSource): AgentEnvironment;
  installScriptPath(): string;
  buildRunCommands(taskDescription: string): TerminalCommand[];
}
