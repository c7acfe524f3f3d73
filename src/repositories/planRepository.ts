import { SqliteDb } from "../db.js";
import { AgentEnvironment, RunPlan, TerminalCommand } from "../types.js";

type PlanRow = {
  plan_id: string;
  agent_id: string;
  agent_name: string;
  task_description: string;
  install_script_path: string;
  env_json: string;
  commands_json: string;
  created_at: string;
};

export class PlanRepository {
  constructor(private readonly db: SqliteDb) {}

  create(plan: RunPlan): void {
    const stmt = this.db.prepare(`
      INSERT INTO run_plans (
        plan_id, agent_id, agent_name, task_description, install_script_path, env_json, commands_json, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
    stmt.run(
      plan.planId,
      plan.agentId,
      plan.agentName,
      plan.taskDescription,
      plan.installScriptPath,
      JSON.stringify(plan.env),
      JSON.stringify(plan.commands),
      plan.createdAt
    );
  }

  get(planId: string): RunPlan | null {
    const row = this.db
      .prepare("SELECT * FROM run_plans WHERE plan_id = ?")
      .get(planId) as PlanRow | undefined;
    return row ? this.toPlan(row) : null;
  }

  listRecent(limit: number): RunPlan[] {
    const rows = this.db
      .prepare("SELECT * FROM run_plans ORDER BY created_at DESC, rowid DESC LIMIT ?")
      .all(limit) as PlanRow[];
    return rows.map((row) => this.toPlan(row));
  }

  private toPlan(row: PlanRow): RunPlan {
    return {
      planId: row.plan_id,
      agentId: row.agent_id,
      agentName: row.agent_name,
      taskDescription: row.task_description,
      installScriptPath: row.install_script_path,
      env: parseEnv(row.env_json),
      commands: parseCommands(row.commands_json),
      createdAt: row.created_at
    };
  }
}

function parseEnv(raw: string): AgentEnvironment {
  const parsed = JSON.parse(raw) as Record<string, unknown>;
  const out: AgentEnvironment = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === "string") {
      out[key] = value;
    }
  }
  return out;
}

function parseCommands(raw: string): TerminalCommand[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    return [];
  }
  const out: TerminalCommand[] = [];
  for (const item of parsed) {
    if (!item || typeof item !== "object") {
      continue;
    }
    const candidate = item as Record<string, unknown>;
    if (
      typeof candidate.command === "string" &&
      typeof candidate.maxTimeoutSec === "number" &&
      typeof candidate.block === "boolean"
    ) {
      out.push({ command: candidate.command, maxTimeoutSec: candidate.maxTimeoutSec, block: candidate.block });
    }
  }
  return out;
}
