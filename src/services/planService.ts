import { randomUUID } from "node:crypto";
import { EnvSource, InstalledAgent } from "../adapters/agent/installedAgent.js";
import { AgentRegistry } from "../adapters/agent/registry.js";
import { PlanRepository } from "../repositories/planRepository.js";
import { AgentEnvironment, AgentSummary, RunPlan } from "../types.js";
import { AuditLogger } from "./auditLogger.js";

export const REDACTED = "***";
const DEFAULT_LIST_LIMIT = 20;

function nowIso(): string {
  return new Date().toISOString();
}

export function newPlanId(): string {
  return `plan_${randomUUID().replace(/-/g, "").slice(0, 16)}`;
}

export class PlanServiceError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: "VALIDATION_ERROR" | "AGENT_NOT_FOUND" | "PLAN_NOT_FOUND"
  ) {
    super(message);
  }
}

/** Empty values stay empty so callers can still tell an unset variable apart. */
export function redactEnvironment(env: AgentEnvironment, secretKeys: readonly string[]): AgentEnvironment {
  const secrets = new Set(secretKeys);
  const out: AgentEnvironment = {};
  for (const [key, value] of Object.entries(env)) {
    out[key] = secrets.has(key) && value !== "" ? REDACTED : value;
  }
  return out;
}

export function buildRunPlan(
  agent: InstalledAgent,
  taskDescription: string,
  source: EnvSource = process.env,
  planId = newPlanId()
): RunPlan {
  return {
    planId,
    agentId: agent.id,
    agentName: agent.name(),
    taskDescription,
    installScriptPath: agent.installScriptPath(),
    env: redactEnvironment(agent.environment(source), agent.secretEnvKeys),
    commands: agent.buildRunCommands(taskDescription),
    createdAt: nowIso()
  };
}

export interface PlanServiceOptions {
  maxListLimit: number;
  envSource?: () => EnvSource;
}

export class PlanService {
  constructor(
    private readonly registry: AgentRegistry,
    private readonly repo: PlanRepository,
    private readonly audit: AuditLogger,
    private readonly options: PlanServiceOptions
  ) {}

  listAgents(): { agents: AgentSummary[] } {
    return { agents: this.registry.list() };
  }

  createPlan(agentRef: string, taskDescription: string): RunPlan {
    const agent = this.registry.resolve(agentRef);
    if (!agent) {
      throw new PlanServiceError(`Agent not found: ${agentRef}`, 404, "AGENT_NOT_FOUND");
    }

    const planId = newPlanId();
    if (taskDescription.trim() === "") {
      this.audit.append({
        timestamp: nowIso(),
        planId,
        agentId: agent.id,
        eventType: "PLAN_REJECTED",
        errorCode: "VALIDATION_ERROR",
        message: "task description is empty"
      });
      throw new PlanServiceError("task_description must not be empty", 400, "VALIDATION_ERROR");
    }

    const plan = buildRunPlan(agent, taskDescription, this.options.envSource?.() ?? process.env, planId);
    this.repo.create(plan);
    this.audit.append({
      timestamp: plan.createdAt,
      planId,
      agentId: agent.id,
      eventType: "PLAN_CREATED",
      message: `${plan.commands.length} command(s), timeout ${plan.commands[0]?.maxTimeoutSec ?? 0}s`
    });
    return plan;
  }

  getPlan(planId: string): RunPlan {
    const plan = this.repo.get(planId);
    if (!plan) {
      throw new PlanServiceError(`Plan not found: ${planId}`, 404, "PLAN_NOT_FOUND");
    }
    return plan;
  }

  listPlans(limit = DEFAULT_LIST_LIMIT): { plans: RunPlan[] } {
    const safeLimit = Math.max(1, Math.min(this.options.maxListLimit, Math.floor(limit)));
    return { plans: this.repo.listRecent(safeLimit) };
  }
}
