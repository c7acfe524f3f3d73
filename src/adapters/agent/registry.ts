import { AgentSummary } from "../../types.js";
import { AmazonQCliAgent } from "./amazonQCliAgent.js";
import { InstalledAgent } from "./installedAgent.js";

export class AgentRegistry {
  private readonly agents = new Map<string, InstalledAgent>();

  register(agent: InstalledAgent): void {
    const key = agent.id.toLowerCase();
    if (this.agents.has(key)) {
      throw new Error(`Agent already registered: ${agent.id}`);
    }
    this.agents.set(key, agent);
  }

  /** Looks an agent up by id or display name, ignoring case. */
  resolve(ref: string): InstalledAgent | null {
    const normalized = ref.trim().toLowerCase();
    if (!normalized) {
      return null;
    }
    const byId = this.agents.get(normalized);
    if (byId) {
      return byId;
    }
    for (const agent of this.agents.values()) {
      if (agent.name().toLowerCase() === normalized) {
        return agent;
      }
    }
    return null;
  }

  list(): AgentSummary[] {
    return Array.from(this.agents.values()).map((agent) => ({ id: agent.id, name: agent.name() }));
  }
}

export function createDefaultRegistry(): AgentRegistry {
  const registry = new AgentRegistry();
  registry.register(new AmazonQCliAgent());
  return registry;
}
