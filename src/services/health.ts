import { AgentSummary } from "../types.js";

export interface HealthDetails {
  service: string;
  status: "ok";
  nodeVersion: string;
  timestamp: string;
  contracts: {
    installedAgent: string;
    planApi: string;
    auditLog: string;
  };
  agents: AgentSummary[];
  defaultAgent: string;
}

export function getHealthDetails(agents: AgentSummary[], defaultAgent: string): HealthDetails {
  return {
    service: "q-bench-adapter",
    status: "ok",
    nodeVersion: process.version,
    timestamp: new Date().toISOString(),
    contracts: {
      installedAgent: "v1",
      planApi: "v1",
      auditLog: "v1.0"
    },
    agents,
    defaultAgent
  };
}
