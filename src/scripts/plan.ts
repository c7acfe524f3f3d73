import dotenv from "dotenv";
import { createDefaultRegistry } from "../adapters/agent/registry.js";
import { buildRunPlan } from "../services/planService.js";

dotenv.config();

function main(): void {
  const taskDescription = process.argv.slice(2).join(" ");
  if (taskDescription.trim() === "") {
    console.error("Usage: npm run plan -- <task description>");
    process.exit(1);
  }

  const agentRef = (process.env.DEFAULT_AGENT ?? "amazon-q-cli").trim();
  const agent = createDefaultRegistry().resolve(agentRef);
  if (!agent) {
    console.error(`unknown agent: ${agentRef}`);
    process.exit(1);
  }

  const plan = buildRunPlan(agent, taskDescription);
  process.stdout.write(JSON.stringify(plan, null, 2) + "\n");
}

main();
