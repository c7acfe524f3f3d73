import express from "express";
import { config } from "./config.js";
import { createDb, initDb } from "./db.js";
import { createDefaultRegistry } from "./adapters/agent/registry.js";
import { PlanRepository } from "./repositories/planRepository.js";
import { AuditLogger } from "./services/auditLogger.js";
import { PlanService } from "./services/planService.js";
import { getHealthDetails } from "./services/health.js";
import { createPlanRoutes } from "./routes/planRoutes.js";

async function main(): Promise<void> {
  const db = createDb();
  initDb(db);

  const registry = createDefaultRegistry();
  if (!registry.resolve(config.defaultAgent)) {
    throw new Error(`DEFAULT_AGENT is not a known agent: ${config.defaultAgent}`);
  }
  const service = new PlanService(registry, new PlanRepository(db), new AuditLogger(), {
    maxListLimit: config.maxPlanListLimit
  });

  const app = express();
  app.use(express.json({ limit: "1mb" }));
  app.get("/healthz", (_req, res) => res.status(200).json({ ok: true }));
  app.get("/api/v1/health/details", (_req, res) =>
    res.status(200).json(getHealthDetails(registry.list(), config.defaultAgent))
  );
  app.use("/api/v1", createPlanRoutes(service));

  app.listen(config.port, () => {
    process.stdout.write(`q-bench-adapter running at :${config.port} (default agent: ${config.defaultAgent})\n`);
  });
}

main().catch((err) => {
  process.stderr.write(`fatal: ${err instanceof Error ? err.stack : String(err)}\n`);
  process.exit(1);
});
