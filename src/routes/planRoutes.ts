import express from "express";
import { PlanService, PlanServiceError } from "../services/planService.js";

type CreatePlanBody = {
  task_description?: unknown;
};

function badRequest(message: string): never {
  throw new PlanServiceError(message, 400, "VALIDATION_ERROR");
}

export function createPlanRoutes(service: PlanService): express.Router {
  const router = express.Router();

  router.get("/agents", (_req, res) => {
    try {
      res.status(200).json(service.listAgents());
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post("/agents/:agentId/plans", (req, res) => {
    try {
      const body = (req.body ?? {}) as CreatePlanBody;
      if (body.task_description === undefined) {
        badRequest("task_description is required");
      }
      if (typeof body.task_description !== "string") {
        badRequest("task_description must be a string");
      }
      const plan = service.createPlan(req.params.agentId, body.task_description);
      res.status(201).json({ plan });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get("/plans/:planId", (req, res) => {
    try {
      const plan = service.getPlan(req.params.planId);
      res.status(200).json({ plan });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get("/plans", (req, res) => {
    try {
      const limitRaw = String(req.query.limit ?? "20");
      const limit = Number(limitRaw);
      if (limitRaw.trim() === "" || !Number.isFinite(limit)) {
        badRequest("limit must be a number");
      }
      res.status(200).json(service.listPlans(limit));
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}

function sendError(res: express.Response, err: unknown): void {
  if (err instanceof PlanServiceError) {
    res.status(err.statusCode).json({ error: err.message, error_code: err.code });
    return;
  }
  res.status(500).json({ error: err instanceof Error ? err.message : "Unknown error", error_code: "UNKNOWN" });
}
