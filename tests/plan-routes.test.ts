import test from "node:test";
import assert from "node:assert/strict";
import express from "express";
import { createPlanRoutes } from "../src/routes/planRoutes.js";
import { PlanServiceError } from "../src/services/planService.js";
import { RunPlan } from "../src/types.js";

type MockService = {
  listAgents: () => { agents: Array<{ id: string; name: string }> };
  createPlan: (agentRef: string, taskDescription: string) => RunPlan;
  getPlan: (planId: string) => RunPlan;
  listPlans: (limit?: number) => { plans: RunPlan[] };
};

type ResponseCapture = {
  statusCode: number;
  body: unknown;
};

const samplePlan: RunPlan = {
  planId: "plan_0123456789abcdef",
  agentId: "amazon-q-cli",
  agentName: "Amazon Q CLI",
  taskDescription: "fix the build",
  installScriptPath: "/srv/app/install/setup_amazon_q.sh",
  env: { AMAZON_Q_SIGV4: "1" },
  commands: [
    {
      command: "qchat chat --no-interactive --trust-all-tools 'fix the build'",
      maxTimeoutSec: 1800,
      block: true
    }
  ],
  createdAt: "2026-01-01T00:00:00.000Z"
};

function mockService(overrides: Partial<MockService> = {}): MockService {
  return {
    listAgents: () => ({ agents: [{ id: "amazon-q-cli", name: "Amazon Q CLI" }] }),
    createPlan: () => samplePlan,
    getPlan: () => samplePlan,
    listPlans: () => ({ plans: [samplePlan] }),
    ...overrides
  };
}

async function invokeRoute(params: {
  router: express.Router;
  method: "post" | "get";
  path: string;
  reqBody?: unknown;
  reqParams?: Record<string, string>;
  reqQuery?: Record<string, string>;
}): Promise<ResponseCapture> {
  const layer = params.router.stack.find((l) => {
    const route = (l as { route?: { path?: string; methods?: Record<string, boolean> } }).route;
    return route?.path === params.path && route.methods?.[params.method] === true;
  }) as
    | {
        route: {
          stack: Array<{ handle: (req: express.Request, res: express.Response) => unknown }>;
        };
      }
    | undefined;

  if (!layer) {
    throw new Error(`Route not found: ${params.method.toUpperCase()} ${params.path}`);
  }

  let statusCode = 200;
  let body: unknown = null;
  const res = {
    status(code: number) {
      statusCode = code;
      return this;
    },
    json(payload: unknown) {
      body = payload;
      return this;
    }
  } as unknown as express.Response;

  const req = {
    body: params.reqBody ?? {},
    params: params.reqParams ?? {},
    query: params.reqQuery ?? {}
  } as express.Request;

  await layer.route.stack[0]?.handle(req, res);
  return { statusCode, body };
}

test("GET /agents lists registered agents", async () => {
  const router = createPlanRoutes(mockService() as never);
  const result = await invokeRoute({ router, method: "get", path: "/agents" });
  assert.equal(result.statusCode, 200);
  assert.deepEqual(result.body, { agents: [{ id: "amazon-q-cli", name: "Amazon Q CLI" }] });
});

test("POST /agents/:agentId/plans returns 400 when task_description is missing", async () => {
  const router = createPlanRoutes(
    mockService({
      createPlan: () => {
        throw new Error("should not call");
      }
    }) as never
  );
  const result = await invokeRoute({
    router,
    method: "post",
    path: "/agents/:agentId/plans",
    reqParams: { agentId: "amazon-q-cli" },
    reqBody: {}
  });
  assert.equal(result.statusCode, 400);
  assert.deepEqual(result.body, { error: "task_description is required", error_code: "VALIDATION_ERROR" });
});

test("POST /agents/:agentId/plans returns 400 when task_description is not a string", async () => {
  const router = createPlanRoutes(mockService() as never);
  const result = await invokeRoute({
    router,
    method: "post",
    path: "/agents/:agentId/plans",
    reqParams: { agentId: "amazon-q-cli" },
    reqBody: { task_description: 42 }
  });
  assert.equal(result.statusCode, 400);
  assert.deepEqual(result.body, { error: "task_description must be a string", error_code: "VALIDATION_ERROR" });
});

test("POST /agents/:agentId/plans passes agent and description through and returns 201", async () => {
  const calls: Array<[string, string]> = [];
  const router = createPlanRoutes(
    mockService({
      createPlan: (agentRef, taskDescription) => {
        calls.push([agentRef, taskDescription]);
        return samplePlan;
      }
    }) as never
  );
  const result = await invokeRoute({
    router,
    method: "post",
    path: "/agents/:agentId/plans",
    reqParams: { agentId: "amazon-q-cli" },
    reqBody: { task_description: "fix the build" }
  });
  assert.equal(result.statusCode, 201);
  assert.deepEqual(result.body, { plan: samplePlan });
  assert.deepEqual(calls, [["amazon-q-cli", "fix the build"]]);
});

test("POST /agents/:agentId/plans maps an unknown agent to 404", async () => {
  const router = createPlanRoutes(
    mockService({
      createPlan: () => {
        throw new PlanServiceError("Agent not found: goose", 404, "AGENT_NOT_FOUND");
      }
    }) as never
  );
  const result = await invokeRoute({
    router,
    method: "post",
    path: "/agents/:agentId/plans",
    reqParams: { agentId: "goose" },
    reqBody: { task_description: "fix the build" }
  });
  assert.equal(result.statusCode, 404);
  assert.deepEqual(result.body, { error: "Agent not found: goose", error_code: "AGENT_NOT_FOUND" });
});

test("GET /plans/:planId maps service 404", async () => {
  const router = createPlanRoutes(
    mockService({
      getPlan: () => {
        throw new PlanServiceError("Plan not found: plan_missing", 404, "PLAN_NOT_FOUND");
      }
    }) as never
  );
  const result = await invokeRoute({
    router,
    method: "get",
    path: "/plans/:planId",
    reqParams: { planId: "plan_missing" }
  });
  assert.equal(result.statusCode, 404);
  assert.deepEqual(result.body, { error: "Plan not found: plan_missing", error_code: "PLAN_NOT_FOUND" });
});

test("GET /plans rejects a non-numeric limit", async () => {
  const router = createPlanRoutes(mockService() as never);
  const result = await invokeRoute({
    router,
    method: "get",
    path: "/plans",
    reqQuery: { limit: "lots" }
  });
  assert.equal(result.statusCode, 400);
  assert.deepEqual(result.body, { error: "limit must be a number", error_code: "VALIDATION_ERROR" });
});

test("GET /plans rejects a blank limit without calling the service", async () => {
  const limits: Array<number | undefined> = [];
  const router = createPlanRoutes(
    mockService({
      listPlans: (limit) => {
        limits.push(limit);
        return { plans: [samplePlan] };
      }
    }) as never
  );
  for (const limit of ["", "  "]) {
    const result = await invokeRoute({
      router,
      method: "get",
      path: "/plans",
      reqQuery: { limit }
    });
    assert.equal(result.statusCode, 400, JSON.stringify(limit));
    assert.deepEqual(result.body, { error: "limit must be a number", error_code: "VALIDATION_ERROR" });
  }
  assert.deepEqual(limits, []);
});

test("GET /plans forwards the numeric limit", async () => {
  const limits: Array<number | undefined> = [];
  const router = createPlanRoutes(
    mockService({
      listPlans: (limit) => {
        limits.push(limit);
        return { plans: [samplePlan] };
      }
    }) as never
  );
  const result = await invokeRoute({
    router,
    method: "get",
    path: "/plans",
    reqQuery: { limit: "5" }
  });
  assert.equal(result.statusCode, 200);
  assert.deepEqual(result.body, { plans: [samplePlan] });
  assert.deepEqual(limits, [5]);
});

test("unexpected errors map to 500 UNKNOWN", async () => {
  const router = createPlanRoutes(
    mockService({
      getPlan: () => {
        throw new Error("database is locked");
      }
    }) as never
  );
  const result = await invokeRoute({
    router,
    method: "get",
    path: "/plans/:planId",
    reqParams: { planId: "plan_a" }
  });
  assert.equal(result.statusCode, 500);
  assert.deepEqual(result.body, { error: "database is locked", error_code: "UNKNOWN" });
});
