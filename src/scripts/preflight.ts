import fs from "node:fs";
import { spawnSync } from "node:child_process";
import dotenv from "dotenv";
import { createDefaultRegistry } from "../adapters/agent/registry.js";

dotenv.config();

type Level = "PASS" | "WARN" | "FAIL";

type CheckResult = {
  name: string;
  level: Level;
  message: string;
};

function runCheck(name: string, fn: () => CheckResult): CheckResult {
  try {
    return fn();
  } catch (err) {
    return {
      name,
      level: "FAIL",
      message: err instanceof Error ? err.message : String(err)
    };
  }
}

function ok(name: string, message: string): CheckResult {
  return { name, level: "PASS", message };
}

function warn(name: string, message: string): CheckResult {
  return { name, level: "WARN", message };
}

function fail(name: string, message: string): CheckResult {
  return { name, level: "FAIL", message };
}

function requiredEnv(name: string): CheckResult {
  const value = process.env[name];
  if (!value || value.trim() === "") {
    return fail(name, "missing");
  }
  if (value.includes("replace_me")) {
    return fail(name, "placeholder value detected");
  }
  return ok(name, "configured");
}

function optionalEnv(name: string, hint: string): CheckResult {
  const value = process.env[name];
  if (!value || value.trim() === "") {
    return warn(name, `empty (${hint})`);
  }
  return ok(name, "configured");
}

function checkBinary(bin: string, args: string[], hint: string): CheckResult {
  const out = spawnSync(bin, args, { encoding: "utf8" });
  if (out.error || out.status !== 0) {
    return warn(bin, `unavailable on this host (${hint})`);
  }
  const line = ((out.stdout ?? "") || (out.stderr ?? "")).trim().split("\n")[0] ?? "";
  return ok(bin, line);
}

function checkInstallScript(scriptPath: string): CheckResult {
  if (!fs.existsSync(scriptPath)) {
    return fail("install script", `missing: ${scriptPath}`);
  }
  try {
    fs.accessSync(scriptPath, fs.constants.X_OK);
  } catch {
    return warn("install script", `not executable: ${scriptPath}`);
  }
  return ok("install script", scriptPath);
}

function printResults(results: CheckResult[]): void {
  process.stdout.write("q-bench-adapter preflight\n");
  for (const r of results) {
    process.stdout.write(`[${r.level}] ${r.name}: ${r.message}\n`);
  }
  const failCount = results.filter((r) => r.level === "FAIL").length;
  const warnCount = results.filter((r) => r.level === "WARN").length;
  process.stdout.write(`\nSummary: ${results.length} checks, ${failCount} failed, ${warnCount} warning(s)\n`);
}

function main(): void {
  const agentRef = (process.env.DEFAULT_AGENT ?? "amazon-q-cli").trim();
  const agent = createDefaultRegistry().resolve(agentRef);
  const results: CheckResult[] = [];

  if (!agent) {
    results.push(fail("DEFAULT_AGENT", `unknown agent '${agentRef}'`));
  } else {
    results.push(ok("DEFAULT_AGENT", `${agent.id} (${agent.name()})`));
    results.push(runCheck("install script", () => checkInstallScript(agent.installScriptPath())));
  }

  results.push(
    runCheck("AWS_ACCESS_KEY_ID", () => requiredEnv("AWS_ACCESS_KEY_ID")),
    runCheck("AWS_SECRET_ACCESS_KEY", () => requiredEnv("AWS_SECRET_ACCESS_KEY")),
    runCheck("AWS_SESSION_TOKEN", () => optionalEnv("AWS_SESSION_TOKEN", "long-lived keys only")),
    runCheck("GIT_HASH", () => optionalEnv("GIT_HASH", "install script falls back to latest")),
    runCheck("CHAT_DOWNLOAD_ROLE_ARN", () => optionalEnv("CHAT_DOWNLOAD_ROLE_ARN", "build download will fail")),
    runCheck("CHAT_BUILD_BUCKET_NAME", () => optionalEnv("CHAT_BUILD_BUCKET_NAME", "build download will fail")),
    runCheck("aws", () => checkBinary("aws", ["--version"], "only needed inside the task container")),
    runCheck("tb", () => checkBinary("tb", ["--help"], "needed to launch benchmark runs"))
  );

  printResults(results);
  const hasFail = results.some((r) => r.level === "FAIL");
  process.exit(hasFail ? 1 : 0);
}

main();
