import dotenv from "dotenv";

dotenv.config();

function parsePositiveInt(name: string, fallback: string): number {
  const raw = process.env[name] ?? fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${name}: ${raw}. Expected a positive integer.`);
  }
  return value;
}

export const config = {
  port: parsePositiveInt("PORT", "3000"),
  dbPath: process.env.DATABASE_PATH ?? "./qbench.db",
  auditLogPath: process.env.AUDIT_LOG_PATH ?? "./audit.jsonl",
  defaultAgent: (process.env.DEFAULT_AGENT ?? "amazon-q-cli").trim(),
  maxPlanListLimit: 100
};
