import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

dotenv.config();

type AuditRow = {
  timestamp?: string;
  planId?: string;
  agentId?: string;
  eventType?: string;
  errorCode?: string;
  message?: string;
};

function usage(): void {
  console.error("Usage: npm run audit:plan -- <plan_id>");
}

function main(): void {
  const planId = process.argv[2];
  if (!planId) {
    usage();
    process.exit(1);
  }

  const logPath = process.env.AUDIT_LOG_PATH ?? "./audit.jsonl";
  const resolved = path.resolve(logPath);
  if (!fs.existsSync(resolved)) {
    console.error(`audit log not found: ${resolved}`);
    process.exit(1);
  }

  const lines = fs
    .readFileSync(resolved, "utf8")
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);

  const rows: AuditRow[] = [];
  let malformed = 0;
  for (const line of lines) {
    try {
      const row = JSON.parse(line) as AuditRow;
      if (row.planId === planId) {
        rows.push(row);
      }
    } catch {
      malformed += 1;
    }
  }
  if (malformed > 0) {
    console.error(`skipped ${malformed} malformed line(s) in ${resolved}`);
  }

  if (rows.length === 0) {
    console.log(`no audit records found for plan: ${planId}`);
    return;
  }

  rows.sort((a, b) => String(a.timestamp ?? "").localeCompare(String(b.timestamp ?? "")));
  console.log(`Plan ${planId} audit timeline (${rows.length} event${rows.length > 1 ? "s" : ""})`);
  for (const row of rows) {
    const parts = [row.timestamp ?? "unknown-time", row.eventType ?? "UNKNOWN", `agent=${row.agentId ?? "?"}`];
    if (row.errorCode) {
      parts.push(`code=${row.errorCode}`);
    }
    if (row.message) {
      parts.push(`msg=${row.message}`);
    }
    console.log(`- ${parts.join(" | ")}`);
  }
}

main();
