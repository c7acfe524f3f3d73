import { fileURLToPath } from "node:url";
import { AgentEnvironment, TerminalCommand } from "../../types.js";
import { shellJoin } from "../../utils/shellQuote.js";
import { EnvSource, InstalledAgent } from "./installedAgent.js";

const AGENT_BINARY = "qchat";
const MAX_TIMEOUT_SEC = 1800;

const FORWARDED_ENV_KEYS = [
  "AWS_ACCESS_KEY_ID",
  "AWS_SECRET_ACCESS_KEY",
  "AWS_SESSION_TOKEN",
  "GIT_HASH",
  "CHAT_DOWNLOAD_ROLE_ARN",
  "CHAT_BUILD_BUCKET_NAME"
] as const;

// The script lives in install/ at the package root because tsc does not copy it into dist/.
// src/adapters/agent and dist/adapters/agent are both three levels below the root, so this
// relative URL resolves to the same file from either tree.
const INSTALL_SCRIPT_URL = new URL("../../../install/setup_amazon_q.sh", import.meta.url);

export class AmazonQCliAgent implements InstalledAgent {
  readonly id = "amazon-q-cli";
  readonly secretEnvKeys = ["AWS_ACCESS_KEY_ID", "AWS_SECRET_ACCESS_KEY", "AWS_SESSION_TOKEN"] as const;

  name(): string {
    return "Amazon Q CLI";
  }

  environment(source: EnvSource = process.env): AgentEnvironment {
    // qchat signs requests with the forwarded AWS credentials instead of a builder ID login.
    const env: AgentEnvironment = { AMAZON_Q_SIGV4: "1" };
    for (const key of FORWARDED_ENV_KEYS) {
      env[key] = source[key] ?? "";
    }
    return env;
  }

  installScriptPath(): string {
    return fileURLToPath(INSTALL_SCRIPT_URL);
  }

  buildRunCommands(taskDescription: string): TerminalCommand[] {
    return [
      {
        command: shellJoin([AGENT_BINARY, "chat", "--no-interactive", "--trust-all-tools", taskDescription]),
        maxTimeoutSec: MAX_TIMEOUT_SEC,
        block: true
      }
    ];
  }
}
