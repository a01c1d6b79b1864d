import { execCmd } from "../tools/exec.js";
import type { Blocker } from "../tools/errors.js";

export type Tool = "aws" | "terraform" | "kubectl" | "helm" | "eksctl";

const VERSION_ARGS: Record<Tool, string[]> = {
  aws: ["--version"],
  terraform: ["version"],
  kubectl: ["version", "--client"],
  helm: ["version", "--short"],
  eksctl: ["version"],
};

export async function checkToolAvailable(tool: Tool): Promise<{
  ok: boolean;
  version?: string;
  error?: string;
}> {
  try {
    const res = await execCmd(tool, VERSION_ARGS[tool]);
    if (res.code === 0) {
      return { ok: true, version: (res.stdout || res.stderr).split("\n")[0]?.trim() };
    }
    return { ok: false, error: res.stderr || `${tool} exited with code ${res.code}` };
  } catch (err) {
    return { ok: false, error: String(err) };
  }
}

/**
 * One blocker per required tool that is missing or broken.
 */
export async function checkTools(tools: readonly Tool[]): Promise<Blocker[]> {
  const blockers: Blocker[] = [];
  for (const tool of tools) {
    const check = await checkToolAvailable(tool);
    if (check.ok) {
      console.error(`   ✓ ${tool}: ${check.version ?? "available"}`);
    } else {
      blockers.push({
        code: `${tool.toUpperCase()}_UNAVAILABLE`,
        message: `${tool} is not installed or not working: ${check.error ?? "unknown error"}`,
      });
    }
  }
  return blockers;
}
