import { spawn } from "node:child_process";
import { clearTicker, isInteractive, startSpinner, startTicker, stopSpinner, stopTicker } from "./spinner.js";

export type ExecResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type ExecOptions = {
  env?: Record<string, string>;
  cwd?: string;
  verbose?: boolean;
};

const LONG_RUNNING_TIMEOUT_MS = 20 * 60 * 1000;
const DEFAULT_TIMEOUT_MS = 2 * 60 * 1000;

// Lines worth forwarding from terraform/eksctl while they run; the rest stays in the captured output.
const MILESTONE_LINE =
  /Destroying\.\.\.|Destruction complete|Still destroying|Creating\.\.\.|Creation complete|Still creating|Apply complete|Destroy complete|Plan:|Error:|\[ℹ\]|\[\s*✖\s*\]|\[!\]|failed to|already exists/i;

/**
 * Commands that routinely take minutes: their output is streamed and the kill timeout is longer.
 */
export function isLongRunning(cmd: string, args: string[]): boolean {
  if (cmd === "terraform") return args.includes("apply") || args.includes("destroy");
  if (cmd === "helm") return args.includes("--wait");
  if (cmd === "eksctl") return args[0] === "create" || args[0] === "delete";
  return false;
}

/**
 * Kill timeout for one command. terraform apply and destroy get none: creating
 * or deleting a cluster can outlast any fixed budget, and killing terraform
 * midway leaves its state behind.
 */
export function killTimeoutFor(cmd: string, args: string[]): number | undefined {
  if (cmd === "terraform" && isLongRunning(cmd, args)) return undefined;
  return isLongRunning(cmd, args) ? LONG_RUNNING_TIMEOUT_MS : DEFAULT_TIMEOUT_MS;
}

function describeAction(cmd: string, args: string[]): string {
  if (cmd === "terraform") return args.includes("destroy") ? "Destroying infrastructure" : "Applying plan";
  if (cmd === "helm") return "Waiting for helm";
  return `Running ${cmd} ${args[0] ?? ""}`.trim();
}

export function execCmd(cmd: string, args: string[], opts?: ExecOptions): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, {
      env: { ...process.env, ...(opts?.env ?? {}) },
      cwd: opts?.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const longRunning = isLongRunning(cmd, args);
    const timeoutMs = killTimeoutFor(cmd, args);
    let timeoutMessage: string | undefined;
    const killTimeout = timeoutMs === undefined ? undefined : setTimeout(() => {
      timeoutMessage = `Command timed out after ${timeoutMs / 1000}s and was killed: ${cmd} ${args.join(" ")}`;
      if (child.kill()) console.error(`\n❌ ${timeoutMessage}`);
    }, timeoutMs);

    const feedbackTimeout = setTimeout(() => {
      if (opts?.verbose || longRunning) {
        process.stderr.write(`\n⏳ Still running: ${cmd} ${args.slice(0, 3).join(" ")}${args.length > 3 ? "..." : ""} (taking longer than expected)\n`);
      }
    }, 5000);

    const showSpinner = !longRunning && !opts?.verbose && isInteractive();
    if (showSpinner) {
      startSpinner(`Running ${cmd} ${args.slice(0, 2).join(" ")}${args.length > 2 ? "..." : ""}`);
    }
    if (longRunning) startTicker(describeAction(cmd, args));

    let stdout = "";
    let stderr = "";
    const lineBuffers = { stdout: "", stderr: "" };

    const forward = (stream: "stdout" | "stderr", chunk: string) => {
      lineBuffers[stream] += chunk;
      const lines = lineBuffers[stream].split("\n");
      lineBuffers[stream] = lines.pop() ?? "";
      for (const line of lines) {
        const t = line.trim();
        if (!t) continue;
        if (cmd === "helm" || MILESTONE_LINE.test(t)) {
          clearTicker();
          process.stderr.write(line + "\n");
        }
      }
    };

    child.stdout?.on("data", (d: Buffer) => {
      const out = d.toString();
      stdout += out;
      if (longRunning) forward("stdout", out);
    });
    child.stderr?.on("data", (d: Buffer) => {
      const out = d.toString();
      stderr += out;
      if (longRunning) forward("stderr", out);
    });

    const finish = () => {
      clearTimeout(killTimeout);
      clearTimeout(feedbackTimeout);
      if (showSpinner) stopSpinner();
      if (longRunning) stopTicker();
    };

    child.on("error", (err: NodeJS.ErrnoException) => {
      finish();
      if (err.code === "ENOENT") {
        resolve({
          code: 127,
          stdout: "",
          stderr: `Command not found: ${cmd}. Install it and make sure it is on PATH.`,
        });
      } else {
        reject(err);
      }
    });
    child.on("close", (code) => {
      finish();
      // The timeout goes first so callers classify the call as timed out
      resolve({
        code: code ?? 1,
        stdout: stdout.trim(),
        stderr: timeoutMessage ? `${timeoutMessage}\n${stderr.trim()}`.trim() : stderr.trim(),
      });
    });
  });
}
