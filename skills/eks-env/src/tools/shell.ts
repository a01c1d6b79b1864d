import { execCmd } from "./exec.js";

export type ShellResult = {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
};

const THROTTLE_RETRY_DELAY_MS = 5000;

function isThrottled(stderr: string): boolean {
  return /Throttling|RequestLimitExceeded|Rate exceeded|TooManyRequestsException/i.test(stderr);
}

function isUnauthorized(stderr: string): boolean {
  return stderr.includes("Unauthorized") ||
    stderr.includes("asked for the client to provide credentials") ||
    stderr.includes("Kubernetes cluster unreachable");
}

function toShellResult(result: { code: number; stdout: string; stderr: string }): ShellResult {
  return {
    ok: result.code === 0,
    exitCode: result.code,
    stdout: result.stdout,
    stderr: result.stderr,
  };
}

export async function run(cmd: string, args: string[], env?: Record<string, string>): Promise<ShellResult> {
  const result = await execCmd(cmd, args, { env });
  if (result.code === 0) return toShellResult(result);

  // Throttled AWS calls get one more try after a short pause
  if (cmd === "aws" && isThrottled(result.stderr)) {
    process.stderr.write(`\n⚠️  AWS API throttled (${args.slice(0, 2).join(" ")}). Retrying in ${THROTTLE_RETRY_DELAY_MS / 1000}s...\n`);
    await new Promise(resolve => setTimeout(resolve, THROTTLE_RETRY_DELAY_MS));
    return toShellResult(await execCmd(cmd, args, { env }));
  }

  // Expired EKS tokens: refresh kubeconfig and retry once
  const isK8sCommand = cmd === "kubectl" || cmd === "helm";
  if (isK8sCommand && isUnauthorized(result.stderr) && env?.CLUSTER_NAME && env?.AWS_REGION) {
    process.stderr.write(`\n⚠️  Kubernetes credentials expired. Refreshing kubeconfig for ${env.CLUSTER_NAME}...\n`);
    await execCmd("aws", [
      "eks", "update-kubeconfig",
      "--name", env.CLUSTER_NAME,
      "--region", env.AWS_REGION,
    ], { env });
    process.stderr.write(`✓ Kubeconfig refreshed. Retrying command...\n`);
    return toShellResult(await execCmd(cmd, args, { env }));
  }

  return toShellResult(result);
}
