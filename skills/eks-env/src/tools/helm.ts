import { z } from "zod";
import { run } from "./shell.js";
import { pollUntil, systemClock, type Clock } from "./poll.js";

export type Env = Record<string, string>;

export async function helm(args: string[], env?: Env) {
  return run("helm", args, env);
}

export type UpgradeInstallOptions = {
  set?: Record<string, string>;
  wait?: boolean;
  /** Helm duration, e.g. "10m". */
  timeout?: string;
  createNamespace?: boolean;
};

export async function upgradeInstall(
  release: string,
  chart: string,
  namespace: string,
  options: UpgradeInstallOptions = {},
  env?: Env,
  clock: Clock = systemClock
) {
  // First check if another operation is in progress
  const locked = await isHelmLocked(release, namespace, env);
  if (locked) {
    const ready = await waitForHelmReady(release, namespace, env, { clock });
    if (!ready.ok) {
      return { ok: false, exitCode: 1, stdout: "", stderr: `Helm release ${release} is locked by another operation: ${ready.error}` };
    }
  }

  const args = ["upgrade", "--install", release, chart, "--namespace", namespace];
  if (options.createNamespace) args.push("--create-namespace");
  for (const [key, value] of Object.entries(options.set ?? {})) {
    args.push("--set", `${key}=${value}`);
  }
  if (options.wait) args.push("--wait");
  if (options.timeout) args.push(`--timeout=${options.timeout}`);
  return helm(args, env);
}

const ReleasesSchema = z.array(z.object({ name: z.string(), status: z.string() }));

export async function getHelmReleaseStatus(release: string, namespace: string, env?: Env): Promise<string | null> {
  const result = await helm(["list", "-a", "-n", namespace, "-o", "json"], env);
  if (!result.ok) return null;

  try {
    const releases = ReleasesSchema.parse(JSON.parse(result.stdout));
    const rel = releases.find(r => r.name === release);
    return rel ? rel.status : null;
  } catch {
    return null;
  }
}

function isPending(status: string | null): boolean {
  if (!status) return false;
  const s = status.toLowerCase();
  return s.includes("pending") || s.includes("deploying");
}

/**
 * Check if a Helm release is locked by another operation
 */
export async function isHelmLocked(release: string, namespace: string, env?: Env): Promise<boolean> {
  return isPending(await getHelmReleaseStatus(release, namespace, env));
}

/**
 * Wait for a pending Helm operation to finish. A release stuck in
 * pending-install is uninstalled and one stuck in pending-upgrade is rolled
 * back once the wait runs out.
 */
export async function waitForHelmReady(
  release: string,
  namespace: string,
  env?: Env,
  options?: { maxWaitSeconds?: number; clock?: Clock }
): Promise<{ ok: boolean; error?: string }> {
  const maxWaitSeconds = options?.maxWaitSeconds ?? 300;
  console.error(`⏳ Checking if Helm release '${release}' has pending operations...`);

  const result = await pollUntil(
    () => getHelmReleaseStatus(release, namespace, env),
    status => !isPending(status),
    {
      intervalMs: 10_000,
      timeoutMs: maxWaitSeconds * 1000,
      clock: options?.clock ?? systemClock,
      onWait: (elapsedMs) => {
        process.stderr.write(`   [${Math.round(elapsedMs / 1000)}s] Helm operation in progress, waiting...\n`);
      },
    }
  );

  if (result.ok) {
    if (result.elapsedMs > 0) console.error(`✓ Helm release is ready (waited ${Math.round(result.elapsedMs / 1000)}s)`);
    return { ok: true };
  }

  if (result.value === "pending-install") {
    console.error(`⚠️  Release '${release}' is stuck in 'pending-install'. Uninstalling it...`);
    const res = await uninstallRelease(release, namespace, env);
    return res.ok ? { ok: true } : { ok: false, error: res.stderr };
  }
  if (result.value === "pending-upgrade") {
    console.error(`⚠️  Release '${release}' is stuck in 'pending-upgrade'. Rolling back...`);
    const res = await helm(["rollback", release, "0", "-n", namespace], env);
    return res.ok ? { ok: true } : { ok: false, error: res.stderr };
  }

  return { ok: false, error: `Timeout after ${maxWaitSeconds}s waiting for Helm operation to complete` };
}

export async function repoAdd(name: string, url: string, env?: Env) {
  const res = await helm(["repo", "add", name, url], env);
  // Re-adding an existing repo with the same URL is fine
  if (!res.ok && res.stderr.includes("already exists")) return { ...res, ok: true };
  return res;
}

export async function repoUpdate(env?: Env) {
  return helm(["repo", "update"], env);
}

export async function lint(chart: string, env?: Env) {
  return helm(["lint", chart], env);
}

export async function uninstallRelease(release: string, namespace: string, env?: Env) {
  return helm(["uninstall", release, "-n", namespace], env);
}
