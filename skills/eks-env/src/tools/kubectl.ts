import { z } from "zod";
import { run } from "./shell.js";

export type Env = Record<string, string>;

export async function kubectl(args: string[], env?: Env) {
  return run("kubectl", args, env);
}

const NodesSchema = z.object({
  items: z.array(z.object({
    metadata: z.object({ name: z.string() }),
    status: z.object({
      conditions: z.array(z.object({ type: z.string(), status: z.string() })).default([]),
    }).default({}),
  })).default([]),
});

export type NodeSummary = { total: number; ready: number; names: string[] };

/**
 * Count nodes whose Ready condition is True. A failed call or unparsable
 * output reads as "no nodes yet".
 */
export async function getNodes(env?: Env): Promise<{ ok: boolean; nodes: NodeSummary; error?: string }> {
  const res = await kubectl(["get", "nodes", "--output", "json"], env);
  const empty: NodeSummary = { total: 0, ready: 0, names: [] };
  if (!res.ok) return { ok: false, nodes: empty, error: res.stderr };

  try {
    const { items } = NodesSchema.parse(JSON.parse(res.stdout));
    const ready = items.filter(n => n.status.conditions.some(c => c.type === "Ready" && c.status === "True"));
    return { ok: true, nodes: { total: items.length, ready: ready.length, names: items.map(n => n.metadata.name) } };
  } catch {
    return { ok: false, nodes: empty, error: "Failed to parse kubectl get nodes output" };
  }
}

export async function getIngressHostname(name: string, namespace: string, env?: Env): Promise<string | null> {
  const res = await kubectl(
    ["get", "ingress", name, "-n", namespace, "-o", "jsonpath={.status.loadBalancer.ingress[0].hostname}"],
    env
  );
  const hostname = res.stdout.trim();
  return res.ok && hostname ? hostname : null;
}
