import type { CloudApi } from "./types.js";

export type VerificationReport = {
  status: "clean" | "partial";
  vpcs: string[];
  loadBalancers: string[];
  clusters: string[];
  /** Lookups that failed; a check that could not run never counts as clean. */
  errors: string[];
};

export type VerificationTarget = {
  vpcTag: string;
  /** VPCs found during discovery, checked even when they carry no tag. */
  vpcIds: string[];
  clusterNames: string[];
};

/**
 * One read-only pass over the resources that define the environment.
 * No retries and no deletions happen here.
 */
export async function verify(cloud: CloudApi, target: VerificationTarget): Promise<VerificationReport> {
  console.error("\n🔍 Verifying teardown...");
  const errors: string[] = [];
  const vpcs = new Set<string>();

  const tagged = await cloud.findVpcIds(target.vpcTag);
  if (tagged.status === "succeeded") tagged.value.forEach(id => vpcs.add(id));
  else if (tagged.status !== "not-found") errors.push(`VPC lookup by tag failed: ${tagged.message}`);

  for (const vpcId of target.vpcIds) {
    if (vpcs.has(vpcId)) continue;
    const live = await cloud.describeVpc(vpcId);
    if (live.status === "succeeded") vpcs.add(vpcId);
    else if (live.status !== "not-found") errors.push(`VPC ${vpcId} lookup failed: ${live.message}`);
  }

  const loadBalancers: string[] = [];
  for (const vpcId of vpcs) {
    const lbs = await cloud.list("load-balancer", { vpcId });
    if (lbs.status === "succeeded") loadBalancers.push(...lbs.value.map(lb => lb.id));
    else if (lbs.status !== "not-found") errors.push(`Load balancer lookup in ${vpcId} failed: ${lbs.message}`);
  }

  const clusters: string[] = [];
  for (const clusterName of target.clusterNames) {
    const found = await cloud.list("cluster", { clusterName });
    if (found.status === "succeeded") clusters.push(...found.value.map(c => c.id));
    else if (found.status !== "not-found") errors.push(`Cluster ${clusterName} lookup failed: ${found.message}`);
  }

  const status = vpcs.size === 0 && loadBalancers.length === 0 && clusters.length === 0 && errors.length === 0
    ? "clean"
    : "partial";

  if (status === "clean") {
    console.error("✓ No VPC, load balancer or cluster remains");
  } else {
    for (const id of vpcs) console.error(`⚠️  VPC still present: ${id}`);
    for (const id of loadBalancers) console.error(`⚠️  Load balancer still present: ${id}`);
    for (const id of clusters) console.error(`⚠️  Cluster still present: ${id}`);
    for (const error of errors) console.error(`⚠️  ${error}`);
  }

  return { status, vpcs: [...vpcs], loadBalancers, clusters, errors };
}
