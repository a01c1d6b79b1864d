import { z } from "zod";
import { run } from "./shell.js";
import { fromShell, fromShellVoid, parseJson, type CallResult } from "./errors.js";

/**
 * Run the AWS CLI against one profile and region. An empty profile leaves the
 * default credential chain in charge.
 */
export async function aws(args: string[], awsProfile: string, awsRegion: string) {
  return run("aws", [...args, "--output", "json"], awsEnv(awsProfile, awsRegion));
}

/**
 * Environment for any CLI that talks to AWS or to the cluster. CLUSTER_NAME lets
 * kubectl and helm refresh an expired kubeconfig.
 */
export function awsEnv(awsProfile: string, awsRegion: string, clusterName?: string): Record<string, string> {
  const env: Record<string, string> = { AWS_DEFAULT_REGION: awsRegion, AWS_REGION: awsRegion };
  if (awsProfile) env.AWS_PROFILE = awsProfile;
  if (clusterName) env.CLUSTER_NAME = clusterName;
  return env;
}

const CallerIdentitySchema = z.object({
  Account: z.string(),
  Arn: z.string(),
  UserId: z.string(),
});

export async function getCallerIdentity(awsProfile: string, awsRegion: string) {
  const res = await aws(["sts", "get-caller-identity"], awsProfile, awsRegion);
  if (!res.ok) return { ok: false as const, error: res.stderr || res.stdout };

  try {
    const j = CallerIdentitySchema.parse(JSON.parse(res.stdout));
    return { ok: true as const, accountId: j.Account, arn: j.Arn, userId: j.UserId };
  } catch {
    return { ok: false as const, error: "Failed to parse sts get-caller-identity output" };
  }
}

// --- EKS ---

const ClusterSchema = z.object({
  cluster: z.object({
    name: z.string(),
    status: z.string(),
    resourcesVpcConfig: z.object({ vpcId: z.string().optional() }).optional(),
  }),
});

export type ClusterInfo = { name: string; status: string; vpcId?: string };

export async function listClusters(awsProfile: string, awsRegion: string): Promise<CallResult<string[]>> {
  const res = await aws(["eks", "list-clusters"], awsProfile, awsRegion);
  return fromShell(res, parseJson(z.object({ clusters: z.array(z.string()) }).transform(r => r.clusters)));
}

export async function describeCluster(clusterName: string, awsProfile: string, awsRegion: string): Promise<CallResult<ClusterInfo>> {
  const res = await aws(["eks", "describe-cluster", "--name", clusterName], awsProfile, awsRegion);
  return fromShell(res, parseJson(ClusterSchema.transform(({ cluster }) => ({
    name: cluster.name,
    status: cluster.status,
    vpcId: cluster.resourcesVpcConfig?.vpcId,
  }))));
}

export async function deleteCluster(clusterName: string, awsProfile: string, awsRegion: string): Promise<CallResult> {
  return fromShellVoid(await aws(["eks", "delete-cluster", "--name", clusterName], awsProfile, awsRegion));
}

export async function listNodegroups(clusterName: string, awsProfile: string, awsRegion: string): Promise<CallResult<string[]>> {
  const res = await aws(["eks", "list-nodegroups", "--cluster-name", clusterName], awsProfile, awsRegion);
  return fromShell(res, parseJson(z.object({ nodegroups: z.array(z.string()) }).transform(r => r.nodegroups)));
}

/**
 * Get node group status
 */
export async function describeNodegroup(
  clusterName: string,
  nodegroupName: string,
  awsProfile: string,
  awsRegion: string
): Promise<CallResult<string>> {
  const res = await aws(
    ["eks", "describe-nodegroup", "--cluster-name", clusterName, "--nodegroup-name", nodegroupName],
    awsProfile,
    awsRegion
  );
  return fromShell(res, parseJson(z.object({ nodegroup: z.object({ status: z.string() }) }).transform(r => r.nodegroup.status)));
}

export async function deleteNodegroup(clusterName: string, nodegroupName: string, awsProfile: string, awsRegion: string): Promise<CallResult> {
  return fromShellVoid(await aws(
    ["eks", "delete-nodegroup", "--cluster-name", clusterName, "--nodegroup-name", nodegroupName],
    awsProfile,
    awsRegion
  ));
}

/**
 * Point the local kubeconfig at the cluster so kubectl and helm can reach it.
 */
export async function updateKubeconfig(clusterName: string, awsProfile: string, awsRegion: string) {
  return aws(["eks", "update-kubeconfig", "--name", clusterName, "--region", awsRegion], awsProfile, awsRegion);
}
