import { z } from "zod";
import { aws } from "./aws.js";
import { fromShell, fromShellVoid, parseJson, type CallResult } from "./errors.js";

const LoadBalancersSchema = z.object({
  LoadBalancers: z.array(z.object({
    LoadBalancerArn: z.string(),
    LoadBalancerName: z.string().optional(),
    VpcId: z.string().optional(),
    State: z.object({ Code: z.string() }).optional(),
  })),
});

export type LoadBalancerInfo = { arn: string; name?: string; vpcId?: string; state?: string };

const toLoadBalancers = LoadBalancersSchema.transform(r =>
  r.LoadBalancers.map((lb): LoadBalancerInfo => ({
    arn: lb.LoadBalancerArn,
    name: lb.LoadBalancerName,
    vpcId: lb.VpcId,
    state: lb.State?.Code,
  }))
);

/**
 * Application and network load balancers in one VPC. The API has no VPC
 * filter, so the account-wide listing is filtered here.
 */
export async function listLoadBalancers(vpcId: string, awsProfile: string, awsRegion: string): Promise<CallResult<LoadBalancerInfo[]>> {
  const res = await aws(["elbv2", "describe-load-balancers"], awsProfile, awsRegion);
  const parsed = fromShell(res, parseJson(toLoadBalancers));
  if (parsed.status !== "succeeded") return parsed;
  return { status: "succeeded", value: parsed.value.filter(lb => lb.vpcId === vpcId) };
}

export async function describeLoadBalancer(arn: string, awsProfile: string, awsRegion: string): Promise<CallResult<LoadBalancerInfo>> {
  const res = await aws(["elbv2", "describe-load-balancers", "--load-balancer-arns", arn], awsProfile, awsRegion);
  const parsed = fromShell(res, parseJson(toLoadBalancers));
  if (parsed.status !== "succeeded") return parsed;
  const [lb] = parsed.value;
  return lb ? { status: "succeeded", value: lb } : { status: "not-found" };
}

export async function deleteLoadBalancer(arn: string, awsProfile: string, awsRegion: string): Promise<CallResult> {
  return fromShellVoid(await aws(["elbv2", "delete-load-balancer", "--load-balancer-arn", arn], awsProfile, awsRegion));
}

const ListenersSchema = z.object({
  Listeners: z.array(z.object({ ListenerArn: z.string() })),
});

export async function listListeners(loadBalancerArn: string, awsProfile: string, awsRegion: string): Promise<CallResult<string[]>> {
  const res = await aws(["elbv2", "describe-listeners", "--load-balancer-arn", loadBalancerArn], awsProfile, awsRegion);
  return fromShell(res, parseJson(ListenersSchema.transform(r => r.Listeners.map(l => l.ListenerArn))));
}

export async function deleteListener(arn: string, awsProfile: string, awsRegion: string): Promise<CallResult> {
  return fromShellVoid(await aws(["elbv2", "delete-listener", "--listener-arn", arn], awsProfile, awsRegion));
}

const TargetGroupsSchema = z.object({
  TargetGroups: z.array(z.object({ TargetGroupArn: z.string(), VpcId: z.string().optional() })),
});

export async function listTargetGroups(vpcId: string, awsProfile: string, awsRegion: string): Promise<CallResult<string[]>> {
  const res = await aws(["elbv2", "describe-target-groups"], awsProfile, awsRegion);
  return fromShell(res, parseJson(TargetGroupsSchema.transform(r =>
    r.TargetGroups.filter(tg => tg.VpcId === vpcId).map(tg => tg.TargetGroupArn)
  )));
}

export async function deleteTargetGroup(arn: string, awsProfile: string, awsRegion: string): Promise<CallResult> {
  return fromShellVoid(await aws(["elbv2", "delete-target-group", "--target-group-arn", arn], awsProfile, awsRegion));
}
