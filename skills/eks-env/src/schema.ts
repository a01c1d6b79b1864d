import { z } from "zod";

const ms = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

export const DnsOverrideSchema = z.object({
  host: z.string().min(1),
  ip: z.string().ip(),
});

export const TimingsSchema = z
  .object({
    pollIntervalMs: ms(10_000),
    retryIntervalMs: ms(10_000),
    retryMaxWaitMs: ms(120_000),
    lbSettleMs: ms(30_000),
    eniWaitMs: ms(300_000),
    nodegroupWaitMs: ms(600_000),
    clusterWaitMs: ms(900_000),
    natWaitMs: ms(300_000),
  })
  .default({});

const EnvironmentSchema = z.object({
  awsProfile: z.string().default(""), // empty: default credential chain
  awsRegion: z.string().min(1).default("us-east-1"),
  vpcTag: z.string().min(1).default("eks-vpc"),
  clusterName: z.string().min(1).optional(), // if omitted, taken from terraform output or the VPC
  terraformDir: z.string().min(1).default("./terraform"),
});

export const TeardownInputSchema = EnvironmentSchema.extend({
  force: z.boolean().default(false), // detach in-use network interfaces and delete them
  dryRun: z.boolean().default(false),
  hostedZone: z.string().min(1).optional(), // zone id or domain name
  deleteHostedZone: z.boolean().default(false),
  escalationTargets: z.array(z.string().min(1)).default([]),
  dnsOverrides: z.array(DnsOverrideSchema).default([]),
  hostsPath: z.string().default("/etc/hosts"),
  timings: TimingsSchema,
});

export type TeardownInput = z.infer<typeof TeardownInputSchema>;

export const StatusInputSchema = EnvironmentSchema.extend({
  hostedZone: z.string().min(1).optional(),
});

export type StatusInput = z.infer<typeof StatusInputSchema>;

export const DeployInputSchema = EnvironmentSchema.extend({
  chartDir: z.string().min(1).default("./chart"),
  release: z.string().min(1).default("app"),
  namespace: z.string().min(1).default("default"),
  ingressName: z.string().min(1).optional(), // defaults to "<release>-ingress"
  albController: z.boolean().default(true),
  nodeReadyWaitMs: ms(300_000),
  ingressWaitMs: ms(300_000),
  pollIntervalMs: ms(10_000),
  outputEnvPath: z.string().optional(),
  overwriteEnv: z.boolean().default(false),
});

export type DeployInput = z.infer<typeof DeployInputSchema>;
