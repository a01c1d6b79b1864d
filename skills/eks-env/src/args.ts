import type { z } from "zod";
import { DeployInputSchema, StatusInputSchema, TeardownInputSchema } from "./schema.js";
import { splitDnsOverride } from "./tools/hosts.js";
import type { Blocker } from "./tools/errors.js";

export type ParsedArgs = {
  command?: string;
  positionals: string[];
  /** Every value given for a flag, in order; a bare boolean flag reads as "true". */
  flags: Record<string, string[]>;
};

const BOOLEAN_FLAGS = new Set([
  "force",
  "dry-run",
  "delete-hosted-zone",
  "no-alb-controller",
  "overwrite-env",
  "help",
]);

export function parseArgs(argv: string[]): ParsedArgs {
  const out: ParsedArgs = { positionals: [], flags: {} };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? "";
    if (!a.startsWith("--")) {
      if (out.command === undefined) out.command = a;
      else out.positionals.push(a);
      continue;
    }

    const eq = a.indexOf("=");
    let key = a.slice(2);
    let val: string;
    if (eq !== -1) {
      key = a.slice(2, eq);
      val = a.slice(eq + 1);
    } else {
      const next = argv[i + 1];
      if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith("--")) {
        val = next;
        i++;
      } else {
        val = "true";
      }
    }
    out.flags[key] = [...(out.flags[key] ?? []), val];
  }
  return out;
}

function flag(args: ParsedArgs, key: string): string | undefined {
  const values = args.flags[key];
  return values?.[values.length - 1];
}

function flagList(args: ParsedArgs, key: string): string[] | undefined {
  const values = args.flags[key];
  return values && values.length > 0 ? values : undefined;
}

function flagBool(args: ParsedArgs, key: string): boolean | undefined {
  const value = flag(args, key);
  return value === undefined ? undefined : value !== "false";
}

const truthy = (value: string | undefined) =>
  value === undefined ? undefined : ["1", "true", "yes"].includes(value.toLowerCase());

const csv = (value: string | undefined) =>
  value === undefined ? undefined : value.split(",").map(v => v.trim()).filter(Boolean);

export type Validated<T> = { ok: true; input: T } | { ok: false; blockers: Blocker[] };

function validate<S extends z.ZodTypeAny>(schema: S, raw: unknown): Validated<z.output<S>> {
  const parsed = schema.safeParse(raw);
  if (parsed.success) return { ok: true, input: parsed.data };
  return {
    ok: false,
    blockers: parsed.error.issues.map(issue => ({
      code: "INVALID_INPUT",
      message: `${issue.path.join(".") || "input"}: ${issue.message}`,
    })),
  };
}

type EnvValues = Record<string, string | undefined>;

// CLI flags win over the env file; whatever neither sets falls back to the schema default
function environment(args: ParsedArgs, env: EnvValues) {
  return {
    awsProfile: flag(args, "profile") ?? env.AWS_PROFILE,
    awsRegion: flag(args, "region") ?? env.AWS_REGION,
    vpcTag: flag(args, "vpc-tag") ?? env.VPC_TAG,
    clusterName: flag(args, "cluster") ?? env.CLUSTER_NAME,
    terraformDir: flag(args, "terraform-dir") ?? env.TERRAFORM_DIR,
  };
}

const TIMING_KEYS = {
  pollIntervalMs: "POLL_INTERVAL_MS",
  retryIntervalMs: "RETRY_INTERVAL_MS",
  retryMaxWaitMs: "RETRY_MAX_WAIT_MS",
  lbSettleMs: "LB_SETTLE_MS",
  eniWaitMs: "ENI_WAIT_MS",
  nodegroupWaitMs: "NODEGROUP_WAIT_MS",
  clusterWaitMs: "CLUSTER_WAIT_MS",
  natWaitMs: "NAT_WAIT_MS",
};

function timings(env: EnvValues): Record<string, string | undefined> {
  return Object.fromEntries(Object.entries(TIMING_KEYS).map(([field, key]) => [field, env[key]]));
}

export function buildTeardownInput(args: ParsedArgs, env: EnvValues = {}) {
  const overrides = flagList(args, "dns-override") ?? csv(env.DNS_OVERRIDES);
  return validate(TeardownInputSchema, {
    ...environment(args, env),
    force: flagBool(args, "force") ?? truthy(env.FORCE_DETACH_ENIS),
    dryRun: flagBool(args, "dry-run"),
    hostedZone: flag(args, "hosted-zone") ?? env.HOSTED_ZONE,
    deleteHostedZone: flagBool(args, "delete-hosted-zone") ?? truthy(env.DELETE_HOSTED_ZONE),
    escalationTargets: flagList(args, "escalation-target") ?? csv(env.ESCALATION_TARGETS),
    dnsOverrides: overrides?.map(splitDnsOverride),
    hostsPath: flag(args, "hosts-file"),
    timings: timings(env),
  });
}

export function buildStatusInput(args: ParsedArgs, env: EnvValues = {}) {
  return validate(StatusInputSchema, {
    ...environment(args, env),
    hostedZone: flag(args, "hosted-zone") ?? env.HOSTED_ZONE,
  });
}

export function buildDeployInput(args: ParsedArgs, env: EnvValues = {}) {
  return validate(DeployInputSchema, {
    ...environment(args, env),
    chartDir: flag(args, "chart-dir") ?? env.CHART_DIR,
    release: flag(args, "release") ?? env.RELEASE_NAME,
    namespace: flag(args, "namespace") ?? env.NAMESPACE,
    ingressName: flag(args, "ingress") ?? env.INGRESS_NAME,
    albController: flagBool(args, "no-alb-controller") === true ? false : undefined,
    outputEnvPath: flag(args, "output-env"),
    overwriteEnv: flagBool(args, "overwrite-env"),
    pollIntervalMs: env.POLL_INTERVAL_MS,
    nodeReadyWaitMs: env.NODE_READY_WAIT_MS,
    ingressWaitMs: env.INGRESS_WAIT_MS,
  });
}
