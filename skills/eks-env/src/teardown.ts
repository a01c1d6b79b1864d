import { createAwsCloud } from "./reconciler/aws-cloud.js";
import { countRecords, discover, type DiscoveryResult } from "./reconciler/discovery.js";
import type { ReconciliationOutcome } from "./reconciler/outcome.js";
import { reconcile } from "./reconciler/reconcile.js";
import { createTerraformProvisioner } from "./reconciler/terraform-provisioner.js";
import type { CloudApi, Provisioner, ResourceRecord } from "./reconciler/types.js";
import type { TeardownInput } from "./schema.js";
import { validateAwsAuth } from "./steps/auth.js";
import { checkTools, type Tool } from "./steps/checks.js";
import { TEARDOWN_PHASES } from "./steps/teardown/index.js";
import { DEFAULT_SECURITY_GROUP } from "./steps/teardown/phase4-security-groups.js";
import { isProtectedRecord } from "./steps/teardown/phase6-dns.js";
import { awsEnv } from "./tools/aws.js";
import type { Blocker } from "./tools/errors.js";
import { systemClock, type Clock } from "./tools/poll.js";

export type TeardownResult = {
  status: "clean" | "partial" | "failed" | "aborted" | "planned";
  plan?: string;
  outcome?: ReconciliationOutcome;
  blockers?: Blocker[];
  remediation?: string[];
};

export type TeardownDeps = {
  cloud: CloudApi;
  provisioner: Provisioner;
  clock: Clock;
  /** Hard errors that stop the run before anything is touched. */
  preflight: () => Promise<{ blockers: Blocker[]; remediation: string[] }>;
};

export function defaultTeardownDeps(input: TeardownInput): TeardownDeps {
  const provisioner = createTerraformProvisioner(input.terraformDir, awsEnv(input.awsProfile, input.awsRegion));
  return {
    cloud: createAwsCloud(input.awsProfile, input.awsRegion),
    provisioner,
    clock: systemClock,
    async preflight() {
      const tools: Tool[] = provisioner.available() ? ["aws", "terraform"] : ["aws"];
      const blockers = await checkTools(tools);
      if (blockers.some(b => b.code === "AWS_UNAVAILABLE")) return { blockers, remediation: [] };

      const auth = await validateAwsAuth(input.awsProfile, input.awsRegion);
      if (!auth.ok) {
        return { blockers: [...blockers, ...auth.blockers], remediation: auth.remediation.map(r => r.message) };
      }
      console.error(`   ✓ Authenticated as ${auth.arn}`);
      return { blockers, remediation: [] };
    },
  };
}

function describeRecord(record: ResourceRecord): string {
  switch (record.kind) {
    case "security-group":
      return `${record.id} (${record.groupName})`;
    case "network-interface":
      return `${record.id} (${record.status ?? "unknown"}${record.attachmentId ? ", attached" : ""})`;
    case "route-table":
      return record.main ? `${record.id} (main, removed with the VPC)` : record.id;
    case "dns-record":
      return `${record.name} ${record.type}`;
    default:
      return record.status ? `${record.id} (${record.status})` : record.id;
  }
}

function keptByPolicy(record: ResourceRecord, discovery: DiscoveryResult, input: TeardownInput): string | undefined {
  if (record.kind === "security-group" && record.groupName === DEFAULT_SECURITY_GROUP) return "VPC default group";
  if (record.kind === "dns-record" && isProtectedRecord(record, discovery.zone)) return "zone apex";
  if (record.kind === "hosted-zone" && !input.deleteHostedZone) return "kept without --delete-hosted-zone";
  if (record.kind === "network-interface" && record.attachmentId && !input.force) return "attached; skipped without --force";
  return undefined;
}

export function renderTeardownPlan(discovery: DiscoveryResult, input: TeardownInput): string {
  const lines: string[] = [
    "═".repeat(80),
    "TEARDOWN PLAN",
    "═".repeat(80),
    `Region:      ${input.awsRegion}`,
    `VPC:         ${discovery.vpcIds.length > 0 ? `${discovery.vpcIds.join(", ")} (from ${discovery.vpcSource})` : `none tagged Name=${input.vpcTag}`}`,
    `Cluster:     ${discovery.clusterNames.join(", ") || "none"}`,
    `ENI policy:  ${input.force ? "detach and delete attached interfaces" : "skip attached interfaces"}`,
    "",
  ];

  for (const [index, phase] of TEARDOWN_PHASES.entries()) {
    lines.push(`Phase ${index + 1}: ${phase.name}`);
    let any = false;
    for (const kind of phase.kinds) {
      const slot = discovery.inventory[kind];
      for (const record of slot.records) {
        any = true;
        const kept = keptByPolicy(record, discovery, input);
        lines.push(`  ${kept ? "-" : "✗"} ${kind} ${describeRecord(record)}${kept ? ` [${kept}]` : ""}`);
      }
      if (slot.unknown.length > 0) {
        any = true;
        lines.push(`  ? ${kind}: listing failed, will be listed again`);
      }
    }
    if (!any) lines.push("  (nothing found)");
  }

  lines.push("");
  lines.push(`Then: terraform destroy in ${input.terraformDir}, escalating on failure` +
    (input.escalationTargets.length > 0 ? ` (targets: ${input.escalationTargets.join(", ")})` : ""));
  lines.push("═".repeat(80));
  return lines.join("\n");
}

function printSummary(outcome: ReconciliationOutcome): void {
  console.error("\n" + "=".repeat(80));
  console.error("📊 Teardown Summary");
  console.error("=".repeat(80));
  console.error(`Removed:       ${outcome.removed.length}`);
  console.error(`Remaining:     ${outcome.remaining.length}`);
  console.error(`Terraform:     ${outcome.declarative.primary}${outcome.declarative.detail ? ` (${outcome.declarative.detail})` : ""}`);
  for (const step of outcome.declarative.escalation) {
    console.error(`  ${step.strategy}: ${step.status}${step.detail ? ` (${step.detail})` : ""}`);
  }
  console.error(`Verification:  ${outcome.verification.status}`);
  console.error("=".repeat(80));

  if (outcome.status === "clean") {
    console.error("\n✓ Environment is clean");
    return;
  }
  console.error(outcome.status === "failed"
    ? "\n❌ Teardown failed; these resources need manual follow-up:"
    : "\n⚠️  Teardown finished with resources left behind:");
  for (const r of outcome.remaining) {
    console.error(`  - ${r.kind} ${r.id}: ${r.reason}`);
  }
}

/**
 * Tear the environment down. Preflight failures abort before anything is
 * touched; every later failure is reported in the outcome instead.
 */
export async function runTeardown(input: TeardownInput, deps: TeardownDeps = defaultTeardownDeps(input)): Promise<TeardownResult> {
  console.error("⏳ Running preflight...");
  const preflight = await deps.preflight();
  if (preflight.blockers.length > 0) {
    for (const b of preflight.blockers) console.error(`❌ ${b.message}`);
    for (const line of preflight.remediation) console.error(line);
    return { status: "aborted", blockers: preflight.blockers, remediation: preflight.remediation };
  }
  console.error("✓ Preflight passed");

  const target = { vpcTag: input.vpcTag, clusterName: input.clusterName, hostedZone: input.hostedZone };

  if (input.dryRun) {
    const discovery = await discover(deps.cloud, target, deps.provisioner);
    const plan = renderTeardownPlan(discovery, input);
    console.error(`\n${plan}`);
    console.error(`\n${countRecords(discovery.inventory)} resource(s) found. Run again without --dry-run to delete them.`);
    return { status: "planned", plan };
  }

  const outcome = await reconcile(
    { cloud: deps.cloud, provisioner: deps.provisioner, clock: deps.clock, hostsPath: input.hostsPath },
    {
      target,
      timings: input.timings,
      policy: { forceDetachEnis: input.force, deleteHostedZone: input.deleteHostedZone },
      escalationTargets: input.escalationTargets,
      dnsOverrides: input.dnsOverrides,
    }
  );

  printSummary(outcome);
  return { status: outcome.status, outcome };
}

export function exitCodeFor(status: TeardownResult["status"]): number {
  switch (status) {
    case "clean":
    case "planned":
      return 0;
    case "partial":
      return 2;
    case "failed":
    case "aborted":
      return 1;
  }
}
