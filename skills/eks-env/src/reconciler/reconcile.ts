import { ESCALATION_PHASES, TEARDOWN_PHASES } from "../steps/teardown/index.js";
import { describeResult } from "../tools/errors.js";
import type { DnsOverride } from "../tools/hosts.js";
import type { Clock } from "../tools/poll.js";
import type { ReconcileContext, TeardownPolicy, Timings } from "./context.js";
import { discover, type DiscoveryResult, type DiscoveryTarget } from "./discovery.js";
import { runPhases } from "./driver.js";
import { escalate } from "./escalation.js";
import { Ledger, recheckRemaining } from "./ledger.js";
import { buildOutcome, type DeclarativeReport, type ReconciliationOutcome } from "./outcome.js";
import type { CloudApi, Provisioner } from "./types.js";
import { verify } from "./verification.js";

export type ReconcileDeps = {
  cloud: CloudApi;
  /** Absent, or not available, when there is no provisioning configuration to destroy. */
  provisioner?: Provisioner;
  clock: Clock;
  hostsPath?: string;
};

export type ReconcileOptions = {
  target: DiscoveryTarget;
  timings: Timings;
  policy: TeardownPolicy;
  escalationTargets: string[];
  dnsOverrides: DnsOverride[];
};

/** Ledger and held security groups are shared by every pass of one run. */
type RunState = Pick<ReconcileContext, "ledger" | "heldSecurityGroups">;

function contextFor(deps: ReconcileDeps, options: ReconcileOptions, run: RunState, discovery: DiscoveryResult): ReconcileContext {
  return {
    cloud: deps.cloud,
    clock: deps.clock,
    timings: options.timings,
    policy: options.policy,
    ledger: run.ledger,
    inventory: discovery.inventory,
    zone: discovery.zone,
    heldSecurityGroups: run.heldSecurityGroups,
  };
}

async function runDeclarative(deps: ReconcileDeps, options: ReconcileOptions, run: RunState): Promise<DeclarativeReport> {
  const { provisioner } = deps;
  const { ledger } = run;
  if (!provisioner?.available()) {
    console.error("\n⏭️  No provisioning configuration found; skipping declarative destroy");
    return { primary: "skipped", detail: "no provisioning configuration", escalation: [], exhausted: false };
  }

  console.error("\n⏳ Destroying remaining infrastructure with terraform...");
  const primary = await provisioner.destroy();
  if (primary.status === "succeeded") {
    console.error("✓ Terraform destroy completed");
    return { primary: "succeeded", escalation: [], exhausted: false };
  }
  console.error(`⚠️  Terraform destroy failed: ${describeResult(primary)}`);

  const escalation = await escalate({
    provisioner,
    targets: options.escalationTargets,
    dnsOverrides: options.dnsOverrides,
    hostsPath: deps.hostsPath,
    imperative: async () => {
      const fresh = await discover(deps.cloud, options.target, provisioner);
      await runPhases(ESCALATION_PHASES, contextFor(deps, options, run, fresh));
      const kinds = ESCALATION_PHASES.flatMap(p => p.kinds);
      await recheckRemaining(deps.cloud, ledger, kinds);
      return ledger.remainingOf(kinds).length === 0;
    },
  });

  return {
    primary: "failed",
    detail: describeResult(primary),
    escalation: escalation.strategies,
    exhausted: !escalation.succeeded,
  };
}

/**
 * Bring the environment down: discover, delete in dependency order, run the
 * declarative destroy (escalating when it fails), then verify once.
 * Remote failures never abort the run; they end up in the outcome.
 */
export async function reconcile(deps: ReconcileDeps, options: ReconcileOptions): Promise<ReconciliationOutcome> {
  const ledger = new Ledger();
  const run: RunState = { ledger, heldSecurityGroups: new Map() };
  const discovery = await discover(deps.cloud, options.target, deps.provisioner);
  for (const u of discovery.unresolved) ledger.unresolved(u.kind, u.scope, u.reason);

  await runPhases(TEARDOWN_PHASES, contextFor(deps, options, run, discovery));

  const declarative = await runDeclarative(deps, options, run);

  await recheckRemaining(deps.cloud, ledger);
  const verification = await verify(deps.cloud, {
    vpcTag: options.target.vpcTag,
    vpcIds: discovery.vpcIds,
    clusterNames: discovery.clusterNames,
  });

  const outcome = buildOutcome(ledger, declarative, verification, discovery.warnings);
  if (outcome.status === "clean" && deps.provisioner?.available()) {
    outcome.stateFilesRemoved = await deps.provisioner.removeStateFiles();
  }
  return outcome;
}
