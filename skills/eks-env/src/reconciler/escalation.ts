import { describeResult } from "../tools/errors.js";
import { withHostsOverride, type DnsOverride } from "../tools/hosts.js";
import type { Provisioner } from "./types.js";

export type StrategyName = "refresh-disabled" | "targeted" | "imperative";

export type StrategyReport = {
  strategy: StrategyName;
  status: "succeeded" | "failed" | "skipped";
  detail?: string;
};

export type EscalationOptions = {
  provisioner: Provisioner;
  /** Provisioning-tool addresses that often block a full destroy. */
  targets: string[];
  dnsOverrides: DnsOverride[];
  hostsPath?: string;
  /** Direct deletion of the stuck resources; resolves true when none are left. */
  imperative: () => Promise<boolean>;
};

export type EscalationResult = {
  succeeded: boolean;
  strategies: StrategyReport[];
};

async function refreshDisabled(provisioner: Provisioner): Promise<StrategyReport> {
  console.error("⏳ Escalation 1/3: destroy with refresh disabled...");
  const result = await provisioner.destroy({ refresh: false });
  if (result.status === "succeeded") {
    console.error("✓ Destroy with refresh disabled succeeded");
    return { strategy: "refresh-disabled", status: "succeeded" };
  }
  console.error(`⚠️  Destroy with refresh disabled failed: ${describeResult(result)}`);
  return { strategy: "refresh-disabled", status: "failed", detail: describeResult(result) };
}

/**
 * Only targets the state still knows about are destroyed. When the state
 * cannot be listed every configured target is tried.
 */
async function targeted(provisioner: Provisioner, configured: string[]): Promise<StrategyReport> {
  if (configured.length === 0) {
    console.error("⏭️  Escalation 2/3: no escalation targets configured, skipping");
    return { strategy: "targeted", status: "skipped", detail: "no escalation targets configured" };
  }

  console.error("⏳ Escalation 2/3: targeted destroys, then a full destroy...");
  const listed = await provisioner.stateList();
  const targets = listed.status === "succeeded"
    ? configured.filter(t => listed.value.includes(t))
    : configured;

  for (const target of targets) {
    const result = await provisioner.destroy({ targets: [target] });
    if (result.status === "succeeded") {
      console.error(`   ✓ Destroyed ${target}`);
    } else {
      console.error(`   ⚠️  Targeted destroy of ${target} failed: ${describeResult(result)}`);
    }
  }

  const full = await provisioner.destroy();
  if (full.status === "succeeded") {
    console.error("✓ Full destroy succeeded after targeted destroys");
    return { strategy: "targeted", status: "succeeded", detail: `targets: ${targets.join(", ") || "none in state"}` };
  }
  console.error(`⚠️  Full destroy still failing: ${describeResult(full)}`);
  return { strategy: "targeted", status: "failed", detail: describeResult(full) };
}

/**
 * Fallback strategies after the primary destroy failed, in order, stopping at
 * the first that succeeds. DNS overrides are in place only while the
 * provisioning tool runs and are removed on every exit path.
 */
export async function escalate(options: EscalationOptions): Promise<EscalationResult> {
  const strategies: StrategyReport[] = [];

  const declarativeSucceeded = await withHostsOverride(options.dnsOverrides, async () => {
    const first = await refreshDisabled(options.provisioner);
    strategies.push(first);
    if (first.status === "succeeded") return true;

    const second = await targeted(options.provisioner, options.targets);
    strategies.push(second);
    return second.status === "succeeded";
  }, { hostsPath: options.hostsPath });

  if (declarativeSucceeded) return { succeeded: true, strategies };

  console.error("⏳ Escalation 3/3: deleting cluster, load balancers and security groups directly...");
  const cleared = await options.imperative();
  strategies.push({
    strategy: "imperative",
    status: cleared ? "succeeded" : "failed",
    detail: cleared ? undefined : "some resources could not be deleted; see remaining",
  });
  if (cleared) console.error("✓ Direct deletion cleared the stuck resources");
  else console.error("❌ Direct deletion left resources behind");

  return { succeeded: cleared, strategies };
}
