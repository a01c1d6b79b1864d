import { deleteResource, label, recordsFor, type Phase } from "../../reconciler/driver.js";
import type { ReconcileContext } from "../../reconciler/context.js";
import type { NetworkInterfaceRecord } from "../../reconciler/types.js";
import { pollUntil } from "../../tools/poll.js";
import { formatElapsed } from "../../tools/spinner.js";

type EniState = NetworkInterfaceRecord | "gone" | { error: string };

// Interfaces a load balancer created carry a description like "ELB app/name/id"
export function isLoadBalancerOwned(eni: NetworkInterfaceRecord): boolean {
  return eni.description?.startsWith("ELB ") ?? false;
}

async function currentState(ctx: ReconcileContext, eni: NetworkInterfaceRecord): Promise<EniState> {
  const result = await ctx.cloud.describe(eni);
  if (result.status === "not-found") return "gone";
  if (result.status !== "succeeded") return { error: result.message };
  return result.value.kind === "network-interface" ? result.value : { error: "unexpected record kind" };
}

const settled = (state: EniState) =>
  state === "gone" || "error" in state || state.status === "available";

/**
 * Wait for an interface to be released (detached or deleted), within the ENI budget.
 */
async function waitForRelease(ctx: ReconcileContext, eni: NetworkInterfaceRecord): Promise<EniState> {
  const outcome = await pollUntil(() => currentState(ctx, eni), settled, {
    intervalMs: ctx.timings.pollIntervalMs,
    timeoutMs: ctx.timings.eniWaitMs,
    clock: ctx.clock,
    onWait: (elapsedMs) => {
      process.stderr.write(`   ⏳ Waiting for ${label(eni)} to be released (${formatElapsed(elapsedMs)})\n`);
    },
  });
  return outcome.value;
}

function hold(ctx: ReconcileContext, eni: NetworkInterfaceRecord, reason: string): void {
  ctx.ledger.remaining(eni, reason);
  for (const groupId of eni.securityGroupIds) ctx.heldSecurityGroups.set(groupId, eni.id);
}

/**
 * Available interfaces are deleted. In-use ones are left in place unless the
 * forceful policy is on, in which case they are detached, waited on and deleted.
 */
export const networkInterfacePhase: Phase = {
  name: "network interfaces",
  kinds: ["network-interface"],
  async run(ctx) {
    for (const discovered of await recordsFor(ctx, "network-interface")) {
      let state = await currentState(ctx, discovered);
      if (state !== "gone" && !("error" in state) && state.status !== "available" && isLoadBalancerOwned(state)) {
        state = await waitForRelease(ctx, state);
      }

      if (state === "gone") {
        console.error(`   ✓ ${label(discovered)} already gone`);
        ctx.ledger.removed(discovered);
        continue;
      }
      if ("error" in state) {
        console.error(`   ⚠️  Could not read ${label(discovered)}: ${state.error}`);
        hold(ctx, discovered, `could not be read: ${state.error}`);
        continue;
      }

      if (state.status !== "available") {
        if (!ctx.policy.forceDetachEnis) {
          console.error(`   ⏭️  Skipping ${label(state)} (${state.status}); rerun with --force to detach it`);
          hold(ctx, state, `attached (${state.status}); skipped without --force`);
          continue;
        }

        console.error(`   Detaching ${label(state)}...`);
        const detached = await ctx.cloud.detachNetworkInterface(state);
        if (detached.status !== "succeeded" && detached.status !== "not-found") {
          console.error(`   ⚠️  Detach failed for ${label(state)}: ${detached.message}`);
          hold(ctx, state, `detach failed: ${detached.message}`);
          continue;
        }
        const released = await waitForRelease(ctx, state);
        if (released !== "gone" && ("error" in released || released.status !== "available")) {
          hold(ctx, state, `still attached after ${formatElapsed(ctx.timings.eniWaitMs)}`);
          continue;
        }
      }

      if (!(await deleteResource(ctx, state))) {
        for (const groupId of state.securityGroupIds) ctx.heldSecurityGroups.set(groupId, state.id);
      }
    }
  },
};
