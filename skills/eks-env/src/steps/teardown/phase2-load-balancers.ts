import { deleteResource, recordsFor, type Phase } from "../../reconciler/driver.js";
import { formatElapsed } from "../../tools/spinner.js";

/**
 * Listeners and load balancers are requested without waiting on each one. One
 * settle delay follows the batch, since the network interfaces a load balancer
 * owns are released asynchronously; target groups come after it.
 */
export const loadBalancerPhase: Phase = {
  name: "load balancers",
  kinds: ["listener", "load-balancer", "target-group"],
  async run(ctx) {
    for (const listener of await recordsFor(ctx, "listener")) {
      await deleteResource(ctx, listener);
    }

    let requested = 0;
    for (const lb of await recordsFor(ctx, "load-balancer")) {
      if (await deleteResource(ctx, lb)) requested++;
    }
    if (requested > 0 && ctx.timings.lbSettleMs > 0) {
      console.error(`   ⏳ Letting ${requested} load balancer(s) release their interfaces (${formatElapsed(ctx.timings.lbSettleMs)})...`);
      await ctx.clock.sleep(ctx.timings.lbSettleMs);
    }

    for (const targetGroup of await recordsFor(ctx, "target-group")) {
      await deleteResource(ctx, targetGroup);
    }
  },
};
