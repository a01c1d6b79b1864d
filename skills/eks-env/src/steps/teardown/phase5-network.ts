import { deleteResource, recordsFor, waitUntilGone, type Phase } from "../../reconciler/driver.js";

/**
 * NAT gateways (waited on until deleted), their elastic IPs, internet
 * gateways, subnets, non-main route tables and finally the VPC.
 */
export const networkPhase: Phase = {
  name: "network",
  kinds: ["nat-gateway", "elastic-ip", "internet-gateway", "subnet", "route-table", "vpc"],
  async run(ctx) {
    const nats = await recordsFor(ctx, "nat-gateway");
    const requested: typeof nats = [];
    for (const nat of nats) {
      if (await deleteResource(ctx, nat)) requested.push(nat);
    }
    for (const nat of requested) {
      await waitUntilGone(ctx, nat, ctx.timings.natWaitMs);
    }

    for (const eip of await recordsFor(ctx, "elastic-ip")) {
      await deleteResource(ctx, eip);
    }
    for (const igw of await recordsFor(ctx, "internet-gateway")) {
      await deleteResource(ctx, igw);
    }
    for (const subnet of await recordsFor(ctx, "subnet")) {
      await deleteResource(ctx, subnet);
    }
    // The main route table goes away with its VPC
    for (const table of (await recordsFor(ctx, "route-table")).filter(rt => !rt.main)) {
      await deleteResource(ctx, table);
    }
    for (const vpc of await recordsFor(ctx, "vpc")) {
      await deleteResource(ctx, vpc);
    }
  },
};
