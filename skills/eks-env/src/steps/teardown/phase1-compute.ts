import { deleteResource, recordsFor, waitUntilGone, type Phase } from "../../reconciler/driver.js";

/**
 * Node groups first, then the control plane. Each waits until EKS reports the
 * resource gone; the cluster is still attempted when a node group outlives its wait.
 */
export const computePhase: Phase = {
  name: "compute",
  kinds: ["nodegroup", "cluster"],
  async run(ctx) {
    const nodegroups = await recordsFor(ctx, "nodegroup");
    const requested: typeof nodegroups = [];
    for (const nodegroup of nodegroups) {
      if (await deleteResource(ctx, nodegroup)) requested.push(nodegroup);
    }
    for (const nodegroup of requested) {
      await waitUntilGone(ctx, nodegroup, ctx.timings.nodegroupWaitMs);
    }

    for (const cluster of await recordsFor(ctx, "cluster")) {
      if (await deleteResource(ctx, cluster)) {
        await waitUntilGone(ctx, cluster, ctx.timings.clusterWaitMs);
      }
    }
  },
};
