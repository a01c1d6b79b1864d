import { deleteResource, label, recordsFor, type Phase } from "../../reconciler/driver.js";

/** Every VPC has one; AWS removes it together with the VPC. */
export const DEFAULT_SECURITY_GROUP = "default";

/**
 * Security groups other than the VPC default. Groups still used by an
 * interface that was left in place are not attempted; the rest are retried
 * while AWS reports a dependency.
 */
export const securityGroupPhase: Phase = {
  name: "security groups",
  kinds: ["security-group"],
  async run(ctx) {
    const groups = (await recordsFor(ctx, "security-group")).filter(sg => sg.groupName !== DEFAULT_SECURITY_GROUP);
    for (const group of groups) {
      const heldBy = ctx.heldSecurityGroups.get(group.id);
      if (heldBy) {
        console.error(`   ⏭️  Skipping ${label(group)} (${group.groupName}): still used by ${heldBy}`);
        ctx.ledger.remaining(group, `still used by network-interface ${heldBy}`);
        continue;
      }
      await deleteResource(ctx, group);
    }
  },
};
