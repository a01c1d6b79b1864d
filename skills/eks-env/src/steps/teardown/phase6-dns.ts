import { deleteResource, label, recordsFor, type Phase } from "../../reconciler/driver.js";
import type { DnsRecord, HostedZone } from "../../reconciler/types.js";

const withDot = (name: string) => (name.endsWith(".") ? name : `${name}.`);

/**
 * The NS and SOA records at the zone apex exist for as long as the zone does
 * and cannot be deleted.
 */
export function isProtectedRecord(record: DnsRecord, zone: HostedZone | undefined): boolean {
  if (record.type !== "NS" && record.type !== "SOA") return false;
  return zone === undefined || withDot(record.name).toLowerCase() === withDot(zone.name).toLowerCase();
}

/**
 * Zone records other than the apex NS/SOA pair. The hosted zone itself is
 * deleted only when asked to and only once all of its other records are gone.
 */
export const dnsPhase: Phase = {
  name: "dns",
  kinds: ["dns-record", "hosted-zone"],
  async run(ctx) {
    const records = (await recordsFor(ctx, "dns-record")).filter(r => !isProtectedRecord(r, ctx.zone));
    let allRemoved = true;
    for (const record of records) {
      if (!(await deleteResource(ctx, record))) allRemoved = false;
    }

    if (!ctx.policy.deleteHostedZone) return;
    for (const zone of await recordsFor(ctx, "hosted-zone")) {
      if (!allRemoved) {
        console.error(`   ⏭️  Keeping ${label(zone)}: some of its records could not be deleted`);
        ctx.ledger.remaining(zone, "records left in the zone");
        continue;
      }
      await deleteResource(ctx, zone);
    }
  },
};
