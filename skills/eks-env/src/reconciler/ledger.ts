import type { CloudApi, ResourceKind, ResourceRecord, ResourceRef, Scope } from "./types.js";

export type RemainingResource = ResourceRef & { reason: string };

type Entry =
  | { ref: ResourceRef; record?: ResourceRecord; state: "removed" }
  | { ref: ResourceRef; record?: ResourceRecord; state: "remaining"; reason: string };

const keyOf = (ref: ResourceRef) => `${ref.kind}:${ref.id}`;

export function describeScope(scope: Scope): string {
  return scope.vpcId ?? scope.clusterName ?? scope.loadBalancerArn ?? scope.zoneId ?? "environment";
}

/**
 * Latest known deletion state per resource for one run. A later entry for the
 * same resource replaces the earlier one.
 */
export class Ledger {
  private readonly entries = new Map<string, Entry>();

  removed(record: ResourceRecord): void {
    this.entries.set(keyOf(record), { ref: { kind: record.kind, id: record.id }, record, state: "removed" });
  }

  remaining(record: ResourceRecord, reason: string): void {
    this.entries.set(keyOf(record), { ref: { kind: record.kind, id: record.id }, record, state: "remaining", reason });
  }

  /** A kind could not be listed for a scope, so nothing is known about what is left there. */
  unresolved(kind: ResourceKind, scope: Scope, reason: string): void {
    const ref = { kind, id: `(unlisted in ${describeScope(scope)})` };
    this.entries.set(keyOf(ref), { ref, state: "remaining", reason });
  }

  /** Something seen only by the final check, with no deletion attempt behind it. */
  residual(ref: ResourceRef, reason: string): void {
    if (this.entries.get(keyOf(ref))?.state === "remaining") return;
    this.entries.set(keyOf(ref), { ref: { kind: ref.kind, id: ref.id }, state: "remaining", reason });
  }

  isRemoved(ref: ResourceRef): boolean {
    return this.entries.get(keyOf(ref))?.state === "removed";
  }

  get removedRefs(): ResourceRef[] {
    return [...this.entries.values()].flatMap(e => (e.state === "removed" ? [e.ref] : []));
  }

  get remainingRefs(): RemainingResource[] {
    return [...this.entries.values()].flatMap(e => (e.state === "remaining" ? [{ ...e.ref, reason: e.reason }] : []));
  }

  remainingOf(kinds: readonly ResourceKind[]): RemainingResource[] {
    return this.remainingRefs.filter(r => kinds.includes(r.kind));
  }

  /** Remaining entries that carry a record and can be looked up again. */
  remainingRecords(kinds?: readonly ResourceKind[]): ResourceRecord[] {
    return [...this.entries.values()].flatMap(e =>
      e.state === "remaining" && e.record && (!kinds || kinds.includes(e.record.kind)) ? [e.record] : []
    );
  }
}

/**
 * Look up every remaining record once more and move the ones that have since
 * disappeared (removed by the provisioning tool, or finished deleting) to removed.
 */
export async function recheckRemaining(cloud: CloudApi, ledger: Ledger, kinds?: readonly ResourceKind[]): Promise<void> {
  for (const record of ledger.remainingRecords(kinds)) {
    const current = await cloud.describe(record);
    if (current.status === "not-found") ledger.removed(record);
  }
}
