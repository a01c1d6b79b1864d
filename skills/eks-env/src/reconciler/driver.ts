import { describeResult, OK, type CallResult } from "../tools/errors.js";
import { pollUntil } from "../tools/poll.js";
import { formatElapsed } from "../tools/spinner.js";
import type { ReconcileContext } from "./context.js";
import type { RecordOf, ResourceKind, ResourceRecord } from "./types.js";

/**
 * One step of the teardown. Phases run strictly in list order.
 */
export type Phase = {
  name: string;
  /** Kinds this phase deletes, used for plans and for failure bookkeeping. */
  kinds: readonly ResourceKind[];
  run(ctx: ReconcileContext): Promise<void>;
};

export function label(record: ResourceRecord): string {
  return `${record.kind} ${record.id}`;
}

/**
 * Records to delete for a kind: the discovered ones plus a fresh listing of
 * every scope discovery could not list. A scope that still cannot be listed
 * is recorded as unresolved.
 */
export async function recordsFor<K extends ResourceKind>(ctx: ReconcileContext, kind: K): Promise<RecordOf<K>[]> {
  const slot = ctx.inventory[kind];
  const records: RecordOf<K>[] = [...slot.records];

  for (const scope of slot.unknown) {
    const result = await ctx.cloud.list(kind, scope);
    if (result.status === "succeeded") {
      records.push(...result.value.filter(r => !records.some(known => known.id === r.id)));
    } else if (result.status !== "not-found") {
      ctx.ledger.unresolved(kind, scope, `could not be listed: ${result.message}`);
    }
  }
  return records;
}

const isRetryable = (result: CallResult) => result.status === "blocked" || result.status === "transient";

/**
 * Delete one resource. Not-found counts as removed; blocked and transient
 * results are retried until the retry budget runs out; anything else is
 * recorded as remaining. Never throws for a remote failure.
 */
export async function deleteResource(ctx: ReconcileContext, record: ResourceRecord): Promise<boolean> {
  const { retryIntervalMs, retryMaxWaitMs } = ctx.timings;
  let last: CallResult = OK;

  const outcome = await pollUntil(
    async () => (last = await ctx.cloud.remove(record)),
    result => !isRetryable(result),
    {
      intervalMs: retryIntervalMs,
      timeoutMs: retryMaxWaitMs,
      clock: ctx.clock,
      onWait: (elapsedMs) => {
        console.error(`   ⏳ ${label(record)}: ${describeResult(last)} (retrying, ${formatElapsed(elapsedMs)} so far)`);
      },
    }
  );

  const result = outcome.value;
  switch (result.status) {
    case "succeeded":
      console.error(`   ✓ Deleted ${label(record)}`);
      ctx.ledger.removed(record);
      return true;
    case "not-found":
      console.error(`   ✓ ${label(record)} already gone`);
      ctx.ledger.removed(record);
      return true;
    case "blocked":
    case "transient":
      console.error(`   ⚠️  ${label(record)} still ${result.status} after ${formatElapsed(outcome.elapsedMs)}: ${result.message}`);
      ctx.ledger.remaining(record, `${result.status}: ${result.message}`);
      return false;
    case "fatal":
      console.error(`   ❌ ${label(record)}: ${result.message}`);
      ctx.ledger.remaining(record, `fatal: ${result.message}`);
      return false;
  }
}

/**
 * Wait until a record no longer exists. A timeout or a failing lookup marks it
 * remaining and the caller carries on with the next step.
 */
export async function waitUntilGone(ctx: ReconcileContext, record: ResourceRecord, timeoutMs: number): Promise<boolean> {
  const outcome = await pollUntil(
    () => ctx.cloud.describe(record),
    result => result.status === "not-found" || result.status === "fatal",
    {
      intervalMs: ctx.timings.pollIntervalMs,
      timeoutMs,
      clock: ctx.clock,
      onWait: (elapsedMs) => {
        process.stderr.write(`   ⏳ Waiting for ${label(record)} to be deleted (${formatElapsed(elapsedMs)})\n`);
      },
    }
  );
  const last = outcome.value;
  if (last.status === "not-found") {
    console.error(`   ✓ ${label(record)} gone after ${formatElapsed(outcome.elapsedMs)}`);
    return true;
  }
  if (last.status === "fatal") {
    console.error(`   ❌ Could not check ${label(record)}: ${last.message}`);
    ctx.ledger.remaining(record, `fatal: ${last.message}`);
    return false;
  }
  console.error(`   ⚠️  ${label(record)} still present after ${formatElapsed(outcome.elapsedMs)}`);
  ctx.ledger.remaining(record, `deletion did not finish within ${formatElapsed(timeoutMs)}`);
  return false;
}

/**
 * Run phases in order. An unexpected exception inside a phase is logged and
 * every record of that phase not yet removed is recorded as remaining; the
 * next phase still runs.
 */
export async function runPhases(phases: readonly Phase[], ctx: ReconcileContext): Promise<void> {
  for (const [index, phase] of phases.entries()) {
    console.error(`\n⏳ Phase ${index + 1}/${phases.length}: ${phase.name}`);
    try {
      await phase.run(ctx);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`❌ Phase ${phase.name} failed: ${message}`);
      for (const kind of phase.kinds) {
        for (const record of ctx.inventory[kind].records) {
          if (!ctx.ledger.isRemoved(record)) ctx.ledger.remaining(record, `phase ${phase.name} failed: ${message}`);
        }
      }
    }
  }
}
