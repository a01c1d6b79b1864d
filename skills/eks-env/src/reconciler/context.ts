import type { Clock } from "../tools/poll.js";
import type { Inventory } from "./discovery.js";
import type { Ledger } from "./ledger.js";
import type { CloudApi, HostedZone } from "./types.js";

export type Timings = {
  pollIntervalMs: number;
  retryIntervalMs: number;
  retryMaxWaitMs: number;
  lbSettleMs: number;
  eniWaitMs: number;
  nodegroupWaitMs: number;
  clusterWaitMs: number;
  natWaitMs: number;
};

export type TeardownPolicy = {
  /** Detach in-use network interfaces and delete them instead of leaving them in place. */
  forceDetachEnis: boolean;
  deleteHostedZone: boolean;
};

/**
 * Everything a deletion phase reads or writes.
 */
export type ReconcileContext = {
  cloud: CloudApi;
  clock: Clock;
  timings: Timings;
  policy: TeardownPolicy;
  ledger: Ledger;
  inventory: Inventory;
  zone?: HostedZone;
  /** Security group id → the network interface left in place that still uses it. */
  heldSecurityGroups: Map<string, string>;
};
