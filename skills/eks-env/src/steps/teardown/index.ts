import type { Phase } from "../../reconciler/driver.js";
import { computePhase } from "./phase1-compute.js";
import { loadBalancerPhase } from "./phase2-load-balancers.js";
import { networkInterfacePhase } from "./phase3-network-interfaces.js";
import { securityGroupPhase } from "./phase4-security-groups.js";
import { networkPhase } from "./phase5-network.js";
import { dnsPhase } from "./phase6-dns.js";

/** Strict order: dependents before the resources they depend on. */
export const TEARDOWN_PHASES: readonly Phase[] = [
  computePhase,
  loadBalancerPhase,
  networkInterfacePhase,
  securityGroupPhase,
  networkPhase,
  dnsPhase,
];

/** The highest-value stuck resources, deleted directly when every declarative destroy has failed. */
export const ESCALATION_PHASES: readonly Phase[] = [
  computePhase,
  loadBalancerPhase,
  securityGroupPhase,
];
