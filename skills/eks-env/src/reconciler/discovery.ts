import { describeResult } from "../tools/errors.js";
import type { CloudApi, HostedZone, Provisioner, RecordOf, ResourceKind, Scope } from "./types.js";

export type KindInventory<K extends ResourceKind> = {
  records: RecordOf<K>[];
  /** Scopes whose listing failed; deletion lists them again and tolerates not-found. */
  unknown: Scope[];
};

export type Inventory = { [K in ResourceKind]: KindInventory<K> };

const emptyKind = <K extends ResourceKind>(): KindInventory<K> => ({ records: [], unknown: [] });

export function emptyInventory(): Inventory {
  return {
    "nodegroup": emptyKind(),
    "cluster": emptyKind(),
    "listener": emptyKind(),
    "load-balancer": emptyKind(),
    "target-group": emptyKind(),
    "network-interface": emptyKind(),
    "security-group": emptyKind(),
    "nat-gateway": emptyKind(),
    "elastic-ip": emptyKind(),
    "internet-gateway": emptyKind(),
    "subnet": emptyKind(),
    "route-table": emptyKind(),
    "vpc": emptyKind(),
    "dns-record": emptyKind(),
    "hosted-zone": emptyKind(),
  };
}

export type DiscoveryTarget = {
  vpcTag: string;
  clusterName?: string;
  hostedZone?: string;
};

export type VpcSource = "state" | "tag" | "none";

export type Unresolved = { kind: ResourceKind; scope: Scope; reason: string };

export type DiscoveryResult = {
  vpcIds: string[];
  vpcSource: VpcSource;
  clusterNames: string[];
  zone?: HostedZone;
  inventory: Inventory;
  warnings: string[];
  /** Kinds that could not even be scoped, e.g. because the VPC lookup failed. */
  unresolved: Unresolved[];
};

export const VPC_KINDS: readonly ResourceKind[] = [
  "load-balancer",
  "target-group",
  "network-interface",
  "security-group",
  "nat-gateway",
  "elastic-ip",
  "internet-gateway",
  "subnet",
  "route-table",
  "vpc",
];

const COMPUTE_KINDS: readonly ResourceKind[] = ["nodegroup", "cluster"];

const VPC_ADDRESS = /(^|\.)aws_vpc\.[^.]+$/;
const DATA_ADDRESS = /(^|\.)data\./;

/**
 * VPC ids named by the provisioning tool's state, kept only when the VPC still
 * exists. Any failure here just means no hint.
 */
async function vpcIdsFromState(cloud: CloudApi, provisioner: Provisioner | undefined, warnings: string[]): Promise<string[]> {
  if (!provisioner?.available()) return [];

  const list = await provisioner.stateList();
  if (list.status !== "succeeded") {
    warnings.push(`State listing unavailable (${describeResult(list)}); using the tag lookup`);
    return [];
  }

  const ids: string[] = [];
  for (const address of list.value.filter(a => VPC_ADDRESS.test(a) && !DATA_ADDRESS.test(a))) {
    const shown = await provisioner.stateShow(address);
    const id = shown.status === "succeeded" ? shown.value.id : undefined;
    if (!id) continue;

    const live = await cloud.describeVpc(id);
    if (live.status === "succeeded") {
      ids.push(id);
    } else if (live.status === "not-found") {
      console.error(`   State names ${id} (${address}) but it no longer exists`);
    } else {
      warnings.push(`Could not confirm ${id} from state (${describeResult(live)})`);
    }
  }
  return ids;
}

async function discoverKind<K extends ResourceKind>(
  cloud: CloudApi,
  inventory: Inventory,
  kind: K,
  scopes: Scope[],
  warnings: string[]
): Promise<void> {
  const slot: KindInventory<K> = inventory[kind];
  for (const scope of scopes) {
    const result = await cloud.list(kind, scope);
    switch (result.status) {
      case "succeeded":
        slot.records.push(...result.value);
        break;
      case "not-found":
        // The parent is already gone, so is everything under it
        break;
      default:
        slot.unknown.push(scope);
        warnings.push(`${kind}: listing failed (${result.message}); will list again at deletion time`);
    }
  }
}

async function discoverClusterNames(
  cloud: CloudApi,
  provisioner: Provisioner | undefined,
  target: DiscoveryTarget,
  vpcIds: string[],
  warnings: string[],
  unresolved: Unresolved[]
): Promise<string[]> {
  if (target.clusterName) return [target.clusterName];

  if (provisioner?.available()) {
    const out = await provisioner.output("cluster_name");
    if (out.status === "succeeded" && out.value) return [out.value];
  }

  const names: string[] = [];
  for (const vpcId of vpcIds) {
    const found = await cloud.findClusters(vpcId);
    if (found.status === "succeeded") {
      names.push(...found.value.filter(n => !names.includes(n)));
    } else if (found.status !== "not-found") {
      warnings.push(`Cluster lookup in ${vpcId} failed (${found.message})`);
      for (const kind of COMPUTE_KINDS) unresolved.push({ kind, scope: { vpcId }, reason: `cluster lookup failed: ${found.message}` });
    }
  }
  return names;
}

/**
 * Build the inventory of what exists right now. Each kind is listed on its
 * own; a failed listing marks that kind unknown and never stops the others.
 */
export async function discover(cloud: CloudApi, target: DiscoveryTarget, provisioner?: Provisioner): Promise<DiscoveryResult> {
  const warnings: string[] = [];
  const unresolved: Unresolved[] = [];
  const inventory = emptyInventory();

  console.error(`🔍 Discovering resources (VPC tag Name=${target.vpcTag})...`);

  let vpcSource: VpcSource = "none";
  let vpcIds = await vpcIdsFromState(cloud, provisioner, warnings);
  if (vpcIds.length > 0) {
    vpcSource = "state";
  } else {
    const tagged = await cloud.findVpcIds(target.vpcTag);
    if (tagged.status === "succeeded") {
      vpcIds = tagged.value;
      if (vpcIds.length > 0) vpcSource = "tag";
    } else if (tagged.status !== "not-found") {
      warnings.push(`VPC lookup by tag failed (${tagged.message})`);
      for (const kind of VPC_KINDS) unresolved.push({ kind, scope: {}, reason: `VPC lookup failed: ${tagged.message}` });
    }
  }

  const clusterNames = await discoverClusterNames(cloud, provisioner, target, vpcIds, warnings, unresolved);
  const vpcScopes = vpcIds.map((vpcId): Scope => ({ vpcId }));
  const clusterScopes = clusterNames.map((clusterName): Scope => ({ clusterName }));

  await discoverKind(cloud, inventory, "cluster", clusterScopes, warnings);
  await discoverKind(cloud, inventory, "nodegroup", clusterScopes, warnings);
  for (const kind of VPC_KINDS) {
    await discoverKind(cloud, inventory, kind, vpcScopes, warnings);
  }
  const lbScopes = inventory["load-balancer"].records.map((lb): Scope => ({ loadBalancerArn: lb.id }));
  await discoverKind(cloud, inventory, "listener", lbScopes, warnings);

  let zone: HostedZone | undefined;
  if (target.hostedZone) {
    const found = await cloud.findHostedZone(target.hostedZone);
    if (found.status === "succeeded") {
      zone = found.value;
      await discoverKind(cloud, inventory, "hosted-zone", [{ zoneId: zone.zoneId }], warnings);
      await discoverKind(cloud, inventory, "dns-record", [{ zoneId: zone.zoneId }], warnings);
    } else if (found.status === "not-found") {
      console.error(`   Hosted zone ${target.hostedZone} not found; nothing to clean up in DNS`);
    } else {
      warnings.push(`Hosted zone lookup failed (${found.message})`);
      unresolved.push({ kind: "dns-record", scope: {}, reason: `hosted zone lookup failed: ${found.message}` });
    }
  }

  for (const warning of warnings) console.error(`⚠️  ${warning}`);
  console.error(`✓ Discovery: ${vpcIds.length > 0 ? `${vpcIds.join(", ")} (from ${vpcSource})` : "no VPC"}` +
    `${clusterNames.length > 0 ? `, cluster ${clusterNames.join(", ")}` : ""}`);

  return { vpcIds, vpcSource, clusterNames, zone, inventory, warnings, unresolved };
}

export function countRecords(inventory: Inventory): number {
  return Object.values(inventory).reduce((sum, slot) => sum + slot.records.length, 0);
}
