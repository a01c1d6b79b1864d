import * as eks from "../tools/aws.js";
import * as ec2 from "../tools/ec2.js";
import * as elb from "../tools/elb.js";
import * as route53 from "../tools/route53.js";
import { OK, succeeded, type CallResult } from "../tools/errors.js";
import type {
  CloudApi,
  DnsRecord,
  NetworkInterfaceRecord,
  RecordOf,
  ResourceKind,
  ResourceRecord,
  ResourceRecordSet,
  Scope,
} from "./types.js";

type Listers = { [K in ResourceKind]: (scope: Scope) => Promise<CallResult<RecordOf<K>[]>> };

const missingScope = (field: keyof Scope): CallResult<never[]> => ({
  status: "fatal",
  message: `listing needs ${field}`,
});

function map<T, U>(result: CallResult<T>, fn: (value: T) => U): CallResult<U> {
  return result.status === "succeeded" ? succeeded(fn(result.value)) : result;
}

/** A single lookup answering not-found becomes an empty listing. */
function oneOrNone<T>(result: CallResult<T>): CallResult<T[]> {
  return result.status === "not-found" ? succeeded([]) : map(result, v => [v]);
}

function toEniRecord(eni: ec2.NetworkInterfaceInfo, vpcId?: string): NetworkInterfaceRecord {
  return {
    kind: "network-interface",
    id: eni.id,
    status: eni.status,
    parent: eni.vpcId ?? vpcId,
    attachmentId: eni.attachmentId,
    securityGroupIds: eni.securityGroupIds,
    description: eni.description,
  };
}

export function dnsRecordId(recordSet: ResourceRecordSet): string {
  const setIdentifier = recordSet["SetIdentifier"];
  const base = `${recordSet.Name} ${recordSet.Type}`;
  return typeof setIdentifier === "string" ? `${base} ${setIdentifier}` : base;
}

function toDnsRecord(zoneId: string, recordSet: ResourceRecordSet): DnsRecord {
  return {
    kind: "dns-record",
    id: dnsRecordId(recordSet),
    parent: zoneId,
    name: recordSet.Name,
    type: recordSet.Type,
    recordSet,
  };
}

/** The listing scope a record was found under. */
export function scopeOf(record: ResourceRecord): Scope {
  switch (record.kind) {
    case "cluster":
      return { clusterName: record.id };
    case "nodegroup":
      return { clusterName: record.parent };
    case "listener":
      return { loadBalancerArn: record.parent };
    case "dns-record":
      return { zoneId: record.parent };
    case "hosted-zone":
      return { zoneId: record.id };
    case "vpc":
      return { vpcId: record.id };
    default:
      return { vpcId: record.parent };
  }
}

/**
 * CloudApi over the AWS CLI for one profile and region.
 */
export function createAwsCloud(awsProfile: string, awsRegion: string): CloudApi {
  const listers: Listers = {
    "cluster": async ({ clusterName }) => {
      if (!clusterName) return missingScope("clusterName");
      const found = await eks.describeCluster(clusterName, awsProfile, awsRegion);
      return oneOrNone(map(found, c => ({ kind: "cluster" as const, id: c.name, status: c.status, parent: c.vpcId })));
    },
    "nodegroup": async ({ clusterName }) => {
      if (!clusterName) return missingScope("clusterName");
      const names = await eks.listNodegroups(clusterName, awsProfile, awsRegion);
      return map(names, ns => ns.map(id => ({ kind: "nodegroup" as const, id, parent: clusterName })));
    },
    "load-balancer": async ({ vpcId }) => {
      if (!vpcId) return missingScope("vpcId");
      const lbs = await elb.listLoadBalancers(vpcId, awsProfile, awsRegion);
      return map(lbs, items => items.map(lb => ({ kind: "load-balancer" as const, id: lb.arn, status: lb.state, parent: vpcId })));
    },
    "listener": async ({ loadBalancerArn }) => {
      if (!loadBalancerArn) return missingScope("loadBalancerArn");
      const arns = await elb.listListeners(loadBalancerArn, awsProfile, awsRegion);
      return map(arns, items => items.map(id => ({ kind: "listener" as const, id, parent: loadBalancerArn })));
    },
    "target-group": async ({ vpcId }) => {
      if (!vpcId) return missingScope("vpcId");
      const arns = await elb.listTargetGroups(vpcId, awsProfile, awsRegion);
      return map(arns, items => items.map(id => ({ kind: "target-group" as const, id, parent: vpcId })));
    },
    "network-interface": async ({ vpcId }) => {
      if (!vpcId) return missingScope("vpcId");
      const enis = await ec2.listNetworkInterfaces(vpcId, awsProfile, awsRegion);
      return map(enis, items => items.map(eni => toEniRecord(eni, vpcId)));
    },
    "security-group": async ({ vpcId }) => {
      if (!vpcId) return missingScope("vpcId");
      const groups = await ec2.listSecurityGroups(vpcId, awsProfile, awsRegion);
      return map(groups, items => items.map(sg => ({ kind: "security-group" as const, id: sg.id, groupName: sg.name, parent: vpcId })));
    },
    "nat-gateway": async ({ vpcId }) => {
      if (!vpcId) return missingScope("vpcId");
      const nats = await ec2.listNatGateways(vpcId, awsProfile, awsRegion);
      return map(nats, items => items.map(nat => ({
        kind: "nat-gateway" as const,
        id: nat.id,
        status: nat.state,
        allocationIds: nat.allocationIds,
        parent: vpcId,
      })));
    },
    // Only addresses allocated to the VPC's NAT gateways, including ones already deleted
    "elastic-ip": async ({ vpcId }) => {
      if (!vpcId) return missingScope("vpcId");
      const nats = await ec2.listNatGateways(vpcId, awsProfile, awsRegion, true);
      if (nats.status !== "succeeded") return nats;
      const records: RecordOf<"elastic-ip">[] = [];
      for (const allocationId of new Set(nats.value.flatMap(n => n.allocationIds))) {
        const address = await ec2.describeAddress(allocationId, awsProfile, awsRegion);
        if (address.status === "succeeded") {
          records.push({ kind: "elastic-ip", id: allocationId, status: address.value.associationId ? "associated" : "unassociated", parent: vpcId });
        } else if (address.status !== "not-found") {
          return address;
        }
      }
      return succeeded(records);
    },
    "internet-gateway": async ({ vpcId }) => {
      if (!vpcId) return missingScope("vpcId");
      const ids = await ec2.listInternetGateways(vpcId, awsProfile, awsRegion);
      return map(ids, items => items.map(id => ({ kind: "internet-gateway" as const, id, parent: vpcId })));
    },
    "subnet": async ({ vpcId }) => {
      if (!vpcId) return missingScope("vpcId");
      const ids = await ec2.listSubnets(vpcId, awsProfile, awsRegion);
      return map(ids, items => items.map(id => ({ kind: "subnet" as const, id, parent: vpcId })));
    },
    "route-table": async ({ vpcId }) => {
      if (!vpcId) return missingScope("vpcId");
      const tables = await ec2.listRouteTables(vpcId, awsProfile, awsRegion);
      return map(tables, items => items.map(rt => ({
        kind: "route-table" as const,
        id: rt.id,
        main: rt.main,
        associationIds: rt.associationIds,
        parent: vpcId,
      })));
    },
    "vpc": async ({ vpcId }) => {
      if (!vpcId) return missingScope("vpcId");
      const found = await ec2.describeVpc(vpcId, awsProfile, awsRegion);
      return oneOrNone(map(found, id => ({ kind: "vpc" as const, id })));
    },
    "dns-record": async ({ zoneId }) => {
      if (!zoneId) return missingScope("zoneId");
      const sets = await route53.listRecordSets(zoneId, awsProfile, awsRegion);
      return map(sets, items => items.map(rs => toDnsRecord(zoneId, rs)));
    },
    "hosted-zone": async ({ zoneId }) => {
      if (!zoneId) return missingScope("zoneId");
      const zone = await route53.findHostedZone(zoneId, awsProfile, awsRegion);
      return oneOrNone(map(zone, z => ({ kind: "hosted-zone" as const, id: z.zoneId })));
    },
  };

  const list = <K extends ResourceKind>(kind: K, scope: Scope): Promise<CallResult<RecordOf<K>[]>> =>
    listers[kind](scope);

  /** Find a record again through the listing it came from. */
  async function relist(record: ResourceRecord): Promise<CallResult<ResourceRecord>> {
    const listed = await list(record.kind, scopeOf(record));
    if (listed.status !== "succeeded") return listed;
    const found = listed.value.find(r => r.id === record.id);
    return found ? succeeded(found) : { status: "not-found" };
  }

  async function detachAndDeleteGateway(igwId: string, vpcId: string | undefined): Promise<CallResult> {
    if (vpcId) {
      const detached = await ec2.detachInternetGateway(igwId, vpcId, awsProfile, awsRegion);
      const notAttached = detached.status === "fatal" && detached.message.includes("NotAttached");
      if (detached.status !== "succeeded" && detached.status !== "not-found" && !notAttached) return detached;
    }
    return ec2.deleteInternetGateway(igwId, awsProfile, awsRegion);
  }

  async function disassociateAndDeleteTable(table: RecordOf<"route-table">): Promise<CallResult> {
    if (table.main) return { status: "fatal", message: "the main route table is removed with its VPC" };
    for (const associationId of table.associationIds) {
      const result = await ec2.disassociateRouteTable(associationId, awsProfile, awsRegion);
      if (result.status !== "succeeded" && result.status !== "not-found") return result;
    }
    return ec2.deleteRouteTable(table.id, awsProfile, awsRegion);
  }

  return {
    findVpcIds: (tag) => ec2.findVpcIdsByTag(tag, awsProfile, awsRegion),
    describeVpc: (vpcId) => ec2.describeVpc(vpcId, awsProfile, awsRegion),
    async findClusters(vpcId) {
      const names = await eks.listClusters(awsProfile, awsRegion);
      if (names.status !== "succeeded") return names;
      const inVpc: string[] = [];
      for (const name of names.value) {
        const cluster = await eks.describeCluster(name, awsProfile, awsRegion);
        if (cluster.status === "succeeded") {
          if (cluster.value.vpcId === vpcId) inVpc.push(name);
        } else if (cluster.status !== "not-found") {
          return cluster;
        }
      }
      return succeeded(inVpc);
    },
    findHostedZone: (zone) => route53.findHostedZone(zone, awsProfile, awsRegion),
    list,

    async describe(record) {
      switch (record.kind) {
        case "network-interface": {
          const eni = await ec2.describeNetworkInterface(record.id, awsProfile, awsRegion);
          return map(eni, info => toEniRecord(info, record.parent));
        }
        case "nat-gateway": {
          const nat = await ec2.describeNatGateway(record.id, awsProfile, awsRegion);
          return map(nat, info => ({ ...record, status: info.state, allocationIds: info.allocationIds }));
        }
        case "nodegroup": {
          if (!record.parent) return { status: "fatal", message: `nodegroup ${record.id} has no cluster` };
          const status = await eks.describeNodegroup(record.parent, record.id, awsProfile, awsRegion);
          return map(status, s => ({ ...record, status: s }));
        }
        case "load-balancer": {
          const lb = await elb.describeLoadBalancer(record.id, awsProfile, awsRegion);
          return map(lb, info => ({ ...record, status: info.state }));
        }
        default:
          return relist(record);
      }
    },

    async remove(record) {
      switch (record.kind) {
        case "nodegroup":
          if (!record.parent) return { status: "fatal", message: `nodegroup ${record.id} has no cluster` };
          return eks.deleteNodegroup(record.parent, record.id, awsProfile, awsRegion);
        case "cluster":
          return eks.deleteCluster(record.id, awsProfile, awsRegion);
        case "listener":
          return elb.deleteListener(record.id, awsProfile, awsRegion);
        case "load-balancer":
          return elb.deleteLoadBalancer(record.id, awsProfile, awsRegion);
        case "target-group":
          return elb.deleteTargetGroup(record.id, awsProfile, awsRegion);
        case "network-interface":
          return ec2.deleteNetworkInterface(record.id, awsProfile, awsRegion);
        case "security-group":
          return ec2.deleteSecurityGroup(record.id, awsProfile, awsRegion);
        case "nat-gateway":
          return ec2.deleteNatGateway(record.id, awsProfile, awsRegion);
        case "elastic-ip":
          return ec2.releaseAddress(record.id, awsProfile, awsRegion);
        case "internet-gateway":
          return detachAndDeleteGateway(record.id, record.parent);
        case "subnet":
          return ec2.deleteSubnet(record.id, awsProfile, awsRegion);
        case "route-table":
          return disassociateAndDeleteTable(record);
        case "vpc":
          return ec2.deleteVpc(record.id, awsProfile, awsRegion);
        case "dns-record":
          if (!record.parent) return { status: "fatal", message: `record ${record.id} has no hosted zone` };
          return route53.deleteRecordSet(record.parent, record.recordSet, awsProfile, awsRegion);
        case "hosted-zone":
          return route53.deleteHostedZone(record.id, awsProfile, awsRegion);
      }
    },

    async detachNetworkInterface(record: NetworkInterfaceRecord) {
      if (!record.attachmentId) return OK;
      return ec2.detachNetworkInterface(record.attachmentId, awsProfile, awsRegion);
    },
  };
}
