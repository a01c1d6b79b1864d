import { z } from "zod";
import type { CallResult } from "../tools/errors.js";

export type ResourceKind =
  | "nodegroup"
  | "cluster"
  | "listener"
  | "load-balancer"
  | "target-group"
  | "network-interface"
  | "security-group"
  | "nat-gateway"
  | "elastic-ip"
  | "internet-gateway"
  | "subnet"
  | "route-table"
  | "vpc"
  | "dns-record"
  | "hosted-zone";

export const RESOURCE_KINDS: readonly ResourceKind[] = [
  "nodegroup",
  "cluster",
  "listener",
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
  "dns-record",
  "hosted-zone",
];

// Route53 needs the record set exactly as listed to delete it, so unknown fields are kept
export const ResourceRecordSetSchema = z
  .object({
    Name: z.string(),
    Type: z.string(),
  })
  .passthrough();

export type ResourceRecordSet = z.infer<typeof ResourceRecordSetSchema>;

type RecordBase = {
  id: string;
  status?: string;
  /** VPC id, cluster name, load balancer ARN or hosted zone id, depending on kind. */
  parent?: string;
};

export type NetworkInterfaceRecord = RecordBase & {
  kind: "network-interface";
  attachmentId?: string;
  securityGroupIds: string[];
  description?: string;
};

export type SecurityGroupRecord = RecordBase & {
  kind: "security-group";
  groupName: string;
};

export type NatGatewayRecord = RecordBase & {
  kind: "nat-gateway";
  allocationIds: string[];
};

export type RouteTableRecord = RecordBase & {
  kind: "route-table";
  main: boolean;
  associationIds: string[];
};

export type DnsRecord = RecordBase & {
  kind: "dns-record";
  name: string;
  type: string;
  recordSet: ResourceRecordSet;
};

type DetailedKind = "network-interface" | "security-group" | "nat-gateway" | "route-table" | "dns-record";
type SimpleKind = Exclude<ResourceKind, DetailedKind>;

export type SimpleRecord = { [K in SimpleKind]: RecordBase & { kind: K } }[SimpleKind];

export type ResourceRecord =
  | NetworkInterfaceRecord
  | SecurityGroupRecord
  | NatGatewayRecord
  | RouteTableRecord
  | DnsRecord
  | SimpleRecord;

export type RecordOf<K extends ResourceKind> = Extract<ResourceRecord, { kind: K }>;

export type ResourceRef = { kind: ResourceKind; id: string };

/**
 * What a list call is scoped to. Each kind reads the field it needs.
 */
export type Scope = {
  vpcId?: string;
  clusterName?: string;
  loadBalancerArn?: string;
  zoneId?: string;
};

export type HostedZone = { zoneId: string; name: string };

/**
 * Everything the reconciler needs from the cloud. Implementations normalise
 * every remote failure into a CallResult instead of throwing.
 */
export interface CloudApi {
  findVpcIds(tagValue: string): Promise<CallResult<string[]>>;
  /** not-found when the VPC no longer exists. */
  describeVpc(vpcId: string): Promise<CallResult<string>>;
  findClusters(vpcId: string): Promise<CallResult<string[]>>;
  findHostedZone(zone: string): Promise<CallResult<HostedZone>>;
  list<K extends ResourceKind>(kind: K, scope: Scope): Promise<CallResult<RecordOf<K>[]>>;
  /** Current state of one record; not-found once it is gone. */
  describe(record: ResourceRecord): Promise<CallResult<ResourceRecord>>;
  remove(record: ResourceRecord): Promise<CallResult>;
  detachNetworkInterface(record: NetworkInterfaceRecord): Promise<CallResult>;
}

export type DestroyOptions = {
  targets?: string[];
  refresh?: boolean;
};

/**
 * The declarative provisioning tool. Its state is a discovery hint only.
 */
export interface Provisioner {
  /** False when there is no configuration to destroy (e.g. the directory is gone). */
  available(): boolean;
  stateList(): Promise<CallResult<string[]>>;
  stateShow(address: string): Promise<CallResult<Record<string, string>>>;
  output(name: string): Promise<CallResult<string>>;
  destroy(options?: DestroyOptions): Promise<CallResult>;
  removeStateFiles(): Promise<string[]>;
}
