import { z } from "zod";
import { aws } from "./aws.js";
import { fromShell, fromShellVoid, parseJson, type CallResult } from "./errors.js";

const tagFilter = (key: string, value: string) => `Name=tag:${key},Values=${value}`;
const vpcFilter = (vpcId: string) => `Name=vpc-id,Values=${vpcId}`;

// --- VPC ---

const VpcsSchema = z.object({
  Vpcs: z.array(z.object({ VpcId: z.string(), State: z.string().optional() })),
});

export async function findVpcIdsByTag(tagValue: string, awsProfile: string, awsRegion: string): Promise<CallResult<string[]>> {
  const res = await aws(["ec2", "describe-vpcs", "--filters", tagFilter("Name", tagValue)], awsProfile, awsRegion);
  return fromShell(res, parseJson(VpcsSchema.transform(r => r.Vpcs.map(v => v.VpcId))));
}

/**
 * Confirms a VPC still exists. AWS answers InvalidVpcID.NotFound for stale ids.
 */
export async function describeVpc(vpcId: string, awsProfile: string, awsRegion: string): Promise<CallResult<string>> {
  const res = await aws(["ec2", "describe-vpcs", "--vpc-ids", vpcId], awsProfile, awsRegion);
  const parsed = fromShell(res, parseJson(VpcsSchema.transform(r => r.Vpcs.map(v => v.VpcId))));
  if (parsed.status !== "succeeded") return parsed;
  const [found] = parsed.value;
  return found ? { status: "succeeded", value: found } : { status: "not-found" };
}

export async function deleteVpc(vpcId: string, awsProfile: string, awsRegion: string): Promise<CallResult> {
  return fromShellVoid(await aws(["ec2", "delete-vpc", "--vpc-id", vpcId], awsProfile, awsRegion));
}

// --- Network interfaces ---

const NetworkInterfacesSchema = z.object({
  NetworkInterfaces: z.array(z.object({
    NetworkInterfaceId: z.string(),
    Status: z.string(),
    VpcId: z.string().optional(),
    Description: z.string().optional(),
    Attachment: z.object({ AttachmentId: z.string().optional() }).optional(),
    Groups: z.array(z.object({ GroupId: z.string() })).default([]),
  })),
});

export type NetworkInterfaceInfo = {
  id: string;
  status: string;
  vpcId?: string;
  description?: string;
  attachmentId?: string;
  securityGroupIds: string[];
};

const toNetworkInterfaces = NetworkInterfacesSchema.transform(r =>
  r.NetworkInterfaces.map((eni): NetworkInterfaceInfo => ({
    id: eni.NetworkInterfaceId,
    status: eni.Status,
    vpcId: eni.VpcId,
    description: eni.Description,
    attachmentId: eni.Attachment?.AttachmentId,
    securityGroupIds: eni.Groups.map(g => g.GroupId),
  }))
);

export async function listNetworkInterfaces(vpcId: string, awsProfile: string, awsRegion: string): Promise<CallResult<NetworkInterfaceInfo[]>> {
  const res = await aws(["ec2", "describe-network-interfaces", "--filters", vpcFilter(vpcId)], awsProfile, awsRegion);
  return fromShell(res, parseJson(toNetworkInterfaces));
}

export async function describeNetworkInterface(eniId: string, awsProfile: string, awsRegion: string): Promise<CallResult<NetworkInterfaceInfo>> {
  const res = await aws(["ec2", "describe-network-interfaces", "--network-interface-ids", eniId], awsProfile, awsRegion);
  const parsed = fromShell(res, parseJson(toNetworkInterfaces));
  if (parsed.status !== "succeeded") return parsed;
  const [eni] = parsed.value;
  return eni ? { status: "succeeded", value: eni } : { status: "not-found" };
}

export async function detachNetworkInterface(attachmentId: string, awsProfile: string, awsRegion: string): Promise<CallResult> {
  return fromShellVoid(await aws(
    ["ec2", "detach-network-interface", "--attachment-id", attachmentId, "--force"],
    awsProfile,
    awsRegion
  ));
}

export async function deleteNetworkInterface(eniId: string, awsProfile: string, awsRegion: string): Promise<CallResult> {
  return fromShellVoid(await aws(["ec2", "delete-network-interface", "--network-interface-id", eniId], awsProfile, awsRegion));
}

// --- Security groups ---

const SecurityGroupsSchema = z.object({
  SecurityGroups: z.array(z.object({ GroupId: z.string(), GroupName: z.string() })),
});

export async function listSecurityGroups(vpcId: string, awsProfile: string, awsRegion: string): Promise<CallResult<{ id: string; name: string }[]>> {
  const res = await aws(["ec2", "describe-security-groups", "--filters", vpcFilter(vpcId)], awsProfile, awsRegion);
  return fromShell(res, parseJson(SecurityGroupsSchema.transform(r =>
    r.SecurityGroups.map(sg => ({ id: sg.GroupId, name: sg.GroupName }))
  )));
}

export async function deleteSecurityGroup(groupId: string, awsProfile: string, awsRegion: string): Promise<CallResult> {
  return fromShellVoid(await aws(["ec2", "delete-security-group", "--group-id", groupId], awsProfile, awsRegion));
}

// --- NAT gateways and elastic IPs ---

const NatGatewaysSchema = z.object({
  NatGateways: z.array(z.object({
    NatGatewayId: z.string(),
    State: z.string(),
    NatGatewayAddresses: z.array(z.object({ AllocationId: z.string().optional() })).default([]),
  })),
});

export type NatGatewayInfo = { id: string; state: string; allocationIds: string[] };

const toNatGateways = NatGatewaysSchema.transform(r =>
  r.NatGateways.map((nat): NatGatewayInfo => ({
    id: nat.NatGatewayId,
    state: nat.State,
    allocationIds: nat.NatGatewayAddresses.flatMap(a => (a.AllocationId ? [a.AllocationId] : [])),
  }))
);

/**
 * NAT gateways linger in the listing as "deleted" for a while; those are left
 * out unless `includeDeleted` is set (their address allocations outlive them).
 */
export async function listNatGateways(
  vpcId: string,
  awsProfile: string,
  awsRegion: string,
  includeDeleted = false
): Promise<CallResult<NatGatewayInfo[]>> {
  const res = await aws(["ec2", "describe-nat-gateways", "--filter", vpcFilter(vpcId)], awsProfile, awsRegion);
  const parsed = fromShell(res, parseJson(toNatGateways));
  if (parsed.status !== "succeeded" || includeDeleted) return parsed;
  return { status: "succeeded", value: parsed.value.filter(n => n.state !== "deleted") };
}

export async function describeNatGateway(natId: string, awsProfile: string, awsRegion: string): Promise<CallResult<NatGatewayInfo>> {
  const res = await aws(["ec2", "describe-nat-gateways", "--nat-gateway-ids", natId], awsProfile, awsRegion);
  const parsed = fromShell(res, parseJson(toNatGateways));
  if (parsed.status !== "succeeded") return parsed;
  const [nat] = parsed.value;
  if (!nat || nat.state === "deleted") return { status: "not-found" };
  return { status: "succeeded", value: nat };
}

export async function deleteNatGateway(natId: string, awsProfile: string, awsRegion: string): Promise<CallResult> {
  return fromShellVoid(await aws(["ec2", "delete-nat-gateway", "--nat-gateway-id", natId], awsProfile, awsRegion));
}

const AddressesSchema = z.object({
  Addresses: z.array(z.object({ AllocationId: z.string().optional(), AssociationId: z.string().optional() })),
});

/** not-found once the address has been released. */
export async function describeAddress(allocationId: string, awsProfile: string, awsRegion: string): Promise<CallResult<{ allocationId: string; associationId?: string }>> {
  const res = await aws(["ec2", "describe-addresses", "--allocation-ids", allocationId], awsProfile, awsRegion);
  const parsed = fromShell(res, parseJson(AddressesSchema));
  if (parsed.status !== "succeeded") return parsed;
  const [address] = parsed.value.Addresses;
  if (!address) return { status: "not-found" };
  return { status: "succeeded", value: { allocationId, associationId: address.AssociationId } };
}

export async function releaseAddress(allocationId: string, awsProfile: string, awsRegion: string): Promise<CallResult> {
  return fromShellVoid(await aws(["ec2", "release-address", "--allocation-id", allocationId], awsProfile, awsRegion));
}

// --- Internet gateways, subnets, route tables ---

const InternetGatewaysSchema = z.object({
  InternetGateways: z.array(z.object({ InternetGatewayId: z.string() })),
});

export async function listInternetGateways(vpcId: string, awsProfile: string, awsRegion: string): Promise<CallResult<string[]>> {
  const res = await aws(
    ["ec2", "describe-internet-gateways", "--filters", `Name=attachment.vpc-id,Values=${vpcId}`],
    awsProfile,
    awsRegion
  );
  return fromShell(res, parseJson(InternetGatewaysSchema.transform(r => r.InternetGateways.map(g => g.InternetGatewayId))));
}

export async function detachInternetGateway(igwId: string, vpcId: string, awsProfile: string, awsRegion: string): Promise<CallResult> {
  return fromShellVoid(await aws(
    ["ec2", "detach-internet-gateway", "--internet-gateway-id", igwId, "--vpc-id", vpcId],
    awsProfile,
    awsRegion
  ));
}

export async function deleteInternetGateway(igwId: string, awsProfile: string, awsRegion: string): Promise<CallResult> {
  return fromShellVoid(await aws(["ec2", "delete-internet-gateway", "--internet-gateway-id", igwId], awsProfile, awsRegion));
}

const SubnetsSchema = z.object({
  Subnets: z.array(z.object({ SubnetId: z.string(), State: z.string().optional() })),
});

export async function listSubnets(vpcId: string, awsProfile: string, awsRegion: string): Promise<CallResult<string[]>> {
  const res = await aws(["ec2", "describe-subnets", "--filters", vpcFilter(vpcId)], awsProfile, awsRegion);
  return fromShell(res, parseJson(SubnetsSchema.transform(r => r.Subnets.map(s => s.SubnetId))));
}

export async function deleteSubnet(subnetId: string, awsProfile: string, awsRegion: string): Promise<CallResult> {
  return fromShellVoid(await aws(["ec2", "delete-subnet", "--subnet-id", subnetId], awsProfile, awsRegion));
}

const RouteTablesSchema = z.object({
  RouteTables: z.array(z.object({
    RouteTableId: z.string(),
    Associations: z.array(z.object({
      RouteTableAssociationId: z.string().optional(),
      Main: z.boolean().optional(),
    })).default([]),
  })),
});

export type RouteTableInfo = { id: string; main: boolean; associationIds: string[] };

export async function listRouteTables(vpcId: string, awsProfile: string, awsRegion: string): Promise<CallResult<RouteTableInfo[]>> {
  const res = await aws(["ec2", "describe-route-tables", "--filters", vpcFilter(vpcId)], awsProfile, awsRegion);
  return fromShell(res, parseJson(RouteTablesSchema.transform(r =>
    r.RouteTables.map((rt): RouteTableInfo => ({
      id: rt.RouteTableId,
      main: rt.Associations.some(a => a.Main === true),
      // The main association cannot be removed; only subnet associations are returned
      associationIds: rt.Associations.flatMap(a =>
        !a.Main && a.RouteTableAssociationId ? [a.RouteTableAssociationId] : []
      ),
    }))
  )));
}

export async function disassociateRouteTable(associationId: string, awsProfile: string, awsRegion: string): Promise<CallResult> {
  return fromShellVoid(await aws(["ec2", "disassociate-route-table", "--association-id", associationId], awsProfile, awsRegion));
}

export async function deleteRouteTable(routeTableId: string, awsProfile: string, awsRegion: string): Promise<CallResult> {
  return fromShellVoid(await aws(["ec2", "delete-route-table", "--route-table-id", routeTableId], awsProfile, awsRegion));
}
