import { beforeEach, describe, expect, it, vi } from "vitest";
import { run, type ShellResult } from "../src/tools/shell.js";
import { createAwsCloud } from "../src/reconciler/aws-cloud.js";
import type { DnsRecord } from "../src/reconciler/types.js";

vi.mock("../src/tools/shell.js", () => ({ run: vi.fn() }));

const runMock = vi.mocked(run);

const ok = (body: unknown): ShellResult => ({ ok: true, exitCode: 0, stdout: JSON.stringify(body), stderr: "" });
const err = (stderr: string): ShellResult => ({ ok: false, exitCode: 254, stdout: "", stderr });

type Reply = ShellResult | ((args: string[]) => ShellResult);

/** Answer AWS CLI calls by "service operation". */
function respond(table: Record<string, Reply>) {
  runMock.mockImplementation(async (_cmd, args) => {
    const reply = table[`${args[0]} ${args[1]}`];
    if (!reply) throw new Error(`unexpected call: aws ${args.join(" ")}`);
    return typeof reply === "function" ? reply(args) : reply;
  });
}

const operations = () => runMock.mock.calls.map(([, args]) => `${args[0]} ${args[1]}`);

describe("createAwsCloud", () => {
  const cloud = createAwsCloud("test", "us-east-1");

  beforeEach(() => {
    runMock.mockReset();
  });

  it("lists network interfaces with their attachment and groups", async () => {
    respond({
      "ec2 describe-network-interfaces": ok({
        NetworkInterfaces: [
          {
            NetworkInterfaceId: "eni-1",
            Status: "in-use",
            VpcId: "vpc-1",
            Description: "ELB app/web/123",
            Attachment: { AttachmentId: "eni-attach-1" },
            Groups: [{ GroupId: "sg-1" }, { GroupId: "sg-2" }],
          },
          { NetworkInterfaceId: "eni-2", Status: "available" },
        ],
      }),
    });

    const result = await cloud.list("network-interface", { vpcId: "vpc-1" });

    expect(result).toEqual({
      status: "succeeded",
      value: [
        {
          kind: "network-interface",
          id: "eni-1",
          status: "in-use",
          parent: "vpc-1",
          attachmentId: "eni-attach-1",
          securityGroupIds: ["sg-1", "sg-2"],
          description: "ELB app/web/123",
        },
        { kind: "network-interface", id: "eni-2", status: "available", parent: "vpc-1", securityGroupIds: [] },
      ],
    });
    expect(runMock).toHaveBeenCalledWith(
      "aws",
      ["ec2", "describe-network-interfaces", "--filters", "Name=vpc-id,Values=vpc-1", "--output", "json"],
      { AWS_DEFAULT_REGION: "us-east-1", AWS_REGION: "us-east-1", AWS_PROFILE: "test" }
    );
  });

  it("refuses to list without the scope the kind needs", async () => {
    const result = await cloud.list("subnet", {});

    expect(result).toEqual({ status: "fatal", message: "listing needs vpcId" });
    expect(runMock).not.toHaveBeenCalled();
  });

  it("classifies a security group still in use as blocked", async () => {
    const stderr = "An error occurred (DependencyViolation) when calling the DeleteSecurityGroup operation: resource sg-1 has a dependent object";
    respond({ "ec2 delete-security-group": err(stderr) });

    const result = await cloud.remove({ kind: "security-group", id: "sg-1", groupName: "nodes", parent: "vpc-1" });

    expect(result).toEqual({ status: "blocked", message: stderr });
  });

  it("treats a VPC AWS no longer knows as an empty listing", async () => {
    respond({
      "ec2 describe-vpcs": err("An error occurred (InvalidVpcID.NotFound) when calling the DescribeVpcs operation: The vpc ID 'vpc-9' does not exist"),
    });

    expect(await cloud.list("vpc", { vpcId: "vpc-9" })).toEqual({ status: "succeeded", value: [] });
    expect(await cloud.describe({ kind: "vpc", id: "vpc-9" })).toEqual({ status: "not-found" });
  });

  it("deletes an internet gateway that is already detached", async () => {
    respond({
      "ec2 detach-internet-gateway": err("An error occurred (Gateway.NotAttached) when calling the DetachInternetGateway operation: resource igw-1 is not attached to network vpc-1"),
      "ec2 delete-internet-gateway": ok({}),
    });

    const result = await cloud.remove({ kind: "internet-gateway", id: "igw-1", parent: "vpc-1" });

    expect(result).toEqual({ status: "succeeded", value: undefined });
    expect(operations()).toEqual(["ec2 detach-internet-gateway", "ec2 delete-internet-gateway"]);
  });

  it("stops when the gateway cannot be detached", async () => {
    const stderr = "An error occurred (DependencyViolation) when calling the DetachInternetGateway operation: Network vpc-1 has some mapped public address(es).";
    respond({ "ec2 detach-internet-gateway": err(stderr) });

    const result = await cloud.remove({ kind: "internet-gateway", id: "igw-1", parent: "vpc-1" });

    expect(result).toEqual({ status: "blocked", message: stderr });
    expect(operations()).toEqual(["ec2 detach-internet-gateway"]);
  });

  it("disassociates a route table before deleting it", async () => {
    respond({
      "ec2 disassociate-route-table": (args) =>
        args[3] === "rtbassoc-1"
          ? err("An error occurred (InvalidAssociationID.NotFound) when calling the DisassociateRouteTable operation: The association ID 'rtbassoc-1' does not exist")
          : ok({}),
      "ec2 delete-route-table": ok({}),
    });

    const result = await cloud.remove({
      kind: "route-table",
      id: "rtb-1",
      main: false,
      associationIds: ["rtbassoc-1", "rtbassoc-2"],
      parent: "vpc-1",
    });

    expect(result).toEqual({ status: "succeeded", value: undefined });
    expect(operations()).toEqual(["ec2 disassociate-route-table", "ec2 disassociate-route-table", "ec2 delete-route-table"]);
  });

  it("never deletes the main route table directly", async () => {
    const result = await cloud.remove({ kind: "route-table", id: "rtb-main", main: true, associationIds: [], parent: "vpc-1" });

    expect(result).toEqual({ status: "fatal", message: "the main route table is removed with its VPC" });
    expect(runMock).not.toHaveBeenCalled();
  });

  it("finds only the clusters running in the VPC", async () => {
    respond({
      "eks list-clusters": ok({ clusters: ["a", "b", "c"] }),
      "eks describe-cluster": (args) => {
        switch (args[3]) {
          case "a":
            return ok({ cluster: { name: "a", status: "ACTIVE", resourcesVpcConfig: { vpcId: "vpc-1" } } });
          case "b":
            return ok({ cluster: { name: "b", status: "ACTIVE", resourcesVpcConfig: { vpcId: "vpc-2" } } });
          default:
            return err("An error occurred (ResourceNotFoundException) when calling the DescribeCluster operation: No cluster found for name: c.");
        }
      },
    });

    expect(await cloud.findClusters("vpc-1")).toEqual({ status: "succeeded", value: ["a"] });
  });

  it("lists the addresses of deleted NAT gateways too", async () => {
    respond({
      "ec2 describe-nat-gateways": ok({
        NatGateways: [
          { NatGatewayId: "nat-1", State: "deleted", NatGatewayAddresses: [{ AllocationId: "eipalloc-1" }] },
          { NatGatewayId: "nat-2", State: "available", NatGatewayAddresses: [{ AllocationId: "eipalloc-2" }] },
        ],
      }),
      "ec2 describe-addresses": (args) =>
        args[3] === "eipalloc-1"
          ? ok({ Addresses: [{ AllocationId: "eipalloc-1" }] })
          : ok({ Addresses: [{ AllocationId: "eipalloc-2", AssociationId: "eipassoc-2" }] }),
    });

    const result = await cloud.list("elastic-ip", { vpcId: "vpc-1" });

    expect(result).toEqual({
      status: "succeeded",
      value: [
        { kind: "elastic-ip", id: "eipalloc-1", status: "unassociated", parent: "vpc-1" },
        { kind: "elastic-ip", id: "eipalloc-2", status: "associated", parent: "vpc-1" },
      ],
    });
  });

  it("deletes a record by repeating its record set in the change batch", async () => {
    respond({ "route53 change-resource-record-sets": ok({ ChangeInfo: { Id: "/change/C1", Status: "PENDING" } }) });
    const recordSet = { Name: "app.example.com.", Type: "A", TTL: 300, ResourceRecords: [{ Value: "10.0.0.1" }] };
    const record: DnsRecord = {
      kind: "dns-record",
      id: "app.example.com. A",
      parent: "Z1",
      name: "app.example.com.",
      type: "A",
      recordSet,
    };

    const result = await cloud.remove(record);

    expect(result).toEqual({ status: "succeeded", value: undefined });
    const args = runMock.mock.calls[0]?.[1] ?? [];
    const batch = args[args.indexOf("--change-batch") + 1];
    expect(args.slice(0, 4)).toEqual(["route53", "change-resource-record-sets", "--hosted-zone-id", "Z1"]);
    expect(JSON.parse(batch ?? "null")).toEqual({ Changes: [{ Action: "DELETE", ResourceRecordSet: recordSet }] });
  });
});
