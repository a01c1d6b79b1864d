import { describe, expect, it } from "vitest";
import { countRecords, discover } from "../src/reconciler/discovery.js";
import { FakeCloud } from "./support/fake-cloud.js";
import { FakeProvisioner } from "./support/fake-provisioner.js";

function environment(): FakeCloud {
  return new FakeCloud()
    .addVpc("vpc-1", "eks-vpc")
    .add(
      { kind: "cluster", id: "demo", parent: "vpc-1", status: "ACTIVE" },
      { kind: "nodegroup", id: "demo-nodes", parent: "demo" },
      { kind: "load-balancer", id: "arn:lb/app/demo/1", parent: "vpc-1" },
      { kind: "listener", id: "arn:listener/app/demo/1/80", parent: "arn:lb/app/demo/1" },
      { kind: "subnet", id: "subnet-1", parent: "vpc-1" },
      { kind: "internet-gateway", id: "igw-1", parent: "vpc-1" }
    );
}

describe("discover", () => {
  it("finds the VPC by tag and everything scoped under it", async () => {
    const cloud = environment();
    const result = await discover(cloud, { vpcTag: "eks-vpc" });

    expect(result.vpcIds).toEqual(["vpc-1"]);
    expect(result.vpcSource).toBe("tag");
    expect(result.clusterNames).toEqual(["demo"]);
    expect(result.inventory.nodegroup.records.map(r => r.id)).toEqual(["demo-nodes"]);
    expect(result.inventory.listener.records.map(r => r.id)).toEqual(["arn:listener/app/demo/1/80"]);
    expect(result.inventory.subnet.records.map(r => r.id)).toEqual(["subnet-1"]);
    expect(result.inventory["security-group"].records.map(r => r.id)).toEqual(["sg-default-vpc-1"]);
    expect(result.warnings).toEqual([]);
  });

  it("uses a state hint that still exists and skips the tag lookup", async () => {
    const cloud = environment();
    const provisioner = new FakeProvisioner();
    provisioner.state = ["module.vpc.aws_vpc.this", "data.aws_vpc.lookup"];
    provisioner.shown = { "module.vpc.aws_vpc.this": { id: "vpc-1" } };
    provisioner.outputs = { cluster_name: "demo" };

    const result = await discover(cloud, { vpcTag: "eks-vpc" }, provisioner);

    expect(result.vpcSource).toBe("state");
    expect(result.vpcIds).toEqual(["vpc-1"]);
    expect(cloud.calls).not.toContain("findVpcIds eks-vpc");
    expect(cloud.calls.filter(c => c.startsWith("findClusters"))).toEqual([]);
  });

  it("falls back to the tag lookup when the state names a VPC that is gone", async () => {
    const cloud = environment();
    const provisioner = new FakeProvisioner();
    provisioner.state = ["aws_vpc.main"];
    provisioner.shown = { "aws_vpc.main": { id: "vpc-stale" } };

    const result = await discover(cloud, { vpcTag: "eks-vpc" }, provisioner);

    expect(cloud.calls).toContain("describeVpc vpc-stale");
    expect(cloud.calls).toContain("findVpcIds eks-vpc");
    expect(result.vpcSource).toBe("tag");
    expect(result.vpcIds).toEqual(["vpc-1"]);
  });

  it("ignores the state entirely when the provisioner is unavailable", async () => {
    const cloud = environment();
    const provisioner = new FakeProvisioner();
    provisioner.isAvailable = false;
    provisioner.state = ["aws_vpc.main"];
    provisioner.shown = { "aws_vpc.main": { id: "vpc-1" } };

    const result = await discover(cloud, { vpcTag: "eks-vpc" }, provisioner);

    expect(result.vpcSource).toBe("tag");
  });

  it("keeps listing other kinds when one listing fails", async () => {
    const cloud = environment().failNext("list", "subnet", { status: "transient", message: "Rate exceeded" });

    const result = await discover(cloud, { vpcTag: "eks-vpc" });

    expect(result.inventory.subnet.records).toEqual([]);
    expect(result.inventory.subnet.unknown).toEqual([{ vpcId: "vpc-1" }]);
    expect(result.inventory["internet-gateway"].records.map(r => r.id)).toEqual(["igw-1"]);
    expect(result.inventory["route-table"].records.map(r => r.id)).toEqual(["rtb-main-vpc-1"]);
    expect(result.warnings).toEqual(["subnet: listing failed (Rate exceeded); will list again at deletion time"]);
  });

  it("returns an empty inventory for an environment that is already gone", async () => {
    const result = await discover(new FakeCloud(), { vpcTag: "eks-vpc" });

    expect(result.vpcIds).toEqual([]);
    expect(result.vpcSource).toBe("none");
    expect(countRecords(result.inventory)).toBe(0);
  });

  it("lists the records of the configured hosted zone", async () => {
    const cloud = new FakeCloud()
      .addZone({ zoneId: "Z123", name: "example.com." })
      .add({
        kind: "dns-record",
        id: "www.example.com. A",
        parent: "Z123",
        name: "www.example.com.",
        type: "A",
        recordSet: { Name: "www.example.com.", Type: "A" },
      });

    const result = await discover(cloud, { vpcTag: "eks-vpc", hostedZone: "example.com" });

    expect(result.zone).toEqual({ zoneId: "Z123", name: "example.com." });
    expect(result.inventory["hosted-zone"].records.map(r => r.id)).toEqual(["Z123"]);
    expect(result.inventory["dns-record"].records.map(r => r.id)).toEqual(["www.example.com. A"]);
  });
});
