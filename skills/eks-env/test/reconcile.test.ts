import { describe, expect, it } from "vitest";
import { reconcile, type ReconcileOptions } from "../src/reconciler/reconcile.js";
import type { DnsRecord } from "../src/reconciler/types.js";
import { FakeClock } from "./support/fake-clock.js";
import { FakeCloud } from "./support/fake-cloud.js";
import { FakeProvisioner } from "./support/fake-provisioner.js";
import { DEFAULT_POLICY, TEST_TIMINGS } from "./support/context.js";

function options(overrides: Partial<ReconcileOptions> = {}): ReconcileOptions {
  return {
    target: { vpcTag: "eks-vpc" },
    timings: TEST_TIMINGS,
    policy: DEFAULT_POLICY,
    escalationTargets: [],
    dnsOverrides: [],
    ...overrides,
  };
}

function unavailable(): FakeProvisioner {
  const provisioner = new FakeProvisioner();
  provisioner.isAvailable = false;
  return provisioner;
}

/** One VPC with a load balancer and two interfaces, one of them attached. */
function vpcWithAttachedInterface(): FakeCloud {
  return new FakeCloud()
    .addVpc("vpc-1", "eks-vpc")
    .add(
      { kind: "load-balancer", id: "arn:lb/app/demo/1", parent: "vpc-1" },
      { kind: "security-group", id: "sg-nodes", groupName: "nodes", parent: "vpc-1" },
      {
        kind: "network-interface",
        id: "eni-attached",
        status: "in-use",
        parent: "vpc-1",
        attachmentId: "eni-attach-1",
        securityGroupIds: ["sg-nodes"],
        description: "aws-K8S-i-0abc",
      },
      { kind: "network-interface", id: "eni-free", status: "available", parent: "vpc-1", securityGroupIds: [] }
    );
}

function dnsRecord(name: string, type: string): DnsRecord {
  return { kind: "dns-record", id: `${name} ${type}`, parent: "Z123", name, type, recordSet: { Name: name, Type: type } };
}

describe("reconcile", () => {
  it("leaves an attached interface in place by default and reports partial", async () => {
    const cloud = vpcWithAttachedInterface();

    const outcome = await reconcile({ cloud, provisioner: unavailable(), clock: new FakeClock() }, options());

    expect(outcome.status).toBe("partial");
    expect(cloud.removals("network-interface")).toEqual(["network-interface eni-free"]);
    expect(cloud.calls).not.toContain("detach network-interface eni-attached");
    expect(outcome.remaining).toContainEqual({
      kind: "network-interface",
      id: "eni-attached",
      reason: "attached (in-use); skipped without --force",
    });
    expect(outcome.remaining.map(r => `${r.kind} ${r.id}`)).toEqual([
      "network-interface eni-attached",
      "security-group sg-nodes",
      "vpc vpc-1",
    ]);
    expect(outcome.removed).toContainEqual({ kind: "network-interface", id: "eni-free" });
    expect(outcome.declarative.primary).toBe("skipped");
    expect(outcome.verification.vpcs).toEqual(["vpc-1"]);
  });

  it("detaches and deletes the attached interface under force and ends clean", async () => {
    const cloud = vpcWithAttachedInterface();

    const outcome = await reconcile(
      { cloud, provisioner: unavailable(), clock: new FakeClock() },
      options({ policy: { forceDetachEnis: true, deleteHostedZone: false } })
    );

    expect(cloud.calls.filter(c => c.endsWith("eni-attached") && !c.startsWith("describe"))).toEqual([
      "detach network-interface eni-attached",
      "remove network-interface eni-attached",
    ]);
    expect(outcome.status).toBe("clean");
    expect(outcome.remaining).toEqual([]);
    expect(cloud.has("vpc", "vpc-1")).toBe(false);
  });

  it("deletes every zone record except the apex NS and SOA", async () => {
    const cloud = new FakeCloud()
      .addZone({ zoneId: "Z123", name: "example.com." })
      .add(
        dnsRecord("example.com.", "NS"),
        dnsRecord("example.com.", "SOA"),
        dnsRecord("www.example.com.", "A"),
        dnsRecord("api.example.com.", "CNAME"),
        dnsRecord("_verify.example.com.", "TXT")
      );

    const outcome = await reconcile(
      { cloud, provisioner: unavailable(), clock: new FakeClock() },
      options({ target: { vpcTag: "eks-vpc", hostedZone: "example.com" } })
    );

    expect(cloud.removals("dns-record")).toEqual([
      "dns-record www.example.com. A",
      "dns-record api.example.com. CNAME",
      "dns-record _verify.example.com. TXT",
    ]);
    expect(cloud.has("hosted-zone", "Z123")).toBe(true);
    expect(outcome.status).toBe("clean");
  });

  it("is clean and deletes nothing on an environment that is already gone", async () => {
    const cloud = new FakeCloud();
    const provisioner = new FakeProvisioner();

    const outcome = await reconcile({ cloud, provisioner, clock: new FakeClock() }, options());

    expect(outcome.status).toBe("clean");
    expect(cloud.removals()).toEqual([]);
    expect(outcome.remaining).toEqual([]);
    expect(provisioner.destroyCalls).toEqual([{}]);
    expect(outcome.stateFilesRemoved).toEqual(["terraform/terraform.tfstate"]);
  });

  it("reaches the same clean result when run a second time", async () => {
    const cloud = vpcWithAttachedInterface();
    const deps = { cloud, provisioner: unavailable(), clock: new FakeClock() };
    const forced = options({ policy: { forceDetachEnis: true, deleteHostedZone: false } });

    const first = await reconcile(deps, forced);
    const removedFirst = cloud.removals().length;
    const second = await reconcile(deps, forced);

    expect(first.status).toBe("clean");
    expect(second.status).toBe("clean");
    expect(cloud.removals().length).toBe(removedFirst);
  });

  it("counts what the declarative destroy removed as removed", async () => {
    const cloud = vpcWithAttachedInterface();
    const provisioner = new FakeProvisioner();
    provisioner.onDestroy = () => {
      cloud.drop("network-interface", "eni-attached").drop("security-group", "sg-nodes").drop("vpc", "vpc-1");
    };

    const outcome = await reconcile({ cloud, provisioner, clock: new FakeClock() }, options());

    expect(outcome.declarative.primary).toBe("succeeded");
    expect(outcome.remaining).toEqual([]);
    expect(outcome.removed).toContainEqual({ kind: "network-interface", id: "eni-attached" });
    expect(outcome.status).toBe("clean");
    expect(provisioner.stateFilesRemoved).toBe(1);
  });

  it("reports failed when every escalation strategy is exhausted", async () => {
    const cloud = new FakeCloud()
      .addVpc("vpc-1", "eks-vpc")
      .add({ kind: "cluster", id: "demo", parent: "vpc-1" })
      .failAlways("remove", "cluster:demo", { status: "fatal", message: "AccessDeniedException" });
    const provisioner = new FakeProvisioner();
    provisioner.destroyResults = [
      { status: "fatal", message: "Error: deleting EKS Cluster" },
      { status: "fatal", message: "Error: deleting EKS Cluster" },
    ];

    const outcome = await reconcile({ cloud, provisioner, clock: new FakeClock() }, options());

    expect(provisioner.destroyCalls).toEqual([{}, { refresh: false }]);
    expect(outcome.declarative.exhausted).toBe(true);
    expect(outcome.declarative.escalation.map(s => `${s.strategy}:${s.status}`)).toEqual([
      "refresh-disabled:failed",
      "targeted:skipped",
      "imperative:failed",
    ]);
    expect(outcome.status).toBe("failed");
    expect(outcome.remaining).toContainEqual({ kind: "cluster", id: "demo", reason: "fatal: AccessDeniedException" });
    expect(provisioner.stateFilesRemoved).toBe(0);
  });

  it("reports a kind that could not be listed as unresolved", async () => {
    const cloud = new FakeCloud()
      .addVpc("vpc-1", "eks-vpc")
      .failAlways("list", "target-group", { status: "fatal", message: "AccessDenied" });

    const outcome = await reconcile({ cloud, provisioner: unavailable(), clock: new FakeClock() }, options());

    expect(outcome.remaining).toContainEqual({
      kind: "target-group",
      id: "(unlisted in vpc-1)",
      reason: "could not be listed: AccessDenied",
    });
    expect(outcome.status).toBe("partial");
  });

  it("keeps a group used by a skipped interface out of the direct deletion fallback", async () => {
    const cloud = vpcWithAttachedInterface();
    const provisioner = new FakeProvisioner();
    provisioner.destroyResults = [
      { status: "fatal", message: "Error: deleting Security Group" },
      { status: "fatal", message: "Error: deleting Security Group" },
    ];

    const outcome = await reconcile({ cloud, provisioner, clock: new FakeClock() }, options());

    expect(outcome.declarative.exhausted).toBe(true);
    expect(cloud.removals("security-group")).toEqual([]);
    expect(outcome.remaining).toContainEqual({
      kind: "security-group",
      id: "sg-nodes",
      reason: "still used by network-interface eni-attached",
    });
  });
});
