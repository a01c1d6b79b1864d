import { describe, expect, it } from "vitest";
import { buildDeployInput, buildTeardownInput, parseArgs } from "../src/args.js";
import { parseEnvFile } from "../src/tools/file.js";

describe("parseArgs", () => {
  it("separates the command, positionals and repeated flags", () => {
    const args = parseArgs([
      "teardown",
      "--force",
      "--region",
      "us-west-2",
      "--escalation-target",
      "module.eks",
      "--escalation-target=aws_vpc.main",
      "extra",
    ]);

    expect(args).toEqual({
      command: "teardown",
      positionals: ["extra"],
      flags: {
        "force": ["true"],
        "region": ["us-west-2"],
        "escalation-target": ["module.eks", "aws_vpc.main"],
      },
    });
  });

  it("does not let a boolean flag swallow the next word", () => {
    expect(parseArgs(["teardown", "--dry-run", "now"]).positionals).toEqual(["now"]);
  });
});

describe("buildTeardownInput", () => {
  it("fills defaults when nothing is given", () => {
    const built = buildTeardownInput(parseArgs(["teardown"]));

    expect(built).toEqual({
      ok: true,
      input: {
        awsProfile: "",
        awsRegion: "us-east-1",
        vpcTag: "eks-vpc",
        terraformDir: "./terraform",
        force: false,
        dryRun: false,
        deleteHostedZone: false,
        escalationTargets: [],
        dnsOverrides: [],
        hostsPath: "/etc/hosts",
        timings: {
          pollIntervalMs: 10_000,
          retryIntervalMs: 10_000,
          retryMaxWaitMs: 120_000,
          lbSettleMs: 30_000,
          eniWaitMs: 300_000,
          nodegroupWaitMs: 600_000,
          clusterWaitMs: 900_000,
          natWaitMs: 300_000,
        },
      },
    });
  });

  it("lets flags win over the env file", () => {
    const built = buildTeardownInput(parseArgs(["teardown", "--region", "eu-west-1", "--force=false"]), {
      AWS_REGION: "us-east-2",
      VPC_TAG: "lab-vpc",
      FORCE_DETACH_ENIS: "yes",
      ESCALATION_TARGETS: "module.eks, aws_vpc.main",
      RETRY_INTERVAL_MS: "2500",
    });

    if (!built.ok) throw new Error(JSON.stringify(built.blockers));
    expect(built.input.awsRegion).toBe("eu-west-1");
    expect(built.input.vpcTag).toBe("lab-vpc");
    expect(built.input.force).toBe(false);
    expect(built.input.escalationTargets).toEqual(["module.eks", "aws_vpc.main"]);
    expect(built.input.timings.retryIntervalMs).toBe(2500);
    expect(built.input.timings.pollIntervalMs).toBe(10_000);
  });

  it("reads the env file's switches", () => {
    const built = buildTeardownInput(parseArgs(["teardown"]), { FORCE_DETACH_ENIS: "1", DELETE_HOSTED_ZONE: "no" });

    if (!built.ok) throw new Error(JSON.stringify(built.blockers));
    expect(built.input.force).toBe(true);
    expect(built.input.deleteHostedZone).toBe(false);
  });

  it("splits host overrides", () => {
    const built = buildTeardownInput(parseArgs(["teardown", "--dns-override", "api.example.com=10.0.0.5"]));

    if (!built.ok) throw new Error(JSON.stringify(built.blockers));
    expect(built.input.dnsOverrides).toEqual([{ host: "api.example.com", ip: "10.0.0.5" }]);
  });

  it("reports invalid values as blockers", () => {
    const built = buildTeardownInput(parseArgs(["teardown", "--dns-override", "api.example.com"]), {
      NODEGROUP_WAIT_MS: "soon",
    });

    expect(built).toEqual({
      ok: false,
      blockers: [
        { code: "INVALID_INPUT", message: "dnsOverrides.0.ip: Invalid ip" },
        { code: "INVALID_INPUT", message: "timings.nodegroupWaitMs: Expected number, received nan" },
      ],
    });
  });
});

describe("buildDeployInput", () => {
  it("turns the controller off with --no-alb-controller", () => {
    const built = buildDeployInput(parseArgs(["deploy", "--no-alb-controller", "--release", "web"]), {
      CLUSTER_NAME: "lab",
    });

    if (!built.ok) throw new Error(JSON.stringify(built.blockers));
    expect(built.input.albController).toBe(false);
    expect(built.input.release).toBe("web");
    expect(built.input.clusterName).toBe("lab");
    expect(built.input.ingressName).toBeUndefined();
  });

  it("reads the node and ingress waits from the env file", () => {
    const built = buildDeployInput(parseArgs(["deploy"]), {
      NODE_READY_WAIT_MS: "600000",
      INGRESS_WAIT_MS: "60000",
      POLL_INTERVAL_MS: "5000",
    });

    if (!built.ok) throw new Error(JSON.stringify(built.blockers));
    expect(built.input.nodeReadyWaitMs).toBe(600_000);
    expect(built.input.ingressWaitMs).toBe(60_000);
    expect(built.input.pollIntervalMs).toBe(5_000);
  });

  it("keeps the default waits when the env file leaves them out", () => {
    const built = buildDeployInput(parseArgs(["deploy"]));

    if (!built.ok) throw new Error(JSON.stringify(built.blockers));
    expect(built.input.nodeReadyWaitMs).toBe(300_000);
    expect(built.input.ingressWaitMs).toBe(300_000);
    expect(built.input.pollIntervalMs).toBe(10_000);
  });
});

describe("parseEnvFile", () => {
  it("reads KEY=VALUE lines and ignores the rest", () => {
    const text = [
      "# Written by eksenv deploy",
      "",
      "export AWS_REGION=us-west-2",
      "CLUSTER_NAME=\"lab\"",
      "VPC_TAG='lab-vpc'",
      "not a setting",
      "HOSTED_ZONE=",
    ].join("\n");

    expect(parseEnvFile(text)).toEqual({
      AWS_REGION: "us-west-2",
      CLUSTER_NAME: "lab",
      VPC_TAG: "lab-vpc",
      HOSTED_ZONE: "",
    });
  });
});
