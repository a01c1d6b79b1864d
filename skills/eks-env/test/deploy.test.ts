import { beforeEach, describe, expect, it, vi } from "vitest";
import { ALB_CONTROLLER, renderEnvLines, runDeploy, type DeployDeps } from "../src/deploy.js";
import { DeployInputSchema, type DeployInput } from "../src/schema.js";
import { run, type ShellResult } from "../src/tools/shell.js";
import { FakeClock } from "./support/fake-clock.js";

vi.mock("../src/tools/shell.js", () => ({ run: vi.fn() }));

const runMock = vi.mocked(run);

const ok = (stdout: string): ShellResult => ({ ok: true, exitCode: 0, stdout, stderr: "" });
const err = (stderr: string): ShellResult => ({ ok: false, exitCode: 1, stdout: "", stderr });

/** "tool word word" from the first two arguments that are not flags. */
const label = (cmd: string, args: string[]) =>
  [cmd, ...args.filter(a => !a.startsWith("-")).slice(0, 2)].join(" ");

const nodes = (ready: boolean) => JSON.stringify({
  items: [{ metadata: { name: "ip-10-0-1-1" }, status: { conditions: [{ type: "Ready", status: ready ? "True" : "False" }] } }],
});

/**
 * Every tool succeeds unless overridden. Nodes turn Ready on the second listing.
 */
function tools(options: { overrides?: Record<string, ShellResult>; hostname?: string } = {}) {
  let nodeListings = 0;
  runMock.mockImplementation(async (cmd, args) => {
    const key = label(cmd, args);
    const override = options.overrides?.[key];
    if (override) return override;
    if (key === "terraform output cluster_name") return ok("lab\n");
    if (key === "kubectl get nodes") return ok(nodes(nodeListings++ > 0));
    if (key === "kubectl get ingress") return ok(options.hostname ?? "");
    if (key.startsWith("helm list")) return ok("[]");
    return ok("");
  });
}

const calls = () => runMock.mock.calls.map(([cmd, args]) => label(cmd, args));

function deployInput(overrides: Partial<DeployInput> = {}): DeployInput {
  return DeployInputSchema.parse({ pollIntervalMs: 1000, nodeReadyWaitMs: 5000, ingressWaitMs: 3000, ...overrides });
}

type Preflight = Awaited<ReturnType<DeployDeps["preflight"]>>;

function deps(preflight: Preflight = { blockers: [], remediation: [] }): DeployDeps {
  return { clock: new FakeClock(), preflight: async () => preflight };
}

describe("runDeploy", () => {
  beforeEach(() => {
    runMock.mockReset();
  });

  it("provisions, waits for a node and installs the controller and the release", async () => {
    tools({ hostname: "k8s-app.elb.amazonaws.com" });

    const result = await runDeploy(deployInput(), deps());

    expect(result.status).toBe("completed");
    expect(result.warnings).toEqual([]);
    expect(result.evidence).toEqual({
      terraform: { init: true, plan: true, apply: true, clusterName: "lab" },
      nodes: { total: 1, ready: 1, waitedMs: 1000 },
      albController: { skipped: false, serviceAccountExisted: false, installed: true },
      release: { name: "app", namespace: "default", linted: true, installed: true },
      ingress: { name: "app-ingress", hostname: "k8s-app.elb.amazonaws.com" },
    });
    expect(calls()).toEqual([
      "terraform init",
      "terraform plan",
      "terraform apply tfplan",
      "terraform output cluster_name",
      "aws eks update-kubeconfig",
      "kubectl get nodes",
      "kubectl get nodes",
      "eksctl create iamserviceaccount",
      "helm repo add",
      "helm repo update",
      "helm list kube-system",
      "helm upgrade aws-load-balancer-controller",
      "helm lint ./chart",
      "helm list default",
      "helm upgrade app",
      "kubectl get ingress",
    ]);

    const controller = runMock.mock.calls.find(([cmd, args]) => cmd === "helm" && args[2] === ALB_CONTROLLER.release);
    expect(controller?.[1]).toContain("clusterName=lab");
    expect(controller?.[1]).toContain("serviceAccount.create=false");
  });

  it("stops at a failed apply and keeps the plan", async () => {
    tools({
      overrides: {
        "terraform apply tfplan": err("Error: creating EKS Cluster (lab): AccessDeniedException: not authorized"),
      },
    });

    const result = await runDeploy(deployInput(), deps());

    expect(result.status).toBe("error");
    expect(result.blockers).toEqual([{
      code: "TERRAFORM_APPLY_FAILED",
      message: "terraform apply failed: fatal: Error: creating EKS Cluster (lab): AccessDeniedException: not authorized (plan kept at terraform/tfplan)",
    }]);
    expect(calls()).toEqual(["terraform init", "terraform plan", "terraform apply tfplan"]);
  });

  it("gives up when no node becomes Ready", async () => {
    runMock.mockImplementation(async (cmd, args) =>
      label(cmd, args) === "kubectl get nodes" ? ok(nodes(false)) : ok("")
    );

    const result = await runDeploy(deployInput({ clusterName: "lab" }), deps());

    expect(result.blockers).toEqual([{ code: "NO_READY_NODES", message: "No node became Ready within 0m 5s" }]);
    expect(result.evidence.nodes).toEqual({ total: 1, ready: 0, waitedMs: 5000 });
    expect(calls()).not.toContain("terraform output cluster_name");
  });

  it("finishes with a warning when the ingress has no address yet", async () => {
    tools();

    const result = await runDeploy(deployInput({ albController: false }), deps());

    expect(result.status).toBe("completed");
    expect(result.evidence.albController).toEqual({ skipped: true, installed: false });
    expect(result.warnings).toEqual([
      "Ingress app-ingress has no address after 0m 3s; check it later with kubectl get ingress -n default",
    ]);
    expect(calls().filter(c => c.startsWith("eksctl"))).toEqual([]);
    expect(calls().filter(c => c === "kubectl get ingress")).toHaveLength(4);
  });

  it("touches nothing when preflight fails", async () => {
    const blockers = [{ code: "HELM_UNAVAILABLE", message: "helm is not installed" }];

    const result = await runDeploy(deployInput(), deps({ blockers, remediation: [] }));

    expect(result.status).toBe("error");
    expect(result.blockers).toEqual(blockers);
    expect(runMock).not.toHaveBeenCalled();
  });
});

describe("renderEnvLines", () => {
  it("writes the settings teardown and status read back", () => {
    const input = deployInput({ awsProfile: "lab", awsRegion: "us-west-2" });

    expect(renderEnvLines(input, "lab", "app-ingress", "k8s-app.elb.amazonaws.com")).toEqual([
      "# Written by eksenv deploy",
      "AWS_PROFILE=lab",
      "AWS_REGION=us-west-2",
      "VPC_TAG=eks-vpc",
      "CLUSTER_NAME=lab",
      "TERRAFORM_DIR=./terraform",
      "CHART_DIR=./chart",
      "RELEASE_NAME=app",
      "NAMESPACE=default",
      "INGRESS_NAME=app-ingress",
      "INGRESS_HOSTNAME=k8s-app.elb.amazonaws.com",
    ]);
  });
});
