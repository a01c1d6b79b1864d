import { join } from "node:path";
import type { DeployInput } from "./schema.js";
import { validateAwsAuth } from "./steps/auth.js";
import { checkTools, type Tool } from "./steps/checks.js";
import { awsEnv, updateKubeconfig } from "./tools/aws.js";
import { createIamServiceAccount } from "./tools/eksctl.js";
import { describeResult, type Blocker } from "./tools/errors.js";
import { writeEnvFile } from "./tools/file.js";
import { lint, repoAdd, repoUpdate, upgradeInstall } from "./tools/helm.js";
import { getIngressHostname, getNodes } from "./tools/kubectl.js";
import { pollUntil, systemClock, type Clock } from "./tools/poll.js";
import { formatElapsed } from "./tools/spinner.js";
import * as tf from "./tools/terraform.js";

const PLAN_FILE = "tfplan";

export const ALB_CONTROLLER = {
  release: "aws-load-balancer-controller",
  chart: "eks/aws-load-balancer-controller",
  namespace: "kube-system",
  serviceAccount: "aws-load-balancer-controller",
  roleName: "AmazonEKSLoadBalancerControllerRole",
  policyArn: "arn:aws:iam::aws:policy/ElasticLoadBalancingFullAccess",
  repoName: "eks",
  repoUrl: "https://aws.github.io/eks-charts",
} as const;

export type DeployEvidence = {
  terraform: { init: boolean; plan: boolean; apply: boolean; clusterName?: string };
  nodes: { total: number; ready: number; waitedMs: number };
  albController: { skipped: boolean; serviceAccountExisted?: boolean; installed: boolean };
  release: { name: string; namespace: string; linted: boolean; installed: boolean };
  ingress: { name: string; hostname?: string };
  envFile?: string;
};

export type DeployResult = {
  status: "completed" | "error";
  evidence: DeployEvidence;
  blockers: Blocker[];
  warnings: string[];
  remediation?: string[];
};

export type DeployDeps = {
  clock: Clock;
  preflight: () => Promise<{ blockers: Blocker[]; remediation: string[] }>;
};

const DEPLOY_TOOLS: readonly Tool[] = ["aws", "terraform", "kubectl", "helm", "eksctl"];

export function defaultDeployDeps(input: DeployInput): DeployDeps {
  return {
    clock: systemClock,
    async preflight() {
      const blockers = await checkTools(DEPLOY_TOOLS);
      if (blockers.some(b => b.code === "AWS_UNAVAILABLE")) return { blockers, remediation: [] };

      const auth = await validateAwsAuth(input.awsProfile, input.awsRegion);
      if (!auth.ok) {
        return { blockers: [...blockers, ...auth.blockers], remediation: auth.remediation.map(r => r.message) };
      }
      console.error(`   ✓ Authenticated as ${auth.arn}`);
      return { blockers, remediation: [] };
    },
  };
}

/**
 * Lines for the env file written after a successful deploy. The keys are the
 * ones `teardown` and `status` read back through `--env-file`.
 */
export function renderEnvLines(input: DeployInput, clusterName: string, ingressName: string, hostname?: string): string[] {
  const lines = [
    "# Written by eksenv deploy",
    `AWS_PROFILE=${input.awsProfile}`,
    `AWS_REGION=${input.awsRegion}`,
    `VPC_TAG=${input.vpcTag}`,
    `CLUSTER_NAME=${clusterName}`,
    `TERRAFORM_DIR=${input.terraformDir}`,
    `CHART_DIR=${input.chartDir}`,
    `RELEASE_NAME=${input.release}`,
    `NAMESPACE=${input.namespace}`,
    `INGRESS_NAME=${ingressName}`,
  ];
  if (hostname) lines.push(`INGRESS_HOSTNAME=${hostname}`);
  return lines;
}

export async function runDeploy(input: DeployInput, deps: DeployDeps = defaultDeployDeps(input)): Promise<DeployResult> {
  const ingressName = input.ingressName ?? `${input.release}-ingress`;
  const evidence: DeployEvidence = {
    terraform: { init: false, plan: false, apply: false },
    nodes: { total: 0, ready: 0, waitedMs: 0 },
    albController: { skipped: !input.albController, installed: false },
    release: { name: input.release, namespace: input.namespace, linted: false, installed: false },
    ingress: { name: ingressName },
  };
  const warnings: string[] = [];
  const fail = (code: string, message: string): DeployResult => {
    console.error(`❌ ${message}`);
    return { status: "error", evidence, blockers: [{ code, message }], warnings };
  };

  console.error("⏳ Running preflight...");
  const preflight = await deps.preflight();
  if (preflight.blockers.length > 0) {
    for (const b of preflight.blockers) console.error(`❌ ${b.message}`);
    for (const line of preflight.remediation) console.error(line);
    return { status: "error", evidence, blockers: preflight.blockers, warnings, remediation: preflight.remediation };
  }
  console.error("✓ Preflight passed");

  // ============================================================
  // Infrastructure
  // ============================================================
  const baseEnv = awsEnv(input.awsProfile, input.awsRegion);
  const dir = input.terraformDir;

  console.error(`\n⏳ Initializing Terraform in ${dir}...`);
  const init = await tf.init(dir, baseEnv);
  if (init.status !== "succeeded") return fail("TERRAFORM_INIT_FAILED", `terraform init failed: ${describeResult(init)}`);
  evidence.terraform.init = true;

  console.error("⏳ Planning...");
  const planned = await tf.plan(dir, PLAN_FILE, baseEnv);
  if (planned.status !== "succeeded") return fail("TERRAFORM_PLAN_FAILED", `terraform plan failed: ${describeResult(planned)}`);
  evidence.terraform.plan = true;

  console.error("⏳ Applying plan (this usually takes 15-20 minutes)...");
  const applied = await tf.apply(dir, PLAN_FILE, baseEnv);
  if (applied.status !== "succeeded") {
    return fail("TERRAFORM_APPLY_FAILED", `terraform apply failed: ${describeResult(applied)} (plan kept at ${join(dir, PLAN_FILE)})`);
  }
  evidence.terraform.apply = true;
  console.error("✓ Infrastructure applied");

  let clusterName = input.clusterName;
  if (!clusterName) {
    const out = await tf.output(dir, "cluster_name", baseEnv);
    if (out.status === "succeeded" && out.value) clusterName = out.value;
  }
  if (!clusterName) {
    return fail("CLUSTER_NAME_UNKNOWN", "Cluster name is not configured and terraform has no cluster_name output. Pass --cluster.");
  }
  evidence.terraform.clusterName = clusterName;

  // ============================================================
  // Cluster access
  // ============================================================
  const env = awsEnv(input.awsProfile, input.awsRegion, clusterName);

  console.error(`\n⏳ Updating kubeconfig for ${clusterName}...`);
  const kubeconfig = await updateKubeconfig(clusterName, input.awsProfile, input.awsRegion);
  if (!kubeconfig.ok) return fail("KUBECONFIG_FAILED", `aws eks update-kubeconfig failed: ${kubeconfig.stderr}`);

  console.error("⏳ Waiting for nodes to become Ready...");
  const nodes = await pollUntil(
    () => getNodes(env),
    res => res.nodes.ready > 0,
    {
      intervalMs: input.pollIntervalMs,
      timeoutMs: input.nodeReadyWaitMs,
      clock: deps.clock,
      onWait: (elapsedMs) => console.error(`   [${formatElapsed(elapsedMs)}] no Ready nodes yet...`),
    }
  );
  evidence.nodes = { total: nodes.value.nodes.total, ready: nodes.value.nodes.ready, waitedMs: nodes.elapsedMs };
  if (!nodes.ok) {
    return fail("NO_READY_NODES", `No node became Ready within ${formatElapsed(input.nodeReadyWaitMs)}`);
  }
  console.error(`✓ ${nodes.value.nodes.ready}/${nodes.value.nodes.total} node(s) Ready`);

  // ============================================================
  // AWS Load Balancer Controller
  // ============================================================
  if (input.albController) {
    console.error("\n⏳ Installing AWS Load Balancer Controller...");
    const sa = await createIamServiceAccount({
      cluster: clusterName,
      namespace: ALB_CONTROLLER.namespace,
      name: ALB_CONTROLLER.serviceAccount,
      roleName: ALB_CONTROLLER.roleName,
      policyArn: ALB_CONTROLLER.policyArn,
      region: input.awsRegion,
    }, env);
    if (!sa.ok) return fail("ALB_SERVICE_ACCOUNT_FAILED", `Could not create the controller service account: ${sa.raw.stderr}`);
    evidence.albController.serviceAccountExisted = sa.existed;

    const repo = await repoAdd(ALB_CONTROLLER.repoName, ALB_CONTROLLER.repoUrl, env);
    if (!repo.ok) return fail("HELM_REPO_FAILED", `helm repo add failed: ${repo.stderr}`);
    const update = await repoUpdate(env);
    if (!update.ok) warnings.push(`helm repo update failed: ${update.stderr}`);

    const controller = await upgradeInstall(
      ALB_CONTROLLER.release,
      ALB_CONTROLLER.chart,
      ALB_CONTROLLER.namespace,
      {
        set: {
          clusterName,
          "serviceAccount.create": "false",
          "serviceAccount.name": ALB_CONTROLLER.serviceAccount,
        },
        wait: true,
      },
      env,
      deps.clock
    );
    if (!controller.ok) return fail("ALB_CONTROLLER_FAILED", `Load balancer controller install failed: ${controller.stderr}`);
    evidence.albController.installed = true;
    console.error("✓ AWS Load Balancer Controller installed");
  } else {
    console.error("\n⏭️  Skipping AWS Load Balancer Controller");
  }

  // ============================================================
  // Application release
  // ============================================================
  console.error(`\n⏳ Linting chart ${input.chartDir}...`);
  const linted = await lint(input.chartDir, env);
  if (!linted.ok) return fail("HELM_LINT_FAILED", `helm lint failed: ${linted.stderr || linted.stdout}`);
  evidence.release.linted = true;

  console.error(`⏳ Installing release ${input.release} into ${input.namespace}...`);
  const release = await upgradeInstall(
    input.release,
    input.chartDir,
    input.namespace,
    { wait: true, timeout: "10m", createNamespace: true },
    env,
    deps.clock
  );
  if (!release.ok) return fail("HELM_INSTALL_FAILED", `helm upgrade --install failed: ${release.stderr}`);
  evidence.release.installed = true;
  console.error(`✓ Release ${input.release} installed`);

  console.error(`⏳ Waiting for ingress ${ingressName} to get an address...`);
  const ingress = await pollUntil(
    () => getIngressHostname(ingressName, input.namespace, env),
    hostname => hostname !== null,
    {
      intervalMs: input.pollIntervalMs,
      timeoutMs: input.ingressWaitMs,
      clock: deps.clock,
      onWait: (elapsedMs) => console.error(`   [${formatElapsed(elapsedMs)}] ingress has no address yet...`),
    }
  );
  if (ingress.value !== null) {
    evidence.ingress.hostname = ingress.value;
    console.error(`✓ Ingress address: ${ingress.value}`);
  } else {
    const message = `Ingress ${ingressName} has no address after ${formatElapsed(input.ingressWaitMs)}; check it later with kubectl get ingress -n ${input.namespace}`;
    warnings.push(message);
    console.error(`⚠️  ${message}`);
  }

  if (input.outputEnvPath) {
    const written = await writeEnvFile(
      input.outputEnvPath,
      renderEnvLines(input, clusterName, ingressName, evidence.ingress.hostname),
      input.overwriteEnv
    );
    if (written.ok) {
      evidence.envFile = input.outputEnvPath;
      console.error(`✓ Wrote ${input.outputEnvPath}`);
    } else {
      warnings.push(written.error);
      console.error(`⚠️  ${written.error}`);
    }
  }

  console.error("\n✓ Deploy completed");
  return { status: "completed", evidence, blockers: [], warnings };
}
