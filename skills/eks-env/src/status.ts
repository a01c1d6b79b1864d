import { createAwsCloud } from "./reconciler/aws-cloud.js";
import { discover, type VpcSource } from "./reconciler/discovery.js";
import { createTerraformProvisioner } from "./reconciler/terraform-provisioner.js";
import { RESOURCE_KINDS, type CloudApi, type HostedZone, type Provisioner, type ResourceKind } from "./reconciler/types.js";
import { verify, type VerificationReport } from "./reconciler/verification.js";
import type { StatusInput } from "./schema.js";
import { validateAwsAuth } from "./steps/auth.js";
import { awsEnv } from "./tools/aws.js";
import type { Blocker } from "./tools/errors.js";

export type EnvironmentStatus = "present" | "absent" | "unknown";

export type StatusResult = {
  timestamp: string;
  status: EnvironmentStatus;
  vpcIds: string[];
  vpcSource: VpcSource;
  clusterNames: string[];
  zone?: HostedZone;
  resources: Partial<Record<ResourceKind, string[]>>;
  /** Kinds whose listing failed, so the counts above may be short. */
  unknownKinds: ResourceKind[];
  verification?: VerificationReport;
  warnings: string[];
  blockers: Blocker[];
};

export type StatusDeps = {
  cloud: CloudApi;
  provisioner?: Provisioner;
  authenticate: () => Promise<Blocker[]>;
};

export function defaultStatusDeps(input: StatusInput): StatusDeps {
  return {
    cloud: createAwsCloud(input.awsProfile, input.awsRegion),
    provisioner: createTerraformProvisioner(input.terraformDir, awsEnv(input.awsProfile, input.awsRegion)),
    async authenticate() {
      const auth = await validateAwsAuth(input.awsProfile, input.awsRegion);
      return auth.ok ? [] : auth.blockers;
    },
  };
}

/**
 * Read-only view of the environment: what discovery finds plus one
 * verification pass. Nothing is deleted.
 */
export async function runStatus(input: StatusInput, deps: StatusDeps = defaultStatusDeps(input)): Promise<StatusResult> {
  const timestamp = new Date().toISOString();
  const blockers = await deps.authenticate();
  if (blockers.length > 0) {
    return {
      timestamp,
      status: "unknown",
      vpcIds: [],
      vpcSource: "none",
      clusterNames: [],
      resources: {},
      unknownKinds: [],
      warnings: [],
      blockers,
    };
  }

  const discovery = await discover(
    deps.cloud,
    { vpcTag: input.vpcTag, clusterName: input.clusterName, hostedZone: input.hostedZone },
    deps.provisioner
  );

  const resources: Partial<Record<ResourceKind, string[]>> = {};
  const unknownKinds = new Set<ResourceKind>(discovery.unresolved.map(u => u.kind));
  for (const kind of RESOURCE_KINDS) {
    const slot = discovery.inventory[kind];
    if (slot.records.length > 0) resources[kind] = slot.records.map(r => r.id);
    if (slot.unknown.length > 0) unknownKinds.add(kind);
  }

  const verification = await verify(deps.cloud, {
    vpcTag: input.vpcTag,
    vpcIds: discovery.vpcIds,
    clusterNames: discovery.clusterNames,
  });

  const anything = Object.keys(resources).length > 0 || verification.status !== "clean";
  const status: EnvironmentStatus = anything
    ? (verification.errors.length > 0 && Object.keys(resources).length === 0 ? "unknown" : "present")
    : unknownKinds.size > 0 ? "unknown" : "absent";

  console.error("\n" + "=".repeat(80));
  console.error("📊 Environment Status");
  console.error("=".repeat(80));
  console.error(`VPC:        ${discovery.vpcIds.join(", ") || "none"}`);
  console.error(`Cluster:    ${discovery.clusterNames.join(", ") || "none"}`);
  if (discovery.zone) console.error(`Zone:       ${discovery.zone.name} (${discovery.zone.zoneId})`);
  for (const [kind, ids] of Object.entries(resources)) {
    console.error(`  ${kind.padEnd(18)} ${ids.length}`);
  }
  for (const kind of unknownKinds) console.error(`  ${kind.padEnd(18)} ? (listing failed)`);
  console.error(`Status:     ${status}`);
  console.error("=".repeat(80));

  return {
    timestamp,
    status,
    vpcIds: discovery.vpcIds,
    vpcSource: discovery.vpcSource,
    clusterNames: discovery.clusterNames,
    zone: discovery.zone,
    resources,
    unknownKinds: [...unknownKinds],
    verification,
    warnings: discovery.warnings,
    blockers: [],
  };
}
