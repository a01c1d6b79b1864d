import { run } from "./shell.js";

export type Env = Record<string, string>;

export async function eksctl(args: string[], env?: Env) {
  return run("eksctl", args, env);
}

export type IamServiceAccountConfig = {
  cluster: string;
  namespace: string;
  name: string;
  roleName: string;
  policyArn: string;
  region: string;
};

export async function createIamServiceAccount(config: IamServiceAccountConfig, env?: Env) {
  const res = await eksctl([
    "create",
    "iamserviceaccount",
    `--cluster=${config.cluster}`,
    `--namespace=${config.namespace}`,
    `--name=${config.name}`,
    "--role-name",
    config.roleName,
    `--attach-policy-arn=${config.policyArn}`,
    "--approve",
    `--region=${config.region}`,
  ], env);
  // Ignore errors if already exists (idempotency)
  return { ok: res.ok || res.stderr.includes("already exists"), existed: !res.ok, raw: res };
}
