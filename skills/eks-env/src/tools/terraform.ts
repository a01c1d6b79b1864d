import { run } from "./shell.js";
import { fromShell, fromShellVoid, type CallResult } from "./errors.js";

export type Env = Record<string, string>;

export async function terraform(dir: string, args: string[], env?: Env) {
  return run("terraform", [`-chdir=${dir}`, ...args], env);
}

export async function init(dir: string, env?: Env): Promise<CallResult> {
  return fromShellVoid(await terraform(dir, ["init", "-input=false", "-no-color"], env));
}

export async function plan(dir: string, planFile: string, env?: Env): Promise<CallResult> {
  return fromShellVoid(await terraform(dir, ["plan", "-input=false", "-no-color", `-out=${planFile}`], env));
}

export async function apply(dir: string, planFile: string, env?: Env): Promise<CallResult> {
  return fromShellVoid(await terraform(dir, ["apply", "-input=false", "-no-color", planFile], env));
}

export type DestroyArgs = {
  targets?: string[];
  refresh?: boolean;
};

export function destroyArgs(options: DestroyArgs = {}): string[] {
  const args = ["destroy", "-auto-approve", "-input=false", "-lock=false", "-no-color"];
  if (options.refresh === false) args.push("-refresh=false");
  for (const target of options.targets ?? []) {
    args.push(`-target=${target}`);
  }
  return args;
}

export async function destroy(dir: string, options?: DestroyArgs, env?: Env): Promise<CallResult> {
  return fromShellVoid(await terraform(dir, destroyArgs(options), env));
}

/**
 * Resource addresses in the current state. Older releases answer
 * "No state file was found!" instead of an empty listing.
 */
export async function stateList(dir: string, env?: Env): Promise<CallResult<string[]>> {
  const res = await terraform(dir, ["state", "list"], env);
  if (!res.ok && res.stderr.includes("No state file was found")) {
    return { status: "succeeded", value: [] };
  }
  return fromShell(res, stdout => stdout.split("\n").map(l => l.trim()).filter(Boolean));
}

/**
 * Top-level attributes of one resource in `terraform state show` output.
 * Nested blocks and maps are skipped.
 */
export function parseStateShow(stdout: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const line of stdout.split("\n")) {
    const m = /^ {4}([A-Za-z0-9_]+)\s+=\s+(.*)$/.exec(line);
    if (!m) continue;
    const [, key, raw] = m;
    if (!key || raw === undefined || raw.endsWith("{") || raw.endsWith("[")) continue;
    attributes[key] = raw.replace(/^"(.*)"$/, "$1");
  }
  return attributes;
}

export async function stateShow(dir: string, address: string, env?: Env): Promise<CallResult<Record<string, string>>> {
  const res = await terraform(dir, ["state", "show", "-no-color", address], env);
  return fromShell(res, parseStateShow);
}

export async function output(dir: string, name: string, env?: Env): Promise<CallResult<string>> {
  const res = await terraform(dir, ["output", "-raw", name], env);
  return fromShell(res, stdout => stdout.trim());
}
