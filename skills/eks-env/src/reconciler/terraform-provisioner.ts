import { existsSync, readdirSync } from "node:fs";
import { rm } from "node:fs/promises";
import { join } from "node:path";
import * as tf from "../tools/terraform.js";
import type { CallResult } from "../tools/errors.js";
import type { DestroyOptions, Provisioner } from "./types.js";

export const STATE_FILES = [
  "terraform.tfstate",
  "terraform.tfstate.backup",
  ".terraform.tfstate.lock.info",
];

/**
 * Provisioner backed by the terraform CLI in one configuration directory.
 */
export function createTerraformProvisioner(dir: string, env?: tf.Env): Provisioner {
  let initialized = false;

  // A destroy in a directory that was never initialised needs its providers first
  async function ensureInit(): Promise<CallResult> {
    if (initialized || existsSync(join(dir, ".terraform"))) {
      initialized = true;
      return { status: "succeeded", value: undefined };
    }
    console.error(`   Initialising terraform in ${dir}...`);
    const result = await tf.init(dir, env);
    if (result.status === "succeeded") initialized = true;
    return result;
  }

  return {
    available() {
      if (!existsSync(dir)) return false;
      try {
        return readdirSync(dir).some(f => f.endsWith(".tf"));
      } catch {
        return false;
      }
    },
    stateList: () => tf.stateList(dir, env),
    stateShow: (address) => tf.stateShow(dir, address, env),
    output: (name) => tf.output(dir, name, env),
    async destroy(options?: DestroyOptions) {
      const init = await ensureInit();
      if (init.status !== "succeeded") return init;
      return tf.destroy(dir, options, env);
    },
    async removeStateFiles() {
      const removed: string[] = [];
      for (const file of STATE_FILES) {
        const path = join(dir, file);
        if (!existsSync(path)) continue;
        await rm(path, { force: true });
        removed.push(path);
      }
      if (removed.length > 0) console.error(`✓ Removed local state files: ${removed.join(", ")}`);
      return removed;
    },
  };
}
