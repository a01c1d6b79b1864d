import { readFileSync, writeFileSync } from "node:fs";

export type DnsOverride = { host: string; ip: string };

export const DEFAULT_HOSTS_PATH = "/etc/hosts";

const BEGIN_MARKER = "# BEGIN eksenv dns override";
const END_MARKER = "# END eksenv dns override";

export function renderOverrideBlock(overrides: DnsOverride[]): string {
  return [BEGIN_MARKER, ...overrides.map(o => `${o.ip} ${o.host}`), END_MARKER].join("\n") + "\n";
}

/**
 * Remove every marked override block and leave the rest of the file untouched.
 */
export function stripOverrideBlock(text: string): string {
  const out: string[] = [];
  let inside = false;
  for (const line of text.split("\n")) {
    if (line === BEGIN_MARKER) {
      inside = true;
      continue;
    }
    if (line === END_MARKER) {
      inside = false;
      continue;
    }
    if (!inside) out.push(line);
  }
  return out.join("\n");
}

/** "host=ip" into its parts; the address is validated by the input schema. */
export function splitDnsOverride(value: string): DnsOverride {
  const at = value.indexOf("=");
  if (at === -1) return { host: value.trim(), ip: "" };
  return { host: value.slice(0, at).trim(), ip: value.slice(at + 1).trim() };
}

export type HostsOverrideOptions = {
  hostsPath?: string;
};

/**
 * Run `fn` with the overrides written to the hosts file. The block is removed
 * again when `fn` settles either way, and on SIGINT or SIGTERM before the
 * process exits. A hosts file that cannot be written only costs the override.
 */
export async function withHostsOverride<T>(
  overrides: DnsOverride[],
  fn: () => Promise<T>,
  options: HostsOverrideOptions = {}
): Promise<T> {
  if (overrides.length === 0) return fn();
  const hostsPath = options.hostsPath ?? DEFAULT_HOSTS_PATH;

  try {
    const current = stripOverrideBlock(readFileSync(hostsPath, "utf8"));
    const separator = current === "" || current.endsWith("\n") ? "" : "\n";
    writeFileSync(hostsPath, current + separator + renderOverrideBlock(overrides), "utf8");
  } catch (err) {
    console.error(`⚠️  Could not write DNS overrides to ${hostsPath}: ${err instanceof Error ? err.message : String(err)}`);
    return fn();
  }
  console.error(`   DNS overrides active: ${overrides.map(o => `${o.host} → ${o.ip}`).join(", ")}`);

  let restored = false;
  const restore = () => {
    if (restored) return;
    restored = true;
    try {
      writeFileSync(hostsPath, stripOverrideBlock(readFileSync(hostsPath, "utf8")), "utf8");
    } catch (err) {
      console.error(`❌ Could not restore ${hostsPath}; remove the "${BEGIN_MARKER}" block by hand: ${err instanceof Error ? err.message : String(err)}`);
    }
  };
  const onSigint = () => {
    restore();
    process.exit(130);
  };
  const onSigterm = () => {
    restore();
    process.exit(143);
  };
  process.once("SIGINT", onSigint);
  process.once("SIGTERM", onSigterm);

  try {
    return await fn();
  } finally {
    process.removeListener("SIGINT", onSigint);
    process.removeListener("SIGTERM", onSigterm);
    restore();
  }
}
