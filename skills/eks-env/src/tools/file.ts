import { existsSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";

export async function writeEnvFile(path: string, envLines: string[], overwrite: boolean) {
  if (existsSync(path) && !overwrite) {
    return { ok: false as const, error: `Env file already exists: ${path}. Use --overwrite-env to replace.` };
  }
  await writeFile(path, envLines.join("\n") + "\n", "utf8");
  return { ok: true as const };
}

/**
 * Parse KEY=VALUE lines. Blank lines, comments and a leading `export` are
 * ignored; one pair of surrounding quotes is stripped from the value.
 */
export function parseEnvFile(text: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;
    const m = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)=(.*)$/.exec(line);
    if (!m) continue;
    const [, key, value] = m;
    if (!key || value === undefined) continue;
    values[key] = value.trim().replace(/^(["'])(.*)\1$/, "$2");
  }
  return values;
}

export async function readEnvFile(path: string) {
  if (!existsSync(path)) {
    return { ok: false as const, error: `Env file not found: ${path}` };
  }
  return { ok: true as const, values: parseEnvFile(await readFile(path, "utf8")) };
}
