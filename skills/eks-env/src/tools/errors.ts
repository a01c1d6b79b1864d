import type { z } from "zod";
import type { ShellResult } from "./shell.js";

export type FailureStatus = "blocked" | "transient" | "fatal";

/**
 * Normalised outcome of one call against the cloud or the provisioning tool.
 * "not-found" means the target is already gone, which callers deleting things treat as success.
 */
export type CallResult<T = void> =
  | { status: "succeeded"; value: T }
  | { status: "not-found" }
  | { status: FailureStatus; message: string };

export type Blocker = { code: string; message: string };

export const OK: CallResult = { status: "succeeded", value: undefined };

export function succeeded<T>(value: T): CallResult<T> {
  return { status: "succeeded", value };
}

// Something else still references the resource; retrying later can work
const BLOCKED = [
  /DependencyViolation/,
  /ResourceInUse/,
  /InvalidNetworkInterface\.InUse/,
  /InvalidIPAddress\.InUse/,
  /HostedZoneNotEmpty/,
  /currently in use/i,
  /has a dependent object/i,
  /has dependencies/i,
];

// Throttling, timeouts and network trouble on the way to the API
const TRANSIENT = [
  /Throttl/i,
  /RequestLimitExceeded/,
  /Rate exceeded/i,
  /RequestTimeout/,
  /ServiceUnavailable/,
  /InternalError/,
  /InternalFailure/,
  /PriorRequestNotComplete/,
  /Could not connect to the endpoint URL/,
  /timed out/i,
  /i\/o timeout/,
  /TLS handshake timeout/,
  /connection reset/i,
  /connection refused/i,
  /no such host/i,
  /Error acquiring the state lock/,
];

const NOT_FOUND = [
  /\.NotFound\b/,
  /NotFoundException/,
  /NotFound\b/,
  /NoSuchHostedZone/,
  /does not exist/i,
  /not found/i,
];

export function classifyFailure(text: string): "not-found" | FailureStatus {
  if (BLOCKED.some(p => p.test(text))) return "blocked";
  if (TRANSIENT.some(p => p.test(text))) return "transient";
  if (NOT_FOUND.some(p => p.test(text))) return "not-found";
  return "fatal";
}

export function failure<T = void>(text: string): CallResult<T> {
  const status = classifyFailure(text);
  if (status === "not-found") return { status };
  return { status, message: firstLine(text) };
}

function firstLine(text: string): string {
  const line = text.split("\n").map(l => l.trim()).find(Boolean);
  return line ?? "unknown error";
}

/**
 * Turn a finished CLI call into a CallResult. A missing binary (exit 127) is
 * always fatal so that "Command not found" is never read as "resource not found".
 */
export function fromShell<T>(res: ShellResult, parse: (stdout: string) => T): CallResult<T> {
  if (res.ok) {
    try {
      return succeeded(parse(res.stdout));
    } catch (err) {
      return { status: "fatal", message: `Could not parse output: ${err instanceof Error ? err.message : String(err)}` };
    }
  }
  if (res.exitCode === 127) {
    return { status: "fatal", message: firstLine(res.stderr) };
  }
  return failure<T>(res.stderr || res.stdout);
}

export function fromShellVoid(res: ShellResult): CallResult {
  return fromShell(res, () => undefined);
}

export function parseJson<S extends z.ZodTypeAny>(schema: S): (stdout: string) => z.output<S> {
  return (stdout) => schema.parse(stdout.trim() ? JSON.parse(stdout) : null);
}

export function describeResult(result: CallResult<unknown>): string {
  switch (result.status) {
    case "succeeded":
      return "succeeded";
    case "not-found":
      return "not found";
    default:
      return `${result.status}: ${result.message}`;
  }
}
