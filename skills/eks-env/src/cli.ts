import { buildDeployInput, buildStatusInput, buildTeardownInput, parseArgs, type ParsedArgs } from "./args.js";
import { runDeploy } from "./deploy.js";
import { runStatus } from "./status.js";
import { exitCodeFor, runTeardown } from "./teardown.js";
import type { Blocker } from "./tools/errors.js";
import { readEnvFile } from "./tools/file.js";
import { showHelp } from "./tools/help.js";

type EnvValues = Record<string, string>;

function printResult(result: unknown): void {
  console.log(JSON.stringify(result, null, 2));
}

function rejectInput(blockers: Blocker[]): number {
  console.error("\n❌ Configuration Error:");
  for (const b of blockers) console.error(`   - ${b.message}`);
  console.error("\n💡 Hint: run 'eksenv help <command>' for the accepted options.");
  printResult({ status: "aborted", blockers });
  return 1;
}

async function execTeardown(args: ParsedArgs, env: EnvValues): Promise<number> {
  const validated = buildTeardownInput(args, env);
  if (!validated.ok) return rejectInput(validated.blockers);
  const result = await runTeardown(validated.input);
  printResult(result);
  return exitCodeFor(result.status);
}

async function execDeploy(args: ParsedArgs, env: EnvValues): Promise<number> {
  const validated = buildDeployInput(args, env);
  if (!validated.ok) return rejectInput(validated.blockers);
  const result = await runDeploy(validated.input);
  printResult(result);
  return result.status === "completed" ? 0 : 1;
}

async function execStatus(args: ParsedArgs, env: EnvValues): Promise<number> {
  const validated = buildStatusInput(args, env);
  if (!validated.ok) return rejectInput(validated.blockers);
  const result = await runStatus(validated.input);
  printResult(result);
  return result.blockers.length > 0 ? 1 : 0;
}

/**
 * Dispatch one command line. Returns the process exit code.
 */
export async function runCli(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  const command = args.command;

  if (!command || command === "help" || args.flags["help"]) {
    return showHelp(command === "help" ? args.positionals[0] : command) ? 0 : 1;
  }

  let env: EnvValues = {};
  const envFilePath = args.flags["env-file"]?.at(-1);
  if (envFilePath) {
    const envFile = await readEnvFile(envFilePath);
    if (!envFile.ok) {
      console.error(`❌ ${envFile.error}`);
      return 1;
    }
    env = envFile.values;
    console.error(`✓ Loaded settings from ${envFilePath}`);
  }

  switch (command) {
    case "teardown":
      return execTeardown(args, env);
    case "deploy":
      return execDeploy(args, env);
    case "status":
      return execStatus(args, env);
    default:
      console.error(`Unknown command: ${command}`);
      console.error("Run 'eksenv help' for available commands");
      return 1;
  }
}
