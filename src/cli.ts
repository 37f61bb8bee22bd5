#!/usr/bin/env node
/**
 * CLI for the agent tick runtime.
 * Usage: agent-tick <command> [options]
 * Commands: tick | run | capabilities | validate
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import fs from "node:fs/promises";
import { DEFAULT_CONFIG_FILE, createAgentFromConfig, loadAgentConfig } from "./config/AgentConfig.js";
import type { AgentAssembly } from "./config/AgentConfig.js";
import { parseFunctionCall } from "./protocol/FunctionCallProtocol.js";
import type { TickResult } from "./engine/TickEngine.js";
import { describeError, isRuntimeError } from "./core/errors.js";
import { createLogger, stderrWriter, summarizeForLog } from "./observability/Logger.js";

type Command = "tick" | "run" | "capabilities" | "validate" | "help";

interface CliArgs {
  command: Command;
  configPath: string;
  task?: string;
  ticks: number;
  intervalMs: number;
  session?: string;
  positional: string[];
  help: boolean;
}

const COMMANDS: readonly Command[] = ["tick", "run", "capabilities", "validate", "help"];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const value = Number.parseInt(raw ?? "", 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function parseArgv(argv: string[]): CliArgs {
  const args = argv.slice(2);
  let command: Command = "help";
  let commandSeen = false;
  let configPath = path.resolve(process.cwd(), DEFAULT_CONFIG_FILE);
  let task: string | undefined;
  let ticks = 1;
  let intervalMs = 1000;
  let session: string | undefined;
  let help = false;
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      help = true;
    } else if (arg === "--config" || arg === "-c") {
      configPath = path.resolve(process.cwd(), args[++i] ?? "");
    } else if (arg === "--task" || arg === "-t") {
      task = args[++i];
    } else if (arg === "--ticks" || arg === "-n") {
      ticks = parsePositiveInt(args[++i], 1);
    } else if (arg === "--interval" || arg === "-i") {
      intervalMs = parsePositiveInt(args[++i], 1000);
    } else if (arg === "--session" || arg === "-s") {
      session = args[++i];
    } else if (arg !== undefined && !commandSeen && isCommand(arg)) {
      command = arg;
      commandSeen = true;
    } else if (arg !== undefined) {
      positional.push(arg);
    }
  }

  return { command, configPath, task, ticks, intervalMs, session, positional, help };
}

function printHelp(): void {
  const bin = "agent-tick";
  process.stdout.write(`
Usage: ${bin} <command> [options]

Commands:
  tick          Run one or more ticks for the configured agent and print what was dispatched.
  run           Tick on a timer until interrupted (Ctrl+C).
  capabilities  List every capability action the agent can call.
  validate      Check a function-call payload: ${bin} validate '<json>'.

Options:
  --config, -c <path>     Config file path (default: ./${DEFAULT_CONFIG_FILE}).
  --task, -t <text>       Task to queue before ticking.
  --ticks, -n <count>     For 'tick': number of ticks (default: 1).
  --interval, -i <ms>     For 'run': pause between ticks (default: 1000).
  --session, -s <handle>  Resume a saved session instead of starting a new one.
  --help, -h              Show this help.

Examples:
  ${bin} tick --task "write a haiku"
  ${bin} run -c ./agent.yaml --interval 5000
  ${bin} capabilities
  ${bin} validate '{"class":"LogAdapter","function":"log","parameters":{"output":"hi"}}'
`);
}

async function ensureConfig(configPath: string): Promise<boolean> {
  try {
    await fs.access(configPath);
    return true;
  } catch {
    return false;
  }
}

async function assemble(args: CliArgs): Promise<AgentAssembly> {
  const { config } = await loadAgentConfig(args.configPath);
  const assembly = createAgentFromConfig(config, {
    sessionHandle: args.session,
    logger: createLogger({ ...config.logging, write: stderrWriter }),
  });
  if (args.session) {
    const restored = await assembly.agent.phaseIn();
    process.stdout.write(
      restored ? `Resumed session ${args.session}.\n` : `Starting new session ${args.session}.\n`,
    );
  }
  assembly.agent.initialize(args.task);
  return assembly;
}

function printTick(result: TickResult): void {
  process.stdout.write(`Tick ${result.tick}: dispatched ${result.results.length} call(s).\n`);
  for (const outcome of result.results) {
    const { capabilityName, actionName } = outcome.call;
    process.stdout.write(`  ${capabilityName}.${actionName} -> ${summarizeForLog(outcome.result)}\n`);
  }
}

function printFailure(error: unknown): void {
  const kind = isRuntimeError(error) ? ` [${error.kind}]` : "";
  process.stderr.write(`Tick failed${kind}: ${describeError(error)}\n`);
}

async function cmdTick(args: CliArgs): Promise<number> {
  const { agent } = await assemble(args);
  for (let i = 0; i < args.ticks; i++) {
    try {
      printTick(await agent.tick());
    } catch (error) {
      printFailure(error);
      return 1;
    }
  }
  process.stdout.write(`Session: ${agent.sessionHandle}\n`);
  return 0;
}

async function cmdRun(args: CliArgs): Promise<number> {
  const { agent } = await assemble(args);
  let failed = false;

  await new Promise<void>((resolve) => {
    const finish = () => {
      process.off("SIGINT", finish);
      process.off("SIGTERM", finish);
      resolve();
    };
    process.on("SIGINT", finish);
    process.on("SIGTERM", finish);
    agent.supervise({
      intervalMs: args.intervalMs,
      onTick: printTick,
      onError: (error) => {
        printFailure(error);
        failed = true;
        finish();
      },
    });
  });

  await agent.phaseOut();
  process.stdout.write(`Session: ${agent.sessionHandle}\n`);
  return failed ? 1 : 0;
}

async function cmdCapabilities(args: CliArgs): Promise<number> {
  const { config } = await loadAgentConfig(args.configPath);
  const { registry } = createAgentFromConfig(config, {
    logger: createLogger({ ...config.logging, write: stderrWriter }),
  });
  const description = registry.describe();
  process.stdout.write(description ? `${description}\n` : "No capabilities registered.\n");
  return 0;
}

function cmdValidate(args: CliArgs): number {
  const payload = args.positional.join(" ");
  if (!payload) {
    process.stderr.write("Error: validate needs a payload argument.\n");
    return 1;
  }
  const parsed = parseFunctionCall(payload);
  if (!parsed.ok) {
    process.stdout.write(`invalid: ${parsed.reason}\n`);
    return 1;
  }
  const { capabilityName, actionName, parameters } = parsed.call;
  process.stdout.write(`valid: ${capabilityName}.${actionName} ${JSON.stringify(parameters)}\n`);
  return 0;
}

async function main(argv: string[] = process.argv): Promise<number> {
  const args = parseArgv(argv);

  if (args.help || args.command === "help") {
    printHelp();
    return 0;
  }

  if (args.command === "validate") {
    return cmdValidate(args);
  }

  const configExists = await ensureConfig(args.configPath);
  if (!configExists) {
    process.stderr.write(`Error: config file not found: ${args.configPath}\n`);
    return 1;
  }

  switch (args.command) {
    case "tick":
      return cmdTick(args);
    case "run":
      return cmdRun(args);
    case "capabilities":
      return cmdCapabilities(args);
    default:
      printHelp();
      return 1;
  }
}

/** Run CLI with the given argv (same shape as process.argv). Exported for tests. */
export async function run(argv: string[]): Promise<number> {
  return main(argv);
}

const isMain =
  typeof process !== "undefined" &&
  process.argv[1] !== undefined &&
  process.argv[1] === fileURLToPath(import.meta.url);

if (isMain) {
  main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      process.stderr.write(`${describeError(err)}\n`);
      process.exit(1);
    });
}
