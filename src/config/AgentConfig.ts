import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { GenerationSettingsSchema } from "../context/GenerationSettings.js";
import { ConfigError } from "../core/errors.js";
import type { BuiltinCapabilityOptions } from "../capabilities/builtin.js";
import { builtinCapabilities } from "../capabilities/builtin.js";
import { CapabilityRegistry } from "../registry/CapabilityRegistry.js";
import { FailoverCompletionGateway } from "../llm/CompletionGateway.js";
import { Agent } from "../agent/Agent.js";
import { FilePersistenceSink, InMemoryPersistenceSink } from "../persistence/PersistenceSink.js";
import { EventLog } from "../observability/EventLog.js";
import { Metrics } from "../observability/Metrics.js";
import { createLogger } from "../observability/Logger.js";
import type { Logger } from "../observability/Logger.js";

/** Config filename used when no path is given (e.g. the CLI). */
export const DEFAULT_CONFIG_FILE = "agent.yaml";

const ProviderSchema = z.object({
  baseUrl: z.string().url(),
  model: z.string().min(1),
  apiKey: z.string().optional(),
});

export const AgentConfigSchema = z.object({
  provider: ProviderSchema,
  backupProviders: z.array(ProviderSchema).default([]),
  maxRetries: z.number().int().positive().default(3),
  failoverDepth: z.number().int().nonnegative().default(1),
  timeoutMs: z.number().int().positive().default(30_000),
  baseDelayMs: z.number().int().nonnegative().default(500),
  requestBudget: z.number().int().positive().optional(),
  maxFunctionCallAttempts: z.number().int().positive().default(3),
  actionTimeoutMs: z.number().int().positive().optional(),
  settings: GenerationSettingsSchema.default({}),
  capabilities: z
    .object({
      log: z.union([z.literal(false), z.object({ filename: z.string().optional() })]).optional(),
      markdown: z
        .union([z.literal(false), z.object({ fileRoot: z.string().optional() })])
        .optional(),
      search: z
        .union([
          z.literal(false),
          z.object({
            baseUrl: z.string().url().optional(),
            timeoutMs: z.number().int().positive().optional(),
          }),
        ])
        .optional(),
      email: z
        .object({
          apiKey: z.string().optional(),
          fromEmail: z.string().email(),
          fromName: z.string().optional(),
          endpoint: z.string().url().optional(),
          timeoutMs: z.number().int().positive().optional(),
        })
        .optional(),
      sms: z
        .object({
          accountSid: z.string().optional(),
          apiKey: z.string().optional(),
          sourceNumber: z.string().optional(),
        })
        .optional(),
    })
    .default({}),
  persistence: z
    .object({
      /** Snapshot directory; snapshots stay in memory when omitted */
      directory: z.string().optional(),
    })
    .default({}),
  logging: z
    .object({
      enabled: z.boolean().optional(),
      level: z.enum(["silent", "error", "warn", "info", "debug", "trace"]).optional(),
      includePrompts: z.boolean().optional(),
      includeResults: z.boolean().optional(),
    })
    .default({}),
});

export type AgentConfig = z.output<typeof AgentConfigSchema>;
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;

export interface AgentConfigLoadResult {
  configPath: string;
  config: AgentConfig;
}

function resolveFrom(configDir: string, target: string): string {
  return path.isAbsolute(target) ? target : path.resolve(configDir, target);
}

/**
 * Validate a raw config object. Relative paths are resolved against `configDir`.
 */
export function parseAgentConfig(raw: unknown, configDir: string = process.cwd()): AgentConfig {
  const parsed = AgentConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "/"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid agent config: ${problems}`, { issues: parsed.error.issues });
  }

  const config = parsed.data;
  const { log, markdown } = config.capabilities;
  if (log && log.filename) log.filename = resolveFrom(configDir, log.filename);
  if (markdown && markdown.fileRoot) markdown.fileRoot = resolveFrom(configDir, markdown.fileRoot);
  if (config.persistence.directory) {
    config.persistence.directory = resolveFrom(configDir, config.persistence.directory);
  }
  return config;
}

export async function loadAgentConfig(configPath: string): Promise<AgentConfigLoadResult> {
  const resolvedPath = path.resolve(process.cwd(), configPath);
  let text: string;
  try {
    text = await fs.readFile(resolvedPath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${resolvedPath}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new ConfigError(
      `Config file ${resolvedPath} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return {
    configPath: resolvedPath,
    config: parseAgentConfig(raw, path.dirname(resolvedPath)),
  };
}

/**
 * Capability options for the built-in table. The email key falls back to
 * SENDGRID_API_KEY and the SMS settings to TWILIO_ACCOUNT_SID,
 * TWILIO_AUTH_TOKEN and TWILIO_PHONE_NUMBER; a configured section missing any
 * of them is an error.
 */
export function capabilityOptionsFromConfig(
  config: AgentConfig,
  env: NodeJS.ProcessEnv = process.env,
): BuiltinCapabilityOptions {
  const { log, markdown, search, email, sms } = config.capabilities;
  const options: BuiltinCapabilityOptions = { log, markdown, search };
  if (email) {
    const apiKey = email.apiKey ?? env.SENDGRID_API_KEY;
    if (!apiKey) {
      throw new ConfigError("capabilities.email needs apiKey or SENDGRID_API_KEY");
    }
    options.email = { ...email, apiKey };
  }
  if (sms) {
    const accountSid = sms.accountSid ?? env.TWILIO_ACCOUNT_SID;
    const apiKey = sms.apiKey ?? env.TWILIO_AUTH_TOKEN;
    const sourceNumber = sms.sourceNumber ?? env.TWILIO_PHONE_NUMBER;
    if (!accountSid || !apiKey || !sourceNumber) {
      throw new ConfigError(
        "capabilities.sms needs accountSid, apiKey and sourceNumber (or TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN, TWILIO_PHONE_NUMBER)",
      );
    }
    options.sms = { accountSid, apiKey, sourceNumber };
  }
  return options;
}

export interface AgentAssembly {
  agent: Agent;
  registry: CapabilityRegistry;
  gateway: FailoverCompletionGateway;
  eventLog: EventLog;
  metrics: Metrics;
  logger: Logger;
}

/**
 * Wire an Agent with its gateway, registry, sink and observability from config.
 */
export function createAgentFromConfig(
  config: AgentConfig,
  overrides: { sessionHandle?: string; logger?: Logger; env?: NodeJS.ProcessEnv } = {},
): AgentAssembly {
  const env = overrides.env ?? process.env;
  const logger = overrides.logger ?? createLogger({ ...config.logging });
  const eventLog = new EventLog();
  const metrics = new Metrics();

  const registry = CapabilityRegistry.fromTable(
    builtinCapabilities(capabilityOptionsFromConfig(config, env)),
    { actionTimeoutMs: config.actionTimeoutMs },
  );

  const gateway = new FailoverCompletionGateway({
    primary: config.provider,
    backupProviders: config.backupProviders,
    maxRetries: config.maxRetries,
    failoverDepth: config.failoverDepth,
    timeoutMs: config.timeoutMs,
    baseDelayMs: config.baseDelayMs,
    requestBudget: config.requestBudget,
    logger: logger.child("CompletionGateway"),
    metrics,
    env,
  });

  const sink = config.persistence.directory
    ? new FilePersistenceSink(config.persistence.directory)
    : new InMemoryPersistenceSink();

  const agent = new Agent({
    gateway,
    registry,
    sink,
    sessionHandle: overrides.sessionHandle,
    settings: config.settings,
    maxFunctionCallAttempts: config.maxFunctionCallAttempts,
    logger,
    eventLog,
    metrics,
  });

  return { agent, registry, gateway, eventLog, metrics, logger };
}
