import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, realpath, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  capabilityOptionsFromConfig,
  createAgentFromConfig,
  loadAgentConfig,
  parseAgentConfig,
} from "../../src/config/AgentConfig.js";
import { ConfigError } from "../../src/core/errors.js";
import { FilePersistenceSink, InMemoryPersistenceSink } from "../../src/persistence/PersistenceSink.js";
import { silentLogger } from "../fixtures/index.js";

const provider = { baseUrl: "https://llm.test/v1", model: "test-model", apiKey: "test-secret" };

describe("parseAgentConfig", () => {
  it("fills defaults around the provider", () => {
    const config = parseAgentConfig({ provider }, "/srv/agent");

    expect(config).toMatchObject({
      provider,
      backupProviders: [],
      maxRetries: 3,
      failoverDepth: 1,
      timeoutMs: 30_000,
      maxFunctionCallAttempts: 3,
      capabilities: {},
      persistence: {},
    });
    expect(config.requestBudget).toBeUndefined();
    expect(config.settings).toEqual({
      maxTokens: 16,
      n: 1,
      temperature: 1,
      topP: 1,
      frequencyPenalty: 0,
      presencePenalty: 0,
      includeWorldProcessing: false,
    });
  });

  it("resolves relative paths against the config directory", () => {
    const config = parseAgentConfig(
      {
        provider,
        capabilities: { log: { filename: "logs/agent.log" }, markdown: { fileRoot: "/abs/notes" } },
        persistence: { directory: "./sessions" },
      },
      "/srv/agent",
    );

    expect(config.capabilities.log).toEqual({ filename: "/srv/agent/logs/agent.log" });
    expect(config.capabilities.markdown).toEqual({ fileRoot: "/abs/notes" });
    expect(config.persistence.directory).toBe("/srv/agent/sessions");
  });

  it("reports every problem with its path", () => {
    expect(() => parseAgentConfig({ provider: { baseUrl: "not a url", model: "m" }, maxRetries: 0 })).toThrow(
      ConfigError,
    );
    expect(() => parseAgentConfig({ provider: { baseUrl: "not a url", model: "m" } })).toThrow(
      /provider\.baseUrl/,
    );
  });

  it("rejects a missing config", () => {
    expect(() => parseAgentConfig(undefined)).toThrow(/provider/);
  });
});

describe("capabilityOptionsFromConfig", () => {
  const email = { fromEmail: "agent@example.com" };

  it("leaves email out when it is not configured", () => {
    const options = capabilityOptionsFromConfig(parseAgentConfig({ provider }), {});
    expect(options.email).toBeUndefined();
  });

  it("takes the email key from the environment", () => {
    const config = parseAgentConfig({ provider, capabilities: { email } });
    const options = capabilityOptionsFromConfig(config, { SENDGRID_API_KEY: "test-secret" });
    expect(options.email).toEqual({ fromEmail: "agent@example.com", apiKey: "test-secret" });
  });

  it("prefers the configured email key", () => {
    const config = parseAgentConfig({ provider, capabilities: { email: { ...email, apiKey: "configured" } } });
    const options = capabilityOptionsFromConfig(config, { SENDGRID_API_KEY: "from-env" });
    expect(options.email?.apiKey).toBe("configured");
  });

  it("completes the SMS settings from the environment", () => {
    const config = parseAgentConfig({ provider, capabilities: { sms: { sourceNumber: "+15550000000" } } });
    const options = capabilityOptionsFromConfig(config, {
      TWILIO_ACCOUNT_SID: "AC-test",
      TWILIO_AUTH_TOKEN: "test-secret",
    });
    expect(options.sms).toEqual({ accountSid: "AC-test", apiKey: "test-secret", sourceNumber: "+15550000000" });
  });

  it("requires every SMS setting", () => {
    const config = parseAgentConfig({ provider, capabilities: { sms: { accountSid: "AC-test", apiKey: "k" } } });
    expect(() => capabilityOptionsFromConfig(config, {})).toThrow(/capabilities\.sms needs accountSid/);
  });

  it("requires some email key", () => {
    const config = parseAgentConfig({ provider, capabilities: { email } });
    expect(() => capabilityOptionsFromConfig(config, {})).toThrow(
      "capabilities.email needs apiKey or SENDGRID_API_KEY",
    );
  });
});

describe("createAgentFromConfig", () => {
  it("registers the built-in capabilities that are not switched off", () => {
    const config = parseAgentConfig({ provider, capabilities: { search: false } });

    const { registry, agent } = createAgentFromConfig(config, {
      sessionHandle: "session-1",
      logger: silentLogger,
      env: {},
    });

    expect(registry.list()).toEqual(["LogAdapter", "MarkdownFileAdapter"]);
    expect(agent.sessionHandle).toBe("session-1");
    expect(agent.sink).toBeInstanceOf(InMemoryPersistenceSink);
  });

  it("adds email and a file sink when configured", () => {
    const config = parseAgentConfig(
      {
        provider,
        backupProviders: [{ baseUrl: "https://backup.test/v1", model: "backup-model" }],
        capabilities: { email: { fromEmail: "agent@example.com", apiKey: "test-secret" } },
        persistence: { directory: "sessions" },
      },
      "/srv/agent",
    );

    const { registry, agent, gateway } = createAgentFromConfig(config, { logger: silentLogger, env: {} });

    expect(registry.list()).toEqual(["LogAdapter", "MarkdownFileAdapter", "SearchAdapter", "EmailAdapter"]);
    expect(gateway.providers).toEqual(["https://llm.test/v1", "https://backup.test/v1"]);
    expect(agent.sink).toBeInstanceOf(FilePersistenceSink);
    expect(agent.sink instanceof FilePersistenceSink && agent.sink.directory).toBe("/srv/agent/sessions");
  });
});

describe("loadAgentConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await realpath(await mkdtemp(join(tmpdir(), "agent-config-")));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads YAML and resolves paths beside the file", async () => {
    const file = join(dir, "agent.yaml");
    await writeFile(
      file,
      [
        "provider:",
        "  baseUrl: https://llm.test/v1",
        "  model: test-model",
        "settings:",
        "  maxTokens: 64",
        "  includeWorldProcessing: true",
        "capabilities:",
        "  log:",
        "    filename: ./agent.log",
        "",
      ].join("\n"),
    );

    const { configPath, config } = await loadAgentConfig(file);

    expect(configPath).toBe(file);
    expect(config.settings.maxTokens).toBe(64);
    expect(config.settings.includeWorldProcessing).toBe(true);
    expect(config.capabilities.log).toEqual({ filename: join(dir, "agent.log") });
  });

  it("fails on a missing file", async () => {
    await expect(loadAgentConfig(join(dir, "missing.yaml"))).rejects.toThrow(/Cannot read config file/);
  });

  it("fails on malformed YAML", async () => {
    const file = join(dir, "broken.yaml");
    await writeFile(file, "provider: [unclosed\n");
    await expect(loadAgentConfig(file)).rejects.toThrow(/is not valid YAML/);
  });
});
