import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { MockInstance } from "vitest";
import { mkdtemp, readFile, realpath, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { run } from "../src/cli.js";
import { callPayload, chatCompletionBody, textResponse } from "./fixtures/index.js";

const argv = (...args: string[]) => ["node", "agent-tick", ...args];

function written(spy: MockInstance): string {
  return spy.mock.calls.map((call) => String(call[0])).join("");
}

describe("agent-tick CLI", () => {
  let dir: string;
  let stdout: MockInstance;
  let stderr: MockInstance;
  let originalFetch: typeof global.fetch;

  beforeEach(async () => {
    dir = await realpath(await mkdtemp(join(tmpdir(), "agent-cli-")));
    stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    originalFetch = global.fetch;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    global.fetch = originalFetch;
    await rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(): Promise<string> {
    const file = join(dir, "agent.yaml");
    await writeFile(
      file,
      [
        "provider:",
        "  baseUrl: https://llm.test/v1",
        "  model: test-model",
        "  apiKey: test-secret",
        "baseDelayMs: 0",
        "capabilities:",
        "  log:",
        "    filename: ./agent.log",
        "  markdown: false",
        "  search: false",
        "logging:",
        "  enabled: false",
        "",
      ].join("\n"),
    );
    return file;
  }

  it("prints help without a command", async () => {
    expect(await run(argv())).toBe(0);
    expect(written(stdout)).toContain("Usage: agent-tick <command> [options]");
  });

  it("validates a well-formed payload without a config", async () => {
    const code = await run(argv("validate", callPayload("LogAdapter", "log", { output: "hi" })));

    expect(code).toBe(0);
    expect(written(stdout)).toBe('valid: LogAdapter.log {"output":"hi"}\n');
  });

  it("explains why a payload is invalid", async () => {
    const code = await run(argv("validate", "not json"));

    expect(code).toBe(1);
    expect(written(stdout)).toMatch(/^invalid: not JSON: /);
  });

  it("asks for a payload to validate", async () => {
    expect(await run(argv("validate"))).toBe(1);
    expect(written(stderr)).toBe("Error: validate needs a payload argument.\n");
  });

  it("fails when the config file is missing", async () => {
    const missing = join(dir, "nope.yaml");

    expect(await run(argv("tick", "--config", missing))).toBe(1);
    expect(written(stderr)).toBe(`Error: config file not found: ${missing}\n`);
  });

  it("lists the configured capabilities", async () => {
    const config = await writeConfig();

    expect(await run(argv("capabilities", "-c", config))).toBe(0);
    expect(written(stdout)).toBe(
      "LogAdapter.log - Append a line of text to the agent log\n" +
        "LogAdapter.read_log - Return every line written to the agent log\n",
    );
  });

  it("runs a tick against the configured provider", async () => {
    const config = await writeConfig();
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(textResponse(200, JSON.stringify(chatCompletionBody("log a greeting"))))
      .mockResolvedValueOnce(
        textResponse(200, JSON.stringify(chatCompletionBody(callPayload("LogAdapter", "log", { output: "hello" })))),
      );
    global.fetch = fetchMock;

    const code = await run(argv("tick", "-c", config, "--task", "greet", "--session", "cli-session"));

    expect(code).toBe(0);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(written(stdout)).toBe(
      "Starting new session cli-session.\n" +
        "Tick 1: dispatched 1 call(s).\n" +
        "  LogAdapter.log -> Object(keys: filename, bytes)\n" +
        "Session: cli-session\n",
    );
    expect(await readFile(join(dir, "agent.log"), "utf-8")).toBe("hello\n");
  });

  it("reports a failed tick with its kind", async () => {
    const config = await writeConfig();

    expect(await run(argv("tick", "-c", config))).toBe(1);
    expect(written(stderr)).toMatch(/^Tick failed \[NO_PENDING_TASKS\]: /);
  });
});
