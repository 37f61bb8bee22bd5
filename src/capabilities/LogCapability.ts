import { appendFile, readFile } from "node:fs/promises";
import { z } from "zod";
import type { Capability } from "../types/Capability.js";
import { action, defineCapability } from "./defineCapability.js";
import { isNotFoundError } from "./security/sandbox.js";

export interface LogCapabilityOptions {
  /** Defaults to agent_log_MMDDYYYY.txt in the working directory */
  filename?: string;
}

export function defaultLogFilename(date: Date = new Date()): string {
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  return `agent_log_${mm}${dd}${date.getFullYear()}.txt`;
}

/**
 * Lets the agent append lines to, and read back, a local log file.
 */
export function createLogCapability(options: LogCapabilityOptions = {}): Capability {
  const filename = options.filename ?? defaultLogFilename();

  return defineCapability("LogAdapter", {
    log: action({
      description: "Append a line of text to the agent log",
      parameters: z.object({ output: z.string() }).strict(),
      run: async ({ output }) => {
        const line = `${output}\n`;
        await appendFile(filename, line, "utf-8");
        return { filename, bytes: Buffer.byteLength(line, "utf-8") };
      },
    }),
    read_log: action({
      description: "Return every line written to the agent log",
      parameters: z.object({}).strict(),
      run: async () => {
        let text: string;
        try {
          text = await readFile(filename, "utf-8");
        } catch (error) {
          if (isNotFoundError(error)) return [];
          throw error;
        }
        const lines = text.split("\n");
        if (lines[lines.length - 1] === "") lines.pop();
        return lines;
      },
    }),
  });
}
