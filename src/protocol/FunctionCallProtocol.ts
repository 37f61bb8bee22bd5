import { z } from "zod";
import type { FunctionCall, FunctionCallParseResult } from "../types/FunctionCall.js";

/**
 * The shape the model is asked to emit, embedded in the execution prompt.
 */
export const FUNCTION_CALL_SHAPE = `
{
    "class" : "class_name",
    "function": "function_name",
    "parameters": {
        "param1": "value1",
        "param2": "value2"
    }
}
`;

const FunctionCallWireSchema = z.object({
  class: z.string().min(1),
  function: z.string().min(1),
  parameters: z.record(z.unknown()),
});

/**
 * Parse model text into a function call.
 * Never throws: malformed text yields `{ ok: false, reason }`.
 */
export function parseFunctionCall(raw: string): FunctionCallParseResult {
  const normalized = raw.replace(/[\r\n]/g, "");

  let document: unknown;
  try {
    document = JSON.parse(normalized);
  } catch (error) {
    return {
      ok: false,
      reason: `not JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const parsed = FunctionCallWireSchema.safeParse(document);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "/"} ${issue.message}`)
      .join("; ");
    return { ok: false, reason };
  }

  return {
    ok: true,
    call: {
      capabilityName: parsed.data.class,
      actionName: parsed.data.function,
      parameters: parsed.data.parameters,
    },
  };
}

export function isValidFunctionCall(raw: string): boolean {
  return parseFunctionCall(raw).ok;
}

/**
 * Render a call in its wire form.
 */
export function formatFunctionCall(call: FunctionCall): string {
  return JSON.stringify({
    class: call.capabilityName,
    function: call.actionName,
    parameters: call.parameters,
  });
}
