/**
 * A validated action intent extracted from model text.
 * Wire form: {"class": ..., "function": ..., "parameters": {...}}
 */
export interface FunctionCall {
  capabilityName: string;
  actionName: string;
  parameters: Record<string, unknown>;
}

export type FunctionCallParseResult =
  | { ok: true; call: FunctionCall }
  | { ok: false; reason: string };
