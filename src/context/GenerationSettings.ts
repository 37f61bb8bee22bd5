import { z } from "zod";
import type { GenerationSettings } from "../types/AgentContext.js";

export const GenerationSettingsSchema = z.object({
  maxTokens: z.number().int().positive().default(16),
  n: z.number().int().positive().default(1),
  temperature: z.number().min(0).max(2).default(1.0),
  topP: z.number().min(0).max(1).default(1),
  frequencyPenalty: z.number().min(-2).max(2).default(0),
  presencePenalty: z.number().min(-2).max(2).default(0),
  stop: z.union([z.string(), z.array(z.string())]).optional(),
  systemPrompt: z.string().optional(),
  includeWorldProcessing: z.boolean().default(false),
});

export type GenerationSettingsInput = z.input<typeof GenerationSettingsSchema>;

export const DEFAULT_GENERATION_SETTINGS: GenerationSettings = Object.freeze(
  GenerationSettingsSchema.parse({}),
);

/**
 * Fill defaults and validate ranges. Throws a ZodError on bad input.
 */
export function resolveGenerationSettings(
  input: GenerationSettingsInput = {},
): GenerationSettings {
  return GenerationSettingsSchema.parse(input);
}
