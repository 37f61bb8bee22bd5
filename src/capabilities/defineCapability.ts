import { z } from "zod";
import type { Capability } from "../types/Capability.js";
import { DispatchError } from "../core/errors.js";

/**
 * One callable action: its parameter schema and a typed implementation.
 */
export interface ActionDefinition<TSchema extends z.ZodTypeAny> {
  description: string;
  parameters: TSchema;
  run: (params: z.output<TSchema>) => Promise<unknown> | unknown;
}

/**
 * Identity helper that pins the schema type so `run` receives typed params.
 */
export function action<TSchema extends z.ZodTypeAny>(
  definition: ActionDefinition<TSchema>,
): ActionDefinition<TSchema> {
  return definition;
}

type ActionInvoker = (params: Record<string, unknown>) => Promise<unknown>;

/**
 * Build a capability from a closed map of action name → definition.
 * Parameters are validated before the action runs; a mismatch raises
 * INVALID_PARAMETERS naming the offending keys.
 */
export function defineCapability<
  TActions extends Record<string, ActionDefinition<z.ZodTypeAny>>,
>(name: string, actions: TActions): Capability {
  const invokers = new Map<string, ActionInvoker>();
  const descriptions: Record<string, string> = {};

  for (const [actionName, definition] of Object.entries(actions)) {
    descriptions[actionName] = definition.description;
    invokers.set(actionName, async (params) => {
      const parsed = definition.parameters.safeParse(params);
      if (!parsed.success) {
        const problems = parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "/"} ${issue.message}`)
          .join("; ");
        throw new DispatchError(
          "INVALID_PARAMETERS",
          `Invalid parameters for ${name}.${actionName}: ${problems}`,
          { capabilityName: name, actionName },
          { details: { issues: parsed.error.issues } },
        );
      }
      return definition.run(parsed.data);
    });
  }

  return {
    enumerateActions: () => [...invokers.keys()],
    describeActions: () => ({ ...descriptions }),
    invoke: async (actionName, parameters) => {
      const invoker = invokers.get(actionName);
      if (!invoker) {
        throw new DispatchError(
          "ACTION_NOT_FOUND",
          `Action not found: ${name}.${actionName}`,
          { capabilityName: name, actionName },
          { details: { availableActions: [...invokers.keys()] } },
        );
      }
      return invoker(parameters);
    },
  };
}
