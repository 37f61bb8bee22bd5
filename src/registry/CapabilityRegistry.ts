import pTimeout, { TimeoutError } from "p-timeout";
import type { Capability, CapabilityHandle, CapabilityRegistration } from "../types/Capability.js";
import type { FunctionCall } from "../types/FunctionCall.js";
import { DispatchError, describeError } from "../core/errors.js";

export interface CapabilityRegistryOptions {
  /** Deadline for a single action invocation; unbounded when omitted */
  actionTimeoutMs?: number;
}

/**
 * Capability Registry: resolves function calls to live capability actions.
 * Knows nothing about what a capability does; dispatch is purely by name.
 */
export class CapabilityRegistry {
  private readonly handles = new Map<string, CapabilityHandle>();
  private readonly actionTimeoutMs?: number;

  constructor(options: CapabilityRegistryOptions = {}) {
    this.actionTimeoutMs = options.actionTimeoutMs;
  }

  /**
   * Build a registry from a static registration table.
   */
  static fromTable(
    table: Array<CapabilityRegistration>,
    options: CapabilityRegistryOptions = {},
  ): CapabilityRegistry {
    const registry = new CapabilityRegistry(options);
    registry.registerAll(table);
    return registry;
  }

  /**
   * Register a capability under a unique name.
   */
  register(name: string, instance: Capability): CapabilityHandle {
    if (!name) throw new Error("Capability name is required");
    if (this.handles.has(name)) {
      throw new DispatchError(
        "DUPLICATE_CAPABILITY",
        `Capability already registered: ${name}`,
        { capabilityName: name },
      );
    }
    const handle: CapabilityHandle = {
      name,
      actions: new Set(instance.enumerateActions()),
      instance,
    };
    this.handles.set(name, handle);
    return handle;
  }

  registerAll(table: Array<CapabilityRegistration>): void {
    for (const entry of table) {
      this.register(entry.name, entry.create());
    }
  }

  unregister(name: string): boolean {
    return this.handles.delete(name);
  }

  get(name: string): CapabilityHandle | undefined {
    return this.handles.get(name);
  }

  has(name: string): boolean {
    return this.handles.has(name);
  }

  list(): string[] {
    return [...this.handles.keys()];
  }

  get size(): number {
    return this.handles.size;
  }

  /**
   * Render the capability list for the execution prompt, one line per action:
   * `Name.action - description`.
   */
  describe(): string {
    const lines: string[] = [];
    for (const handle of this.handles.values()) {
      const descriptions = handle.instance.describeActions?.() ?? {};
      for (const actionName of handle.actions) {
        const description = descriptions[actionName];
        lines.push(
          description ? `${handle.name}.${actionName} - ${description}` : `${handle.name}.${actionName}`,
        );
      }
    }
    return lines.join("\n");
  }

  /**
   * Invoke the action a function call names and return its result untouched.
   * Every failure surfaces as a DispatchError.
   */
  async dispatch(call: FunctionCall): Promise<unknown> {
    const { capabilityName, actionName, parameters } = call;
    const handle = this.handles.get(capabilityName);
    if (!handle) {
      throw new DispatchError(
        "CAPABILITY_NOT_FOUND",
        `Capability not found: ${capabilityName}`,
        { capabilityName, actionName },
        { details: { availableCapabilities: this.list() } },
      );
    }
    if (!handle.actions.has(actionName)) {
      throw new DispatchError(
        "ACTION_NOT_FOUND",
        `Action not found: ${capabilityName}.${actionName}`,
        { capabilityName, actionName },
        { details: { availableActions: [...handle.actions] } },
      );
    }

    try {
      const invocation = handle.instance.invoke(actionName, parameters);
      return this.actionTimeoutMs === undefined
        ? await invocation
        : await pTimeout(invocation, {
            milliseconds: this.actionTimeoutMs,
            message: `${capabilityName}.${actionName} timed out after ${this.actionTimeoutMs}ms`,
          });
    } catch (error) {
      if (error instanceof DispatchError) throw error;
      throw new DispatchError(
        "ACTION_FAILED",
        `${capabilityName}.${actionName} failed: ${describeError(error)}`,
        { capabilityName, actionName },
        { cause: error, details: { timedOut: error instanceof TimeoutError } },
      );
    }
  }
}
