/**
 * A pluggable unit exposing a closed set of callable actions.
 * Implementations validate their own parameters.
 */
export interface Capability {
  enumerateActions(): string[];
  invoke(actionName: string, parameters: Record<string, unknown>): Promise<unknown>;
  /** Optional one-line summaries per action, rendered into the execution prompt */
  describeActions?(): Record<string, string>;
}

/**
 * Binds a registry name to a live capability instance.
 */
export interface CapabilityHandle {
  name: string;
  actions: ReadonlySet<string>;
  instance: Capability;
}

/**
 * Static registration table entry: a name and how to build the capability.
 */
export interface CapabilityRegistration<TOptions = void> {
  name: string;
  create: (options: TOptions) => Capability;
}
