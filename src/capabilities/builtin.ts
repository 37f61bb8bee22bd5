import type { CapabilityRegistration } from "../types/Capability.js";
import { createLogCapability } from "./LogCapability.js";
import type { LogCapabilityOptions } from "./LogCapability.js";
import { createMarkdownFileCapability } from "./MarkdownFileCapability.js";
import type { MarkdownFileCapabilityOptions } from "./MarkdownFileCapability.js";
import { createSearchCapability } from "./SearchCapability.js";
import type { SearchCapabilityOptions } from "./SearchCapability.js";
import { createEmailCapability } from "./EmailCapability.js";
import type { EmailCapabilityOptions } from "./EmailCapability.js";
import { createSmsCapability } from "./SmsCapability.js";
import type { SmsCapabilityOptions } from "./SmsCapability.js";

/**
 * Options for the built-in capability set. A section set to `false` leaves the
 * capability out; email and SMS are only registered when configured.
 */
export interface BuiltinCapabilityOptions {
  log?: LogCapabilityOptions | false;
  markdown?: MarkdownFileCapabilityOptions | false;
  search?: SearchCapabilityOptions | false;
  email?: EmailCapabilityOptions;
  sms?: SmsCapabilityOptions;
}

/**
 * Static registration table of every capability shipped with the runtime.
 */
export function builtinCapabilities(
  options: BuiltinCapabilityOptions = {},
): Array<CapabilityRegistration> {
  const table: Array<CapabilityRegistration> = [];
  const { log, markdown, search, email, sms } = options;

  if (log !== false) {
    table.push({ name: "LogAdapter", create: () => createLogCapability(log) });
  }
  if (markdown !== false) {
    table.push({ name: "MarkdownFileAdapter", create: () => createMarkdownFileCapability(markdown) });
  }
  if (search !== false) {
    table.push({ name: "SearchAdapter", create: () => createSearchCapability(search) });
  }
  if (email) {
    table.push({ name: "EmailAdapter", create: () => createEmailCapability(email) });
  }
  if (sms) {
    table.push({ name: "SmsAdapter", create: () => createSmsCapability(sms) });
  }

  return table;
}
