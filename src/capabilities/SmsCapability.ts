import twilio from "twilio";
import { z } from "zod";
import type { Capability } from "../types/Capability.js";
import { action, defineCapability } from "./defineCapability.js";

/**
 * The part of the Twilio client the capability uses.
 */
export interface SmsClient {
  messages: {
    create(params: { body: string; from: string; to: string }): Promise<{ sid: string }>;
  };
}

export interface SmsCapabilityOptions {
  accountSid: string;
  /** Twilio auth token or API secret */
  apiKey: string;
  /** Number the texts are sent from, E.164 */
  sourceNumber: string;
  /** Defaults to a Twilio REST client built on first send */
  client?: SmsClient;
}

/**
 * Sends text messages through Twilio and returns the message sid.
 */
export function createSmsCapability(options: SmsCapabilityOptions): Capability {
  let client = options.client;
  const getClient = (): SmsClient => {
    client ??= twilio(options.accountSid, options.apiKey);
    return client;
  };

  return defineCapability("SmsAdapter", {
    send_text: action({
      description: "Send a text message to a phone number",
      parameters: z.object({ message: z.string(), number: z.string().min(1) }).strict(),
      run: async ({ message, number }) => {
        const sent = await getClient().messages.create({
          body: message,
          from: options.sourceNumber,
          to: number,
        });
        return sent.sid;
      },
    }),
  });
}
