import { describe, it, expect, vi } from "vitest";
import { createSmsCapability } from "../../src/capabilities/SmsCapability.js";
import { builtinCapabilities } from "../../src/capabilities/builtin.js";
import { DispatchError } from "../../src/core/errors.js";

function stubClient() {
  const create = vi.fn().mockResolvedValue({ sid: "SM-test-1" });
  return { create, client: { messages: { create } } };
}

const options = { accountSid: "AC-test", apiKey: "test-secret", sourceNumber: "+15550000000" };

describe("SmsAdapter", () => {
  it("sends from the configured number and returns the message sid", async () => {
    const { create, client } = stubClient();
    const sms = createSmsCapability({ ...options, client });

    await expect(sms.invoke("send_text", { message: "hello", number: "+15551234567" })).resolves.toBe(
      "SM-test-1",
    );
    expect(create).toHaveBeenCalledWith({ body: "hello", from: "+15550000000", to: "+15551234567" });
    expect(sms.enumerateActions()).toEqual(["send_text"]);
  });

  it("rejects a call without a number", async () => {
    const { create, client } = stubClient();
    const sms = createSmsCapability({ ...options, client });

    await expect(sms.invoke("send_text", { message: "hello" })).rejects.toBeInstanceOf(DispatchError);
    expect(create).not.toHaveBeenCalled();
  });

  it("is only part of the built-in table when configured", () => {
    const names = (table: ReturnType<typeof builtinCapabilities>) => table.map((entry) => entry.name);

    expect(names(builtinCapabilities())).not.toContain("SmsAdapter");
    expect(names(builtinCapabilities({ sms: options }))).toContain("SmsAdapter");
  });
});
