import { z } from "zod";
import type { Capability } from "../types/Capability.js";
import { action, defineCapability } from "./defineCapability.js";
import { fetchWithTimeout } from "./http.js";

export interface EmailCapabilityOptions {
  apiKey: string;
  fromEmail: string;
  fromName?: string;
  /** SendGrid v3 mail endpoint; overridable for tests and regional hosts */
  endpoint?: string;
  timeoutMs?: number;
}

export const SENDGRID_ENDPOINT = "https://api.sendgrid.com/v3/mail/send";
export const EMAIL_SENT = "Email sent successfully";

/**
 * Replace {{ token }} placeholders; unknown tokens are left as written.
 */
export function replaceTokens(content: string, tokens: Record<string, unknown>): string {
  return content.replace(/\{\{\s*([^}]+?)\s*\}\}/g, (match, name: string) =>
    Object.hasOwn(tokens, name) ? String(tokens[name]) : match,
  );
}

/**
 * Headers, emphasis, links and line breaks only.
 */
export function markdownToHtml(markdown: string): string {
  return markdown
    .replace(/^### (.+)$/gm, "<h3>$1</h3>")
    .replace(/^## (.+)$/gm, "<h2>$1</h2>")
    .replace(/^# (.+)$/gm, "<h1>$1</h1>")
    .replace(/\*\*(.+?)\*\*/g, "<strong>$1</strong>")
    .replace(/\*(.+?)\*/g, "<em>$1</em>")
    .replace(/\[([^\]]+)\]\(([^)]+)\)/g, '<a href="$2">$1</a>')
    .replace(/\n\n/g, "<br><br>")
    .replace(/\n/g, "<br>");
}

/**
 * Sends email through SendGrid. Delivery problems come back as strings so the
 * agent sees them in its context; only transport failures throw.
 */
export function createEmailCapability(options: EmailCapabilityOptions): Capability {
  const endpoint = options.endpoint ?? SENDGRID_ENDPOINT;
  const fromName = options.fromName ?? "Agent";

  const send = async (
    toEmail: string,
    subject: string,
    content: string,
    toName?: string,
  ): Promise<string> => {
    const isHtml = content.includes("<") && content.includes(">");
    const payload = {
      personalizations: [{ to: [{ email: toEmail, name: toName ?? toEmail }], subject }],
      from: { email: options.fromEmail, name: fromName },
      content: [{ type: isHtml ? "text/html" : "text/plain", value: content }],
    };
    const response = await fetchWithTimeout(
      endpoint,
      {
        method: "POST",
        headers: {
          Authorization: `Bearer ${options.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(payload),
      },
      options.timeoutMs,
    );
    if (response.status === 202) return EMAIL_SENT;
    return `Error sending email: ${response.status} - ${await response.text()}`;
  };

  return defineCapability("EmailAdapter", {
    send_email: action({
      description: "Send a plain text or HTML email",
      parameters: z
        .object({
          to_email: z.string().email(),
          subject: z.string(),
          content: z.string(),
          to_name: z.string().optional(),
        })
        .strict(),
      run: ({ to_email, subject, content, to_name }) => send(to_email, subject, content, to_name),
    }),
    send_template_email: action({
      description: "Fill {{tokens}} in a markdown or HTML template and send it",
      parameters: z
        .object({
          to_email: z.string().email(),
          subject: z.string(),
          template: z.string(),
          tokens: z.record(z.unknown()).default({}),
          to_name: z.string().optional(),
          is_markdown: z.boolean().default(true),
        })
        .strict(),
      run: ({ to_email, subject, template, tokens, to_name, is_markdown }) => {
        const filledSubject = replaceTokens(subject, tokens);
        const filled = replaceTokens(template, tokens);
        return send(to_email, filledSubject, is_markdown ? markdownToHtml(filled) : filled, to_name);
      },
    }),
  });
}
