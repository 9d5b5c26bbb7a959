import { z } from "zod";
import type { InboundMessage } from "../types/contracts.js";

/**
 * WhatsApp Cloud API webhook (Meta). Only what the bridge reads:
 * - business phone_number_id
 * - the first message: sender, id, type, text body or image descriptor
 *
 * Each level is validated on its own, so siblings of the first entry,
 * change or message never reject the notification.
 */
const WAEnvelope = z.object({
  object: z.string().optional(),
  entry: z.array(z.unknown())
}).passthrough();

const WAEntry = z.object({
  id: z.string().optional(),
  changes: z.array(z.unknown())
}).passthrough();

const WAChange = z.object({
  field: z.string().optional(),
  value: z.object({
    messaging_product: z.string().optional(),
    metadata: z.unknown().optional(),
    messages: z.array(z.unknown()).optional(),
    statuses: z.array(z.unknown()).optional()
  }).passthrough()
}).passthrough();

const WAMetadata = z.object({
  phone_number_id: z.string().optional(),
  display_phone_number: z.string().optional()
}).passthrough();

const WAMessage = z.object({
  from: z.string(),
  id: z.string(),
  timestamp: z.string().optional(),
  type: z.string().optional(),
  text: z.object({
    body: z.string()
  }).optional(),
  image: z.object({
    id: z.string(),
    mime_type: z.string().optional(),
    caption: z.string().optional(),
    sha256: z.string().optional()
  }).optional()
}).passthrough();

export type ParseOutcome =
  | { ok: true; message: InboundMessage | null }
  | { ok: false; error: string };

function describeIssues(error: z.ZodError, at: (string | number)[]): string {
  return error.issues.map((i) => `${[...at, ...i.path].join(".")}: ${i.message}`).join("; ");
}

export function whatsappCloudToInboundMessage(body: unknown): ParseOutcome {
  const envelope = WAEnvelope.safeParse(body);
  if (!envelope.success) return { ok: false, error: describeIssues(envelope.error, []) };
  if (envelope.data.entry.length === 0) return { ok: true, message: null };

  const entry = WAEntry.safeParse(envelope.data.entry[0]);
  if (!entry.success) return { ok: false, error: describeIssues(entry.error, ["entry", 0]) };
  if (entry.data.changes.length === 0) return { ok: true, message: null };

  const change = WAChange.safeParse(entry.data.changes[0]);
  if (!change.success) return { ok: false, error: describeIssues(change.error, ["entry", 0, "changes", 0]) };

  const value = change.data.value;
  const messages = value.messages ?? [];
  if (messages.length === 0) return { ok: true, message: null };

  const msg = WAMessage.safeParse(messages[0]);
  if (!msg.success) {
    return { ok: false, error: describeIssues(msg.error, ["entry", 0, "changes", 0, "value", "messages", 0]) };
  }

  // A malformed metadata block only costs the reply target.
  const metadata = WAMetadata.safeParse(value.metadata);
  const phoneNumberId = metadata.success ? metadata.data.phone_number_id : undefined;

  const m = msg.data;
  return {
    ok: true,
    message: {
      id: m.id,
      from: m.from,
      type: m.type ?? "unknown",
      timestamp: m.timestamp,
      phoneNumberId,
      text: m.text?.body,
      image: m.image
        ? {
            id: m.image.id,
            mimeType: m.image.mime_type,
            caption: m.image.caption,
            sha256: m.image.sha256
          }
        : undefined
    }
  };
}
