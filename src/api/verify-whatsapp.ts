import crypto from "node:crypto";

export type SignatureCheckRequest = {
  header(name: string): string | undefined;
  rawBody?: Buffer;
};

export type SignatureOptions = {
  appSecret?: string;
  enforce: boolean;
};

export type SubscriptionQuery = Record<string, unknown>;

/** Returns the challenge to echo when the handshake matches, else null. */
export function verifySubscription(query: SubscriptionQuery, verifyToken: string | undefined): string | null {
  const mode = typeof query["hub.mode"] === "string" ? query["hub.mode"] : "";
  const token = typeof query["hub.verify_token"] === "string" ? query["hub.verify_token"] : "";
  const challenge = typeof query["hub.challenge"] === "string" ? query["hub.challenge"] : "";

  if (mode !== "subscribe" || !verifyToken || !token) return null;

  const a = Buffer.from(token);
  const b = Buffer.from(verifyToken);
  if (a.length !== b.length || !crypto.timingSafeEqual(a, b)) return null;

  return challenge;
}

export function verifyWhatsAppSignature(
  req: SignatureCheckRequest,
  opts: SignatureOptions
): { ok: true } | { ok: false; error: string } {
  const { enforce, appSecret } = opts;
  if (!enforce) return { ok: true };

  const header = req.header("x-hub-signature-256") || "";
  const raw = req.rawBody || Buffer.from("");

  if (!header.startsWith("sha256=") || raw.length === 0 || !appSecret) {
    return { ok: false, error: "missing_signature_or_secret_or_raw_body" };
  }

  const expected = "sha256=" + crypto.createHmac("sha256", appSecret).update(raw).digest("hex");

  const a = Buffer.from(expected);
  const b = Buffer.from(header);
  if (a.length !== b.length) return { ok: false, error: "invalid_whatsapp_signature" };

  return crypto.timingSafeEqual(a, b) ? { ok: true } : { ok: false, error: "invalid_whatsapp_signature" };
}
