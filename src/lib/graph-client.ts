import { z } from "zod";

export class GraphApiError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(operation: string, status: number, body: string) {
    super(`Graph API ${operation} failed (${status}): ${body}`);
    this.name = "GraphApiError";
    this.status = status;
    this.body = body;
  }
}

const MediaInfoSchema = z.object({
  url: z.string().url(),
  mime_type: z.string().optional(),
  sha256: z.string().optional(),
  file_size: z.coerce.number().optional(),
  id: z.string().optional()
}).passthrough();

export type MediaInfo = z.infer<typeof MediaInfoSchema>;

export type DownloadedMedia = {
  buffer: Buffer;
  contentType: string | null;
};

export type SendTextArgs = {
  phoneNumberId: string;
  to: string;
  body: string;
  replyToMessageId?: string;
};

/** Outbound surface of the Cloud API the bridge relies on. */
export interface GraphApi {
  getMediaInfo(mediaId: string): Promise<MediaInfo>;
  downloadMedia(url: string): Promise<DownloadedMedia>;
  sendText(args: SendTextArgs): Promise<unknown>;
  markAsRead(phoneNumberId: string, messageId: string): Promise<unknown>;
}

export class GraphClient implements GraphApi {
  private token?: string;
  private baseUrl: string;
  private version: string;
  private maxDownloadBytes: number;

  constructor(args: { token?: string; baseUrl: string; version: string; maxDownloadBytes: number }) {
    this.token = args.token;
    this.baseUrl = args.baseUrl.replace(/\/+$/, "");
    this.version = args.version;
    this.maxDownloadBytes = args.maxDownloadBytes;
  }

  isConfigured() {
    return !!this.token;
  }

  private endpoint(...segments: string[]) {
    return [this.baseUrl, this.version, ...segments.map(encodeURIComponent)].join("/");
  }

  private authHeaders(): Record<string, string> {
    if (!this.token) {
      throw new Error("GRAPH_API_TOKEN is not configured");
    }
    return { Authorization: `Bearer ${this.token}` };
  }

  private assertWithinLimit(bytes: number) {
    if (bytes > this.maxDownloadBytes) {
      throw new Error(`Media exceeds configured size limit (${bytes} bytes > ${this.maxDownloadBytes})`);
    }
  }

  async getMediaInfo(mediaId: string): Promise<MediaInfo> {
    const r = await fetch(this.endpoint(mediaId), {
      method: "GET",
      headers: this.authHeaders()
    });

    if (!r.ok) {
      throw new GraphApiError("media lookup", r.status, await r.text().catch(() => ""));
    }

    const info = MediaInfoSchema.parse(await r.json());
    // Refuse before downloading when the lookup already reports the size.
    if (info.file_size !== undefined) this.assertWithinLimit(info.file_size);
    return info;
  }

  async downloadMedia(url: string): Promise<DownloadedMedia> {
    const r = await fetch(url, {
      method: "GET",
      headers: this.authHeaders()
    });

    if (!r.ok) {
      throw new GraphApiError("media download", r.status, await r.text().catch(() => ""));
    }

    this.assertWithinLimit(Number(r.headers.get("content-length") || 0));

    const buffer = Buffer.from(await r.arrayBuffer());
    if (buffer.length === 0) {
      throw new Error("Downloaded media is empty.");
    }
    this.assertWithinLimit(buffer.length);

    return { buffer, contentType: r.headers.get("content-type") };
  }

  private async postMessage(phoneNumberId: string, payload: Record<string, unknown>, operation: string) {
    const r = await fetch(this.endpoint(phoneNumberId, "messages"), {
      method: "POST",
      headers: {
        ...this.authHeaders(),
        "Content-Type": "application/json"
      },
      body: JSON.stringify({ messaging_product: "whatsapp", ...payload })
    });

    if (!r.ok) {
      throw new GraphApiError(operation, r.status, await r.text().catch(() => ""));
    }

    const data: unknown = await r.json().catch(() => null);
    return data;
  }

  async sendText(args: SendTextArgs) {
    return this.postMessage(
      args.phoneNumberId,
      {
        to: args.to,
        text: { body: args.body },
        ...(args.replyToMessageId ? { context: { message_id: args.replyToMessageId } } : {})
      },
      "send message"
    );
  }

  async markAsRead(phoneNumberId: string, messageId: string) {
    return this.postMessage(
      phoneNumberId,
      { status: "read", message_id: messageId },
      "mark as read"
    );
  }
}
