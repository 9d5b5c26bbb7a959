export interface ImageDescriptor {
  id: string;
  mimeType?: string;
  caption?: string;
  sha256?: string;
}

export interface InboundMessage {
  id: string;
  from: string;
  /** Cloud API message type ("text", "image", ...); "unknown" when absent. */
  type: string;
  timestamp?: string;
  phoneNumberId?: string;
  text?: string;
  image?: ImageDescriptor;
}

export interface ImageInfo {
  format?: string;
  width?: number;
  height?: number;
}

export type MetadataResult =
  | { ok: true; tags: Record<string, string>; image: ImageInfo }
  | { ok: false; error: string };

export type MessageOutcome =
  | { kind: "text"; messageId: string }
  | { kind: "ignored"; messageId?: string; type?: string }
  | { kind: "image"; messageId: string; ok: true; filename: string; path: string }
  | { kind: "image"; messageId: string; ok: false; filename: string; error: string };
