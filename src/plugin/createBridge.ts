import type { Logger } from "pino";
import type { GraphApi } from "../lib/graph-client.js";
import type { ImageStore } from "../store/images.js";
import { buildImageFilename } from "../store/images.js";
import { extractImageMetadata, metadataForReply } from "../lib/exif.js";
import { clampStr, errorMessage } from "../lib/_util.js";
import type { InboundMessage, MessageOutcome, MetadataResult } from "../types/contracts.js";

export const REPLY_MAX_CHARS = 4096;

export function buildReplyText(caption: string | undefined, metadata: Record<string, string>): string {
  const text =
    "Image received and saved successfully!\n" +
    `Caption: ${caption || "No caption"}\n\n` +
    `Metadata:\n${JSON.stringify(metadata, null, 2)}`;
  return clampStr(text, REPLY_MAX_CHARS);
}

export function createBridge(args: {
  graph: GraphApi;
  images: ImageStore;
  logger: Logger;
  extractMetadata?: (filePath: string) => Promise<MetadataResult>;
  now?: () => number;
}) {
  const log = args.logger;
  const extract = args.extractMetadata ?? extractImageMetadata;
  const now = args.now ?? Date.now;

  async function processImage(msg: InboundMessage): Promise<MessageOutcome> {
    const image = msg.image;
    const filename = buildImageFilename(image?.mimeType, now());

    try {
      if (!image) throw new Error("image message without image payload");

      const media = await args.graph.getMediaInfo(image.id);
      const downloaded = await args.graph.downloadMedia(media.url);
      const imagePath = await args.images.save(filename, downloaded.buffer);
      log.info({ filename, bytes: downloaded.buffer.length }, "image: saved");

      const metadata = await extract(imagePath);
      const forReply = metadataForReply(metadata);
      log.info(
        { filename, metadata: forReply, image: metadata.ok ? metadata.image : undefined },
        "image: metadata extracted"
      );

      if (!msg.phoneNumberId) throw new Error("webhook payload has no metadata.phone_number_id");

      await args.graph.sendText({
        phoneNumberId: msg.phoneNumberId,
        to: msg.from,
        body: buildReplyText(image.caption, forReply),
        replyToMessageId: msg.id
      });
      await args.graph.markAsRead(msg.phoneNumberId, msg.id);

      log.info({ filename, messageId: msg.id }, "image: processed");
      return { kind: "image", messageId: msg.id, ok: true, filename, path: imagePath };
    } catch (err) {
      log.error({ err, filename, messageId: msg.id }, "image: processing failed");
      return { kind: "image", messageId: msg.id, ok: false, filename, error: errorMessage(err) };
    }
  }

  async function handleMessage(msg: InboundMessage | null): Promise<MessageOutcome> {
    if (!msg) {
      log.debug("webhook: no message in payload");
      return { kind: "ignored" };
    }

    if (msg.type === "text") {
      log.info({ from: msg.from, messageId: msg.id, textLength: msg.text?.length ?? 0 }, "message: text received");
      return { kind: "text", messageId: msg.id };
    }

    if (msg.type === "image") {
      log.info({ from: msg.from, messageId: msg.id, mimeType: msg.image?.mimeType }, "message: image received");
      return processImage(msg);
    }

    log.info({ from: msg.from, messageId: msg.id, type: msg.type }, "message: ignored");
    return { kind: "ignored", messageId: msg.id, type: msg.type };
  }

  return { handleMessage, processImage };
}

export type Bridge = ReturnType<typeof createBridge>;
