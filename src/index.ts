export { createApp } from "./app.js";
export { createBridge, buildReplyText } from "./plugin/createBridge.js";
export { loadConfig, ConfigError } from "./config.js";
export type { Config } from "./config.js";
export { GraphClient, GraphApiError } from "./lib/graph-client.js";
export type { GraphApi, MediaInfo } from "./lib/graph-client.js";
export { FileImageStore } from "./store/images.js";
export type { ImageStore } from "./store/images.js";
export { extractImageMetadata } from "./lib/exif.js";
export { whatsappCloudToInboundMessage } from "./adapters/whatsapp-cloud.js";
export type { InboundMessage, ImageDescriptor, MetadataResult, MessageOutcome } from "./types/contracts.js";
