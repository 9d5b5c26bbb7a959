import sharp from "sharp";
import exifReader from "exif-reader";
import type { MetadataResult } from "../types/contracts.js";
import { errorMessage } from "./_util.js";

export const NO_EXIF_ERROR = "No EXIF data found";

function isPlainRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v) && !Buffer.isBuffer(v) && !(v instanceof Date);
}

export function stringifyTagValue(v: unknown): string {
  if (typeof v === "string") return v.replace(/\0+$/g, "").trim();
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? "Invalid Date" : v.toISOString();
  if (Buffer.isBuffer(v)) return `<${v.length} bytes>`;
  if (Array.isArray(v)) return v.map(stringifyTagValue).join(", ");
  if (isPlainRecord(v)) return JSON.stringify(v);
  return String(v);
}

const THUMBNAIL_SECTIONS = new Set(["Thumbnail", "ThumbnailTags"]);

/**
 * Flattens the per-IFD sections of a decoded EXIF block into one tag map.
 * The thumbnail IFD describes the embedded preview, not the photo, and is
 * left out. When a tag appears in several sections the first one wins.
 */
export function flattenExif(sections: Record<string, unknown>): Record<string, string> {
  const tags: Record<string, string> = {};
  for (const [key, section] of Object.entries(sections)) {
    if (THUMBNAIL_SECTIONS.has(key) || !isPlainRecord(section)) continue;
    for (const [name, value] of Object.entries(section)) {
      if (name in tags || value === undefined) continue;
      tags[name] = stringifyTagValue(value);
    }
  }
  return tags;
}

/** Never throws: failures come back as `{ ok: false, error }`. */
export async function extractImageMetadata(input: string | Buffer): Promise<MetadataResult> {
  try {
    const meta = await sharp(input).metadata();
    if (!meta.exif || meta.exif.length === 0) {
      return { ok: false, error: NO_EXIF_ERROR };
    }

    const sections: Record<string, unknown> = { ...exifReader(meta.exif) };
    const tags = flattenExif(sections);
    if (Object.keys(tags).length === 0) {
      return { ok: false, error: NO_EXIF_ERROR };
    }

    return {
      ok: true,
      tags,
      image: { format: meta.format, width: meta.width, height: meta.height }
    };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

/** Shape relayed to the sender: the tag map, or `{ error }`. */
export function metadataForReply(result: MetadataResult): Record<string, string> {
  return result.ok ? result.tags : { error: result.error };
}
