import fs from "node:fs/promises";
import path from "node:path";
import { nanoid } from "nanoid";
import { ensureDir } from "../lib/_util.js";

export interface ImageStore {
  init(): Promise<void>;
  save(filename: string, data: Buffer): Promise<string>;
}

/** Subtype of an image MIME type, usable as a file extension. */
export function extensionFromMime(mimeType?: string): string {
  const subtype = (mimeType ?? "").split(";")[0].split("/")[1] ?? "";
  const ext = subtype.trim().toLowerCase().replace(/[^a-z0-9]/g, "");
  return ext || "jpeg";
}

export function buildImageFilename(mimeType?: string, now: number = Date.now()): string {
  return `image_${(now / 1000).toFixed(3)}_${nanoid(8)}.${extensionFromMime(mimeType)}`;
}

export class FileImageStore implements ImageStore {
  private dir: string;

  constructor(dir: string) {
    this.dir = path.resolve(dir);
  }

  get directory() {
    return this.dir;
  }

  async init(): Promise<void> {
    ensureDir(this.dir);
  }

  async save(filename: string, data: Buffer): Promise<string> {
    const base = path.basename(filename);
    if (!base || base !== filename) {
      throw new Error(`Refusing to write outside the images directory: ${filename}`);
    }
    const target = path.join(this.dir, base);
    await fs.writeFile(target, data, { flag: "wx" });
    return target;
  }
}
