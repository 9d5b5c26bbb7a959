import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { FileImageStore, buildImageFilename, extensionFromMime } from "./images.js";

describe("extensionFromMime", () => {
  it("uses the MIME subtype", () => {
    assert.strictEqual(extensionFromMime("image/jpeg"), "jpeg");
    assert.strictEqual(extensionFromMime("IMAGE/WebP"), "webp");
  });

  it("drops parameters and unsafe characters", () => {
    assert.strictEqual(extensionFromMime("image/png; charset=binary"), "png");
    assert.strictEqual(extensionFromMime("image/svg+xml"), "svgxml");
  });

  it("falls back to jpeg", () => {
    assert.strictEqual(extensionFromMime(undefined), "jpeg");
    assert.strictEqual(extensionFromMime("garbage"), "jpeg");
    assert.strictEqual(extensionFromMime("image/"), "jpeg");
    assert.strictEqual(extensionFromMime("image/../../x"), "jpeg");
  });
});

describe("buildImageFilename", () => {
  it("derives the name from the timestamp", () => {
    const name = buildImageFilename("image/png", 1700000000123);
    assert.match(name, /^image_1700000000\.123_[A-Za-z0-9_-]{8}\.png$/);
  });

  it("does not repeat for the same instant", () => {
    assert.notStrictEqual(buildImageFilename("image/jpeg", 1), buildImageFilename("image/jpeg", 1));
  });
});

describe("FileImageStore", () => {
  let tmpDir: string;

  before(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "images_test_"));
  });

  after(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("creates its directory on init", async () => {
    const store = new FileImageStore(path.join(tmpDir, "nested", "images"));
    await store.init();
    assert.ok(fs.statSync(store.directory).isDirectory());
  });

  it("writes the bytes under the given name", async () => {
    const store = new FileImageStore(tmpDir);
    await store.init();

    const saved = await store.save("image_1.jpeg", Buffer.from("bytes"));

    assert.strictEqual(saved, path.join(path.resolve(tmpDir), "image_1.jpeg"));
    assert.strictEqual(fs.readFileSync(saved, "utf8"), "bytes");
  });

  it("never overwrites an existing file", async () => {
    const store = new FileImageStore(tmpDir);
    await store.save("image_2.jpeg", Buffer.from("first"));

    await assert.rejects(store.save("image_2.jpeg", Buffer.from("second")), { code: "EEXIST" });
    assert.strictEqual(fs.readFileSync(path.join(tmpDir, "image_2.jpeg"), "utf8"), "first");
  });

  it("refuses names that leave the directory", async () => {
    const store = new FileImageStore(tmpDir);
    await assert.rejects(store.save("../escape.jpeg", Buffer.from("x")), /Refusing to write outside the images directory/);
  });
});
