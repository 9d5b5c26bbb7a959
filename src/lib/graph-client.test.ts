import { describe, it, before, after, beforeEach } from "node:test";
import assert from "node:assert";
import { GraphClient, GraphApiError } from "./graph-client.js";
import { startFakeGraph } from "../testing/fakeGraph.js";
import type { FakeGraph } from "../testing/fakeGraph.js";

const MEDIA = Buffer.from("0123456789".repeat(10));

describe("GraphClient", () => {
  let graph: FakeGraph;
  let client: GraphClient;

  before(async () => {
    graph = await startFakeGraph({ media: MEDIA, mimeType: "image/png" });
    client = new GraphClient({
      token: "test-token",
      baseUrl: graph.baseUrl + "/",
      version: "v18.0",
      maxDownloadBytes: 1024
    });
  });

  beforeEach(() => {
    graph.reset();
  });

  after(async () => {
    await graph.close();
  });

  it("looks up the media URL with the bearer token", async () => {
    const info = await client.getMediaInfo("media-1");

    assert.strictEqual(info.url, `${graph.baseUrl}/files/media-1`);
    assert.strictEqual(info.mime_type, "image/png");
    assert.deepStrictEqual(graph.requests, [
      { method: "GET", path: "/v18.0/media-1", authorization: "Bearer test-token", body: undefined }
    ]);
  });

  it("downloads media bytes", async () => {
    const out = await client.downloadMedia(`${graph.baseUrl}/files/media-1`);

    assert.ok(out.buffer.equals(MEDIA));
    assert.match(out.contentType ?? "", /^image\/png/);
    assert.strictEqual(graph.requests[0].authorization, "Bearer test-token");
  });

  it("refuses media above the size limit", async () => {
    const small = new GraphClient({ token: "test-token", baseUrl: graph.baseUrl, version: "v18.0", maxDownloadBytes: 10 });

    await assert.rejects(
      small.downloadMedia(`${graph.baseUrl}/files/media-1`),
      /Media exceeds configured size limit \(100 bytes > 10\)/
    );
  });

  it("refuses media whose reported size is above the limit before downloading", async () => {
    const small = new GraphClient({ token: "test-token", baseUrl: graph.baseUrl, version: "v18.0", maxDownloadBytes: 10 });

    await assert.rejects(small.getMediaInfo("media-1"), /Media exceeds configured size limit \(100 bytes > 10\)/);
    assert.deepStrictEqual(graph.requests.map((r) => r.path), ["/v18.0/media-1"]);
  });

  it("sends a text reply in the message's context", async () => {
    await client.sendText({ phoneNumberId: "phone-1", to: "15550001111", body: "hi", replyToMessageId: "wamid.in" });

    assert.strictEqual(graph.requests.length, 1);
    assert.strictEqual(graph.requests[0].method, "POST");
    assert.strictEqual(graph.requests[0].path, "/v18.0/phone-1/messages");
    assert.deepStrictEqual(graph.requests[0].body, {
      messaging_product: "whatsapp",
      to: "15550001111",
      text: { body: "hi" },
      context: { message_id: "wamid.in" }
    });
  });

  it("omits the context when not replying", async () => {
    await client.sendText({ phoneNumberId: "phone-1", to: "15550001111", body: "hi" });

    assert.deepStrictEqual(graph.requests[0].body, {
      messaging_product: "whatsapp",
      to: "15550001111",
      text: { body: "hi" }
    });
  });

  it("marks a message as read", async () => {
    const out = await client.markAsRead("phone-1", "wamid.in");

    assert.deepStrictEqual(out, { success: true });
    assert.deepStrictEqual(graph.requests[0].body, {
      messaging_product: "whatsapp",
      status: "read",
      message_id: "wamid.in"
    });
  });

  it("raises GraphApiError on a non-2xx response", async () => {
    graph.failSendStatus = 500;

    await assert.rejects(
      client.markAsRead("phone-1", "wamid.in"),
      (err: unknown) => err instanceof GraphApiError && err.status === 500 && err.body === "boom"
    );
  });

  it("fails before any request when no token is configured", async () => {
    const anonymous = new GraphClient({ baseUrl: graph.baseUrl, version: "v18.0", maxDownloadBytes: 1024 });

    assert.strictEqual(anonymous.isConfigured(), false);
    await assert.rejects(anonymous.getMediaInfo("media-1"), /GRAPH_API_TOKEN is not configured/);
    assert.strictEqual(graph.requests.length, 0);
  });
});

describe("GraphClient with empty media", () => {
  let graph: FakeGraph;

  before(async () => {
    graph = await startFakeGraph({ media: Buffer.alloc(0) });
  });

  after(async () => {
    await graph.close();
  });

  it("rejects a download with no bytes", async () => {
    const client = new GraphClient({ token: "test-token", baseUrl: graph.baseUrl, version: "v18.0", maxDownloadBytes: 1024 });

    const info = await client.getMediaInfo("media-1");
    assert.strictEqual(info.file_size, 0);
    await assert.rejects(client.downloadMedia(info.url), /Downloaded media is empty\./);
  });
});
