import type { IncomingMessage, ServerResponse } from "node:http";

export function captureRawBody(req: IncomingMessage & { rawBody?: Buffer }, _res: ServerResponse, buf: Buffer) {
  // store raw bytes as-is (signature depends on it)
  req.rawBody = buf;
}
