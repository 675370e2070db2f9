import type { IncomingMessage, ServerResponse } from "node:http";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

/** Builds a fetch Request from an incoming message; request bodies are not read */
export function toRequest(req: IncomingMessage): Request {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }
  return new Request(url, { method: req.method ?? "GET", headers });
}

export async function writeResponse(res: ServerResponse, response: Response, method: string | undefined): Promise<void> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, name) => {
    headers[name] = value;
  });
  res.writeHead(response.status, headers);

  if (response.body === null) {
    res.end();
    return;
  }
  if (method === "HEAD") {
    await response.body.cancel();
    res.end();
    return;
  }
  await pipeline(Readable.fromWeb(response.body), res);
}
