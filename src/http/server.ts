import http from "node:http";
import { randomUUID } from "node:crypto";

import type { TextInput } from "../core/index.js";
import { DEFAULT_MAX_NGRAM_SIZE } from "../config.js";
import { PROBLEM_CONTENT_TYPE, problem, type FieldError } from "./problem.js";
import { asBoolean, asInt, asString, isRecord, pushErr } from "./validation.js";
import { createInMemoryEngine, decodeBytesField, type Engine } from "./engine.js";
import { Metrics } from "./metrics.js";

const SERVICE = "phrase_engine";
const VERSION = "0.1.0";

const MAX_TEXT_CHARS = 65536;
const MAX_BYTES = 65536;
const MAX_NGRAM_SIZE = 64;

const ROUTES = new Set(["/health", "/metrics", "/contains", "/matches"]);

export interface ServerOptions {
  port?: number;
  metricsEnabled?: boolean;
  engine?: Engine;
  /** used when a /matches request omits maxNgramSize */
  defaultMaxNgramSize?: number;
}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const engine = opts.engine ?? createInMemoryEngine();
  const metricsEnabled = opts.metricsEnabled ?? false;
  const defaultMaxNgramSize = opts.defaultMaxNgramSize ?? DEFAULT_MAX_NGRAM_SIZE;
  const metrics = new Metrics();

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const route = ROUTES.has(url.pathname) ? url.pathname : "other";
    res.on("finish", () => metrics.recordRequest(route, res.statusCode));

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
          entries: engine.stats().entryCount,
        });
      }

      if (req.method === "GET" && url.pathname === "/metrics") {
        if (!metricsEnabled) {
          return sendProblem(res, 404, problem({ status: 404, code: "NOT_FOUND", detail: "metrics not enabled", instance: url.pathname, requestId }));
        }
        const stats = engine.stats();
        res.statusCode = 200;
        res.setHeader("content-type", "text/plain; version=0.0.4");
        res.end(metrics.render({ entries: stats.entryCount, corpusBytes: stats.corpusBytes }));
        return;
      }

      if (req.method === "POST" && (url.pathname === "/contains" || url.pathname === "/matches")) {
        if (!isJson(req)) {
          return sendProblem(res, 415, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance: url.pathname, requestId }));
        }
        const body = await readJson(req);
        if (!isRecord(body)) {
          return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object", instance: url.pathname, requestId }));
        }

        const errors: FieldError[] = [];
        const input = readInput(body, errors);

        if (url.pathname === "/contains") {
          if (errors.length || input === undefined) {
            return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: url.pathname, requestId, errors }));
          }
          return sendJson(res, 200, { contains: engine.contains(input) });
        }

        let maxNgramSize = defaultMaxNgramSize;
        if (body.maxNgramSize !== undefined) {
          const n = asInt(body.maxNgramSize);
          if (n === undefined || n < 0 || n > MAX_NGRAM_SIZE) {
            pushErr(errors, "$.maxNgramSize", `must be an integer between 0 and ${MAX_NGRAM_SIZE}`);
          } else {
            maxNgramSize = n;
          }
        }

        let withOffsets = false;
        if (body.withOffsets !== undefined) {
          const b = asBoolean(body.withOffsets);
          if (b === undefined) pushErr(errors, "$.withOffsets", "must be a boolean");
          else withOffsets = b;
        }

        if (errors.length || input === undefined) {
          return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: url.pathname, requestId, errors }));
        }

        const started = Date.now();
        const r = engine.match({ input, maxNgramSize, withOffsets });
        metrics.recordMatches(r.matches.length);
        return sendJson(res, 200, { ...r, tookMs: Date.now() - started });
      }

      return sendProblem(res, 404, problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance: url.pathname, requestId }));
    } catch (e) {
      if (e instanceof MalformedJsonError) {
        return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "malformed JSON body", instance: url.pathname, requestId }));
      }
      console.error(`[${requestId}] ${req.method ?? "?"} ${url.pathname} failed:`, e);
      return sendProblem(res, 500, problem({ status: 500, code: "INTERNAL", detail: "internal error", instance: url.pathname, requestId }));
    }
  });
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? Number(process.env.PORT ?? 3000);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

/** Exactly one of `text` (UTF-8 string) or `bytes` (base64) must be present. */
function readInput(body: Record<string, unknown>, errors: FieldError[]): TextInput | undefined {
  const hasText = body.text !== undefined;
  const hasBytes = body.bytes !== undefined;
  if (hasText === hasBytes) {
    pushErr(errors, "$", "exactly one of text, bytes is required");
    return undefined;
  }

  if (hasText) {
    const text = asString(body.text);
    if (text === undefined) {
      pushErr(errors, "$.text", "must be a string");
      return undefined;
    }
    if (text.length > MAX_TEXT_CHARS) {
      pushErr(errors, "$.text", "too long");
      return undefined;
    }
    return text;
  }

  const encoded = asString(body.bytes);
  if (encoded === undefined) {
    pushErr(errors, "$.bytes", "must be a base64 string");
    return undefined;
  }
  let bytes: Uint8Array;
  try {
    bytes = decodeBytesField(encoded);
  } catch {
    pushErr(errors, "$.bytes", "invalid base64");
    return undefined;
  }
  if (bytes.length > MAX_BYTES) {
    pushErr(errors, "$.bytes", "too long");
    return undefined;
  }
  return bytes;
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return (ct.split(";")[0] ?? "").trim().toLowerCase() === "application/json";
}

export class MalformedJsonError extends Error {
  constructor(cause: unknown) {
    super("malformed JSON body", { cause });
    this.name = "MalformedJsonError";
  }
}

export async function readJson(req: AsyncIterable<unknown>): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(String(c)));
  const raw = Buffer.concat(chunks).toString("utf8");
  if (!raw.length) return null;
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new MalformedJsonError(e);
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}
