import type http from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { createInMemoryEngine } from "../engine.js";
import { startServer } from "../server.js";

let server: http.Server;
let base: string;

beforeAll(async () => {
  const started = await startServer({
    port: 0,
    metricsEnabled: true,
    engine: createInMemoryEngine("foo\nbar\nthe foo\nmoo"),
  });
  server = started.server;
  base = `http://127.0.0.1:${started.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

function post(path: string, body: unknown, contentType = "application/json"): Promise<Response> {
  return fetch(`${base}${path}`, {
    method: "POST",
    headers: { "content-type": contentType },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

describe("http server", () => {
  it("reports health with the dictionary size", async () => {
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok", service: "phrase_engine", version: "0.1.0", entries: 4 });
  });

  it("answers contains for text and base64 bytes", async () => {
    const a = await post("/contains", { text: "the foo" });
    expect(await a.json()).toEqual({ contains: true });

    const b = await post("/contains", { bytes: Buffer.from("moo").toString("base64") });
    expect(await b.json()).toEqual({ contains: true });

    const c = await post("/contains", { text: "the" });
    expect(await c.json()).toEqual({ contains: false });
  });

  it("returns n-gram matches", async () => {
    const res = await post("/matches", { text: "the foo went over the moo", maxNgramSize: 2 });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ matches: ["the foo", "foo", "moo"], tookMs: expect.any(Number) });
  });

  it("uses the default window when maxNgramSize is omitted", async () => {
    const res = await post("/matches", { text: "the foo", withOffsets: true });
    expect(await res.json()).toEqual({
      matches: ["the foo", "foo"],
      spans: [
        { start: 0, end: 7 },
        { start: 4, end: 7 },
      ],
      tookMs: expect.any(Number),
    });
  });

  it("rejects a body with both text and bytes", async () => {
    const res = await post("/matches", { text: "foo", bytes: "Zm9v" });
    expect(res.status).toBe(400);
    expect(res.headers.get("content-type")).toBe("application/problem+json");
    expect(await res.json()).toMatchObject({
      status: 400,
      code: "INVALID_ARGUMENT",
      errors: [{ path: "$", message: "exactly one of text, bytes is required" }],
    });
  });

  it("validates maxNgramSize, withOffsets and bytes", async () => {
    const res = await post("/matches", { text: "foo", maxNgramSize: 65, withOffsets: "yes" });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      errors: [
        { path: "$.maxNgramSize", message: "must be an integer between 0 and 64" },
        { path: "$.withOffsets", message: "must be a boolean" },
      ],
    });

    const bad = await post("/contains", { bytes: "@@@" });
    expect(await bad.json()).toMatchObject({ errors: [{ path: "$.bytes", message: "invalid base64" }] });
  });

  it("rejects non-JSON and malformed JSON bodies", async () => {
    const wrongType = await post("/contains", "foo", "text/plain");
    expect(wrongType.status).toBe(415);

    const malformed = await post("/contains", "{not json");
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toMatchObject({ detail: "malformed JSON body" });
  });

  it("returns a 404 problem for unknown routes", async () => {
    const res = await fetch(`${base}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ code: "NOT_FOUND" });
  });

  it("exposes metrics", async () => {
    const res = await fetch(`${base}/metrics`);
    expect(res.status).toBe(200);
    const lines = (await res.text()).split("\n");
    expect(lines).toContain("phrase_engine_dictionary_entries 4");
    expect(lines).toContain("phrase_engine_corpus_bytes 19");
    expect(lines).toContain('phrase_engine_requests_total{route="/health",status="200"} 1');
  });
});
