import { describe, expect, it } from "vitest";
import { createInMemoryEngine, decodeBytesField } from "../engine.js";

describe("decodeBytesField", () => {
  it("decodes strict base64", () => {
    expect(Buffer.from(decodeBytesField("Zm9v")).toString("utf8")).toBe("foo");
    expect(decodeBytesField("")).toHaveLength(0);
  });

  it("rejects characters outside the alphabet and bad padding", () => {
    expect(() => decodeBytesField("Zm9v!")).toThrow("invalid base64");
    expect(() => decodeBytesField("Zm9")).toThrow("invalid base64");
  });
});

describe("createInMemoryEngine", () => {
  const engine = createInMemoryEngine("foo\nthe foo\nmoo");

  it("returns spans alongside matches when asked", () => {
    expect(engine.match({ input: "the foo", maxNgramSize: 2, withOffsets: true })).toEqual({
      matches: ["the foo", "foo"],
      spans: [
        { start: 0, end: 7 },
        { start: 4, end: 7 },
      ],
    });
    expect(engine.match({ input: "the foo", maxNgramSize: 2, withOffsets: false })).toEqual({
      matches: ["the foo", "foo"],
    });
  });

  it("matches raw bytes like text", () => {
    const bytes = Buffer.from("a moo", "utf8");
    expect(engine.match({ input: bytes, maxNgramSize: 1, withOffsets: true })).toEqual({
      matches: ["moo"],
      spans: [{ start: 2, end: 5 }],
    });
    expect(engine.contains(Buffer.from("the foo"))).toBe(true);
  });

  it("reports dictionary stats", () => {
    expect(engine.stats()).toEqual({ entryCount: 3, corpusBytes: 15 });
  });
});
