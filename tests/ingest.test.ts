import { describe, it, expect } from "vitest";
import { MalformedDocumentError, InvalidImportError } from "../lib/errors";
import { countComments, mergeDocuments, parseDocument, parseImportPayload } from "../lib/ingest";
import type { RawDocument } from "../types";

function doc(id: string, title: string): RawDocument {
  return { id, title, body: "", score: 0, comments: [] };
}

describe("parseDocument", () => {
  it("applies defaults and falls back to selftext", () => {
    const { document, skippedComments } = parseDocument({
      id: 42,
      title: "T",
      selftext: "S",
      score: "abc",
      comments: [{ id: "c1", body: "hi", score: 4 }, { body: "no id" }],
    });

    expect(document.id).toBe("42");
    expect(document.body).toBe("S");
    expect(document.score).toBe(0);
    expect(document.comments.map(c => c.id)).toEqual(["c1"]);
    expect(document.comments[0].score).toBe(4);
    expect(skippedComments).toBe(1);
  });

  it("rejects documents without an id", () => {
    expect(() => parseDocument({ title: "no id" })).toThrow(MalformedDocumentError);
    expect(() => parseDocument("junk")).toThrow(MalformedDocumentError);
  });

  it("re-nests flat comment lists by parent id in original order", () => {
    const { document } = parseDocument({
      id: "t1",
      comments: [
        { id: "a", body: "A" },
        { id: "b", parent_id: "t1_a", body: "B" },
        { id: "c", parent_id: "zzz", body: "C" },
        { id: "d", parent_id: "a", body: "D" },
      ],
    });

    expect(document.comments.map(c => c.id)).toEqual(["a", "c"]);
    expect(document.comments[0].children.map(c => c.id)).toEqual(["b", "d"]);
    expect(document.comments[0].children[0].depth).toBe(1);
  });

  it("keeps comments in a parent cycle at the top level", () => {
    const { document } = parseDocument({
      id: "t1",
      comments: [
        { id: "x", parent_id: "y", body: "X" },
        { id: "y", parent_id: "x", body: "Y" },
      ],
    });

    expect(document.comments.map(c => c.id)).toEqual(["x", "y"]);
    expect(countComments(document.comments)).toBe(2);
  });

  it("reads native replies listings and skips 'more' stubs", () => {
    const { document } = parseDocument({
      id: "t1",
      comments: [{
        id: "a",
        body: "A",
        replies: {
          kind: "Listing",
          data: { children: [{ kind: "t1", data: { id: "b", body: "B" } }, { kind: "more", data: { count: 3 } }] },
        },
      }],
    });

    expect(document.comments[0].children.map(c => c.id)).toEqual(["b"]);
    expect(countComments(document.comments)).toBe(2);
  });
});

describe("parseImportPayload", () => {
  it("accepts the wrapper, arrays and single objects", () => {
    expect(parseImportPayload({ meta: {}, threads: [{ id: 1 }, { id: 2 }] }).entries).toHaveLength(2);
    expect(parseImportPayload([{ id: 1 }]).entries).toHaveLength(1);
    expect(parseImportPayload({ id: 1 }, "one.json")).toEqual({ source: "one.json", entries: [{ id: 1 }] });
  });

  it("converts a native listing pair into one thread", () => {
    const batch = parseImportPayload([
      { kind: "Listing", data: { children: [{ kind: "t3", data: { id: "abc", title: "T", selftext: "S", score: 7 } }] } },
      { kind: "Listing", data: { children: [{ kind: "t1", data: { id: "c1", body: "hello", score: 2 } }, { kind: "more", data: { count: 5 } }] } },
    ]);

    const { document } = parseDocument(batch.entries[0]);
    expect(document).toMatchObject({ id: "abc", title: "T", body: "S", score: 7 });
    expect(document.comments.map(c => c.body)).toEqual(["hello"]);
  });

  it("rejects unsupported shapes", () => {
    expect(() => parseImportPayload("nope")).toThrow(InvalidImportError);
    expect(() => parseImportPayload({ threads: "x" })).toThrow(InvalidImportError);
  });
});

describe("mergeDocuments", () => {
  it("keeps the first copy of a duplicated id", () => {
    const { documents, duplicates } = mergeDocuments([
      [doc("1", "first")],
      [doc("1", "second"), doc("2", "other")],
    ]);

    expect(documents.map(d => d.title)).toEqual(["first", "other"]);
    expect(duplicates).toBe(1);
  });
});
