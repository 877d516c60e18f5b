import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ErrorCode } from "@tessera/shared";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { document, toTextSegment } from "../document.js";
import { loadDocument, loadDocuments } from "../loader.js";
import { type DocumentParser, TextDocumentParser } from "../parser.js";
import { splitByParagraph } from "../splitter.js";

describe("TextDocumentParser", () => {
  const parser = new TextDocumentParser();

  it("decodes UTF-8", () => {
    expect(parser.parse(Buffer.from("Grüße", "utf8"))).toEqual({ text: "Grüße", metadata: {} });
  });

  it("rejects blank content", () => {
    expect(() => parser.parse(Buffer.from("  \n\t "))).toThrow(
      expect.objectContaining({ code: ErrorCode.INVALID_ARGUMENT })
    );
  });
});

describe("document loading", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tessera-docs-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads a file with file name and directory metadata", async () => {
    await writeFile(join(dir, "notes.txt"), "Some notes");

    const doc = await loadDocument(join(dir, "notes.txt"), new TextDocumentParser());

    expect(doc).toEqual({
      text: "Some notes",
      metadata: { file_name: "notes.txt", absolute_directory_path: dir },
    });
  });

  it("rejects missing files with DOCUMENT_NOT_FOUND", async () => {
    await expect(loadDocument(join(dir, "missing.txt"), new TextDocumentParser())).rejects.toMatchObject({
      code: ErrorCode.DOCUMENT_NOT_FOUND,
    });
  });

  it("wraps parser failures", async () => {
    await writeFile(join(dir, "data.bin"), "x");
    const failing: DocumentParser = {
      parse: () => {
        throw new SyntaxError("unexpected byte");
      },
    };

    await expect(loadDocument(join(dir, "data.bin"), failing)).rejects.toMatchObject({
      code: ErrorCode.DOCUMENT_PARSE_FAILED,
    });
  });

  it("loads regular files of a directory in name order", async () => {
    await writeFile(join(dir, "b.txt"), "second");
    await writeFile(join(dir, "a.txt"), "first");
    await mkdir(join(dir, "nested"));
    await writeFile(join(dir, "nested", "c.txt"), "skipped");

    const docs = await loadDocuments(dir, new TextDocumentParser());

    expect(docs.map((doc) => doc.text)).toEqual(["first", "second"]);
    expect(docs.map((doc) => doc.metadata.file_name)).toEqual(["a.txt", "b.txt"]);
  });

  it("rejects a missing directory", async () => {
    await expect(loadDocuments(join(dir, "nope"), new TextDocumentParser())).rejects.toMatchObject({
      code: ErrorCode.DOCUMENT_NOT_FOUND,
    });
  });
});

describe("splitByParagraph", () => {
  it("packs paragraphs up to the limit", () => {
    const segments = splitByParagraph(document("one\n\ntwo\n\nthree", { file_name: "n.txt" }), 8);

    expect(segments).toEqual([
      { text: "one\n\ntwo", metadata: { file_name: "n.txt", index: 0 } },
      { text: "three", metadata: { file_name: "n.txt", index: 1 } },
    ]);
  });

  it("treats whitespace-only lines as paragraph breaks", () => {
    const segments = splitByParagraph(document("alpha\n   \nbeta"), 100);

    expect(segments.map((segment) => segment.text)).toEqual(["alpha\n\nbeta"]);
  });

  it("hard-splits paragraphs longer than the limit", () => {
    const segments = splitByParagraph(document("ab\n\nabcdefghij\n\ncd"), 4);

    expect(segments.map((segment) => segment.text)).toEqual(["ab", "abcd", "efgh", "ij", "cd"]);
  });

  it("returns nothing for blank documents", () => {
    expect(splitByParagraph(document("  \n\n "), 10)).toEqual([]);
  });

  it("keeps surrogate pairs whole when hard-splitting", () => {
    const segments = splitByParagraph(document("😀😀😀"), 2);

    expect(segments.map((segment) => segment.text)).toEqual(["😀😀", "😀"]);
  });

  it("counts astral characters once when packing", () => {
    const segments = splitByParagraph(document("😀\n\n😀"), 4);

    expect(segments.map((segment) => segment.text)).toEqual(["😀\n\n😀"]);
  });

  it("rejects a non-positive limit", () => {
    expect(() => splitByParagraph(document("x"), 0)).toThrow(
      expect.objectContaining({ code: ErrorCode.INVALID_ARGUMENT })
    );
  });
});

describe("toTextSegment", () => {
  it("copies text and metadata", () => {
    const doc = document("text", { page: 1 });
    const segment = toTextSegment(doc);

    expect(segment).toEqual({ text: "text", metadata: { page: 1 } });
    expect(segment.metadata).not.toBe(doc.metadata);
  });
});
