import { ErrorCode, TesseraError } from "@tessera/shared";
import type { TextSegment } from "../embedding/text-segment.js";
import { type Document, DocumentMetadataKeys } from "./document.js";

const PARAGRAPH_SEPARATOR = /\s*\n\s*\n\s*/;

/** Length in code points, so surrogate pairs count once */
function charCount(text: string): number {
  return Array.from(text).length;
}

/**
 * Split a document into segments of at most `maxChars` characters (code
 * points; a surrogate pair is never cut).
 *
 * Paragraphs (separated by blank lines) are packed greedily, joined by
 * `"\n\n"`. A paragraph longer than `maxChars` is cut into `maxChars`-sized
 * pieces. Every segment carries the document metadata plus its `index`.
 *
 * @example
 * ```typescript
 * splitByParagraph(document("one\n\ntwo\n\nthree"), 8);
 * // texts: ["one\n\ntwo", "three"]
 * ```
 */
export function splitByParagraph(doc: Document, maxChars: number): TextSegment[] {
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new TesseraError(`maxChars must be a positive integer, got ${maxChars}`, ErrorCode.INVALID_ARGUMENT);
  }

  const paragraphs = doc.text
    .trim()
    .split(PARAGRAPH_SEPARATOR)
    .filter((paragraph) => paragraph.length > 0);

  const texts: string[] = [];
  let current = "";

  const flush = (): void => {
    if (current.length > 0) {
      texts.push(current);
      current = "";
    }
  };

  for (const paragraph of paragraphs) {
    const chars = Array.from(paragraph);
    if (chars.length > maxChars) {
      flush();
      for (let start = 0; start < chars.length; start += maxChars) {
        texts.push(chars.slice(start, start + maxChars).join(""));
      }
      continue;
    }

    const candidate = current.length === 0 ? paragraph : `${current}\n\n${paragraph}`;
    if (charCount(candidate) > maxChars) {
      flush();
      current = paragraph;
    } else {
      current = candidate;
    }
  }
  flush();

  return texts.map((text, index) => ({
    text,
    metadata: { ...doc.metadata, [DocumentMetadataKeys.INDEX]: index },
  }));
}
