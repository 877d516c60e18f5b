import type { Metadata, TextSegment } from "../embedding/text-segment.js";

/**
 * Well-known metadata keys set by the loaders.
 */
export const DocumentMetadataKeys = {
  FILE_NAME: "file_name",
  ABSOLUTE_DIRECTORY_PATH: "absolute_directory_path",
  INDEX: "index",
} as const;

/**
 * Loaded text plus what is known about where it came from.
 */
export interface Document {
  text: string;
  metadata: Metadata;
}

export function document(text: string, metadata: Metadata = {}): Document {
  return { text, metadata: { ...metadata } };
}

export function toTextSegment(doc: Document): TextSegment {
  return { text: doc.text, metadata: { ...doc.metadata } };
}
