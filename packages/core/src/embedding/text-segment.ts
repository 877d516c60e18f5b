export type MetadataValue = string | number | boolean;

/**
 * Key-value facts about a piece of text (source file, page, index).
 */
export type Metadata = Record<string, MetadataValue>;

/**
 * A unit of text to embed and store, with its metadata.
 */
export interface TextSegment {
  text: string;
  metadata: Metadata;
}

export function textSegment(text: string, metadata: Metadata = {}): TextSegment {
  return { text, metadata: { ...metadata } };
}

export function isMetadataValue(value: unknown): value is MetadataValue {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

/**
 * Keep the entries of `record` that are valid metadata values.
 */
export function toMetadata(record: Record<string, unknown>): Metadata {
  const metadata: Metadata = {};
  for (const [key, value] of Object.entries(record)) {
    if (isMetadataValue(value)) {
      metadata[key] = value;
    }
  }
  return metadata;
}
