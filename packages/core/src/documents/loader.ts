/**
 * File system document loading.
 *
 * @module core/documents/loader
 */

import type { Dirent } from "node:fs";
import { readdir, readFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { ErrorCode, TesseraError } from "@tessera/shared";
import { type Document, DocumentMetadataKeys } from "./document.js";
import type { DocumentParser } from "./parser.js";

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Read and parse one file. The document records the file name and the
 * absolute directory it was read from.
 */
export async function loadDocument(path: string, parser: DocumentParser): Promise<Document> {
  const absolutePath = resolve(path);

  let content: Buffer;
  try {
    content = await readFile(absolutePath);
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "EISDIR")) {
      throw new TesseraError(`Not a readable file: ${absolutePath}`, ErrorCode.DOCUMENT_NOT_FOUND, {
        cause: error,
      });
    }
    throw error;
  }

  let parsed: Document;
  try {
    parsed = parser.parse(content);
  } catch (error) {
    if (error instanceof TesseraError) {
      throw error;
    }
    throw new TesseraError(`Failed to parse ${absolutePath}`, ErrorCode.DOCUMENT_PARSE_FAILED, {
      cause: error,
    });
  }

  return {
    text: parsed.text,
    metadata: {
      ...parsed.metadata,
      [DocumentMetadataKeys.FILE_NAME]: basename(absolutePath),
      [DocumentMetadataKeys.ABSOLUTE_DIRECTORY_PATH]: dirname(absolutePath),
    },
  };
}

/**
 * Load every regular file directly inside `directory`, in name order.
 * Subdirectories are skipped.
 */
export async function loadDocuments(directory: string, parser: DocumentParser): Promise<Document[]> {
  const absoluteDirectory = resolve(directory);

  let entries: Dirent[];
  try {
    entries = await readdir(absoluteDirectory, { withFileTypes: true });
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      throw new TesseraError(`Not a directory: ${absoluteDirectory}`, ErrorCode.DOCUMENT_NOT_FOUND, {
        cause: error,
      });
    }
    throw error;
  }

  const files = entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();

  const documents: Document[] = [];
  for (const name of files) {
    documents.push(await loadDocument(join(absoluteDirectory, name), parser));
  }
  return documents;
}
