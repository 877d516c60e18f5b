import { ErrorCode, isNullOrBlank, TesseraError } from "@tessera/shared";
import { type Document, document } from "./document.js";

/**
 * Turns raw file content into a {@link Document}.
 */
export interface DocumentParser {
  parse(content: Uint8Array): Document;
}

/**
 * Decodes content as text. Blank content is rejected.
 */
export class TextDocumentParser implements DocumentParser {
  private readonly decoder: TextDecoder;

  constructor(encoding = "utf-8") {
    this.decoder = new TextDecoder(encoding);
  }

  parse(content: Uint8Array): Document {
    const text = this.decoder.decode(content);
    if (isNullOrBlank(text)) {
      throw new TesseraError("Document content is blank", ErrorCode.INVALID_ARGUMENT);
    }
    return document(text);
  }
}
