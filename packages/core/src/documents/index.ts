export type { Document } from "./document.js";
export { DocumentMetadataKeys, document, toTextSegment } from "./document.js";
export { loadDocument, loadDocuments } from "./loader.js";
export type { DocumentParser } from "./parser.js";
export { TextDocumentParser } from "./parser.js";
export { splitByParagraph } from "./splitter.js";
