// ============================================
// Tessera Shared Utilities
// ============================================

// Error codes
export { ErrorCode, TesseraError } from "./errors/index.js";
// JSON
export { DefaultJsonCodec, Json, LocalDate } from "./json/index.js";
export type { JsonCodec } from "./json/index.js";
// Result type (shared so every package reports failures the same way)
export type { Result } from "./types/result.js";
export { Err, isErr, isOk, map, Ok, unwrap, unwrapOr } from "./types/result.js";
// Utilities
export { generateUUIDFrom, randomUUID } from "./utils/id.js";
export { getOrDefault, getOrDefaultLazy, isNullOrEmpty } from "./utils/objects.js";
export type { Collection } from "./utils/objects.js";
export {
  areNotNullOrBlank,
  firstChars,
  isNotNullOrBlank,
  isNullOrBlank,
  quoted,
  repeat,
} from "./utils/strings.js";
