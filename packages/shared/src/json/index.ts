export { DefaultJsonCodec, Json } from "./codec.js";
export type { JsonCodec } from "./codec.js";
export { LocalDate } from "./local-date.js";
