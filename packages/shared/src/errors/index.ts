export { ErrorCode } from "./codes.js";
export { TesseraError } from "./tessera-error.js";
