// ============================================
// Tessera Error Codes
// ============================================

/**
 * Centralized error codes shared by every Tessera package.
 * Error code ranges:
 * - 1xxx: General/System errors
 * - 2xxx: Network/API errors
 * - 3xxx: Credential errors
 * - 4xxx: Provider errors
 * - 5xxx: Store and document errors
 */
export enum ErrorCode {
  // General Errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL_ERROR = 1001,
  INVALID_ARGUMENT = 1002,
  NOT_IMPLEMENTED = 1003,
  TIMEOUT = 1004,
  ABORTED = 1005,

  // Network/API Errors (2xxx)
  NETWORK_ERROR = 2001,
  API_ERROR = 2002,
  RATE_LIMITED = 2003,
  SERVICE_UNAVAILABLE = 2004,

  // Credential Errors (3xxx)
  CREDENTIAL_NOT_FOUND = 3001,
  CREDENTIAL_VALIDATION_FAILED = 3004,

  // Provider Errors (4xxx)
  PROVIDER_NOT_FOUND = 4001,
  PROVIDER_INITIALIZATION_FAILED = 4002,
  CONTEXT_OVERFLOW = 4003,
  CONTENT_FILTERED = 4004,

  // Store and Document Errors (5xxx)
  EMBEDDING_STORE_ERROR = 5001,
  DOCUMENT_NOT_FOUND = 5002,
  DOCUMENT_PARSE_FAILED = 5003,
}
