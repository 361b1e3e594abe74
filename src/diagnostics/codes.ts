/**
 * Error Code Registry
 *
 * Error codes follow the pattern:
 * - E0xxx: Input errors (JSON comprehension descriptions)
 * - E1xxx: Desugaring errors
 * - W0xxx: Warnings
 */

export const ErrorCode = {
  // ==========================================================================
  // E0xxx - Input errors (handled by ast-json)
  // ==========================================================================
  InvalidJson: "E0001",
  UnknownNodeKind: "E0002",
  MissingField: "E0003",
  InvalidFieldValue: "E0004",

  // ==========================================================================
  // E1xxx - Desugaring errors
  // ==========================================================================
  MalformedComprehension: "E1001",
  ComprehensionTooLarge: "E1002",
  UnsupportedPattern: "E1003",

  // ==========================================================================
  // W0xxx - Warnings
  // ==========================================================================
  UnknownField: "W0001",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

const DESCRIPTIONS: Record<ErrorCodeType, string> = {
  E0001: "Input is not valid JSON",
  E0002: "Node kind is not recognized",
  E0003: "Required field is missing",
  E0004: "Field has a value of the wrong shape",

  E1001: "Clauses do not form a well-formed comprehension",
  E1002: "Comprehension has more clauses than the configured maximum",
  E1003: "Pattern shape is not supported",

  W0001: "Field is not part of the node's schema and was ignored",
};

function isErrorCode(code: string): code is ErrorCodeType {
  return Object.prototype.hasOwnProperty.call(DESCRIPTIONS, code);
}

/**
 * Get a human-readable description for an error code.
 */
export function getErrorDescription(code: string): string {
  return isErrorCode(code) ? DESCRIPTIONS[code] : "Unknown error";
}

/**
 * Get the severity for an error code.
 */
export function getCodeSeverity(code: string): "error" | "warning" {
  return code.startsWith("W") ? "warning" : "error";
}
