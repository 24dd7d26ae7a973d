export const KNOWN_ERROR_CODES = [
  "ACCESS-DENIED",
  "UNKNOWN-UPS",
  "VAR-NOT-SUPPORTED",
  "CMD-NOT-SUPPORTED",
  "INVALID-ARGUMENT",
  "INSTCMD-FAILED",
  "SET-FAILED",
  "READONLY",
  "TOO-LONG",
  "FEATURE-NOT-SUPPORTED",
  "FEATURE-NOT-CONFIGURED",
  "ALREADY-SSL-MODE",
  "DRIVER-NOT-CONNECTED",
  "DATA-STALE",
  "ALREADY-LOGGED-IN",
  "INVALID-PASSWORD",
  "ALREADY-SET-PASSWORD",
  "INVALID-USERNAME",
  "ALREADY-SET-USERNAME",
  "USERNAME-REQUIRED",
  "PASSWORD-REQUIRED",
  "UNKNOWN-COMMAND",
  "INVALID-VALUE"
] as const;

export type KnownErrorCode = (typeof KNOWN_ERROR_CODES)[number];

/** An `ERR` code from the server. Codes this client does not know keep their raw text. */
export type NutErrorCode =
  | { kind: "known"; code: KnownErrorCode }
  | { kind: "unknown"; code: string };

const ERROR_DESCRIPTIONS: Record<KnownErrorCode, string> = {
  "ACCESS-DENIED": "access denied",
  "UNKNOWN-UPS": "unknown UPS",
  "VAR-NOT-SUPPORTED": "variable not supported by this UPS",
  "CMD-NOT-SUPPORTED": "command not supported by this UPS",
  "INVALID-ARGUMENT": "invalid argument",
  "INSTCMD-FAILED": "instant command failed",
  "SET-FAILED": "setting the variable failed",
  READONLY: "variable is read-only",
  "TOO-LONG": "value too long",
  "FEATURE-NOT-SUPPORTED": "feature not supported by the server",
  "FEATURE-NOT-CONFIGURED": "feature not configured on the server",
  "ALREADY-SSL-MODE": "connection is already in SSL mode",
  "DRIVER-NOT-CONNECTED": "UPS driver not connected",
  "DATA-STALE": "UPS data is stale",
  "ALREADY-LOGGED-IN": "already logged in",
  "INVALID-PASSWORD": "invalid password",
  "ALREADY-SET-PASSWORD": "password already set",
  "INVALID-USERNAME": "invalid username",
  "ALREADY-SET-USERNAME": "username already set",
  "USERNAME-REQUIRED": "username required",
  "PASSWORD-REQUIRED": "password required",
  "UNKNOWN-COMMAND": "unknown command",
  "INVALID-VALUE": "invalid value"
};

const KNOWN = new Set<string>(KNOWN_ERROR_CODES);

export function isKnownErrorCode(code: string): code is KnownErrorCode {
  return KNOWN.has(code);
}

export function classifyErrorCode(raw: string): NutErrorCode {
  return isKnownErrorCode(raw) ? { kind: "known", code: raw } : { kind: "unknown", code: raw };
}

export function describeErrorCode(error: NutErrorCode): string {
  return error.kind === "known" ? ERROR_DESCRIPTIONS[error.code] : "unrecognized server error";
}
