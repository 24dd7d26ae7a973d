import { describeErrorCode, type NutErrorCode } from "./error-codes";

export { ConnectionError, TimeoutError, TransportIOError } from "@upsctl/driver-core";

export type AuthenticationStep = "USERNAME" | "PASSWORD" | "LOGIN";

function formatCode(error: NutErrorCode, detail: string | undefined): string {
  const extra = detail ? `, ${detail}` : "";
  return `${error.code} (${describeErrorCode(error)}${extra})`;
}

/** The server rejected USERNAME, PASSWORD or LOGIN. Privileged commands cannot proceed. */
export class AuthenticationError extends Error {
  override readonly name = "AuthenticationError";
  readonly code: string;

  constructor(
    readonly step: AuthenticationStep,
    readonly classification: NutErrorCode,
    readonly detail?: string
  ) {
    super(`${step} rejected: ${formatCode(classification, detail)}`);
    this.code = classification.code;
  }
}

/** A recognized `ERR <code>` reply to GET VAR or INSTCMD. The connection stays usable. */
export class ProtocolError extends Error {
  override readonly name = "ProtocolError";
  readonly code: string;

  constructor(
    readonly request: string,
    readonly classification: NutErrorCode,
    readonly detail?: string
  ) {
    super(`${request} failed: ${formatCode(classification, detail)}`);
    this.code = classification.code;
  }
}

/** The reply does not belong to the request sent; request/response pairing can no longer be trusted. */
export class UnexpectedResponseError extends Error {
  override readonly name = "UnexpectedResponseError";

  constructor(
    readonly request: string,
    readonly response: string
  ) {
    super(`unexpected response to ${request}: ${JSON.stringify(response)}`);
  }
}

export class ClientStateError extends Error {
  override readonly name = "ClientStateError";

  constructor(
    readonly operation: string,
    readonly state: string
  ) {
    super(`cannot ${operation} while ${state.toLowerCase()}`);
  }
}
