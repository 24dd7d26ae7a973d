/** Bad command line: exit code 2 and the synopsis. */
export class UsageError extends Error {
  override readonly name = "UsageError";
}

export class InvalidReadingError extends Error {
  override readonly name = "InvalidReadingError";

  constructor(
    readonly variable: string,
    readonly raw: string
  ) {
    super(`variable ${variable} is not numeric: ${JSON.stringify(raw)}`);
  }
}
