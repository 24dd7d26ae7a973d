import { classifyErrorCode, type NutErrorCode } from "./error-codes";

export type NutReply =
  | { kind: "DATA"; line: string; verb: string; tokens: string[] }
  | { kind: "ERR"; line: string; error: NutErrorCode; detail?: string };

export interface VarLine {
  ups: string;
  name: string;
  value: string;
}

const BARE_TOKEN = /^[A-Za-z0-9_.:-]+$/;
const TOKEN_PATTERN = /"((?:[^"\\]|\\.)*)"|(\S+)/g;
const VAR_LINE = /^VAR (\S+) (\S+) "(.*)"$/;

/** Quotes a command argument unless it is a plain word. */
export function formatToken(value: string): string {
  if (BARE_TOKEN.test(value)) {
    return value;
  }
  return `"${value.replace(/(["\\])/g, "\\$1")}"`;
}

export function encodeUsername(username: string): string {
  return `USERNAME ${formatToken(username)}`;
}

export function encodePassword(password: string): string {
  return `PASSWORD ${formatToken(password)}`;
}

export function encodeLogin(ups: string): string {
  return `LOGIN ${formatToken(ups)}`;
}

export function encodeGetVar(ups: string, name: string): string {
  return `GET VAR ${formatToken(ups)} ${formatToken(name)}`;
}

export function encodeInstCmd(ups: string, command: string): string {
  return `INSTCMD ${formatToken(ups)} ${formatToken(command)}`;
}

/** Hides the secret of a PASSWORD line so it can be logged or put in an error. */
export function redactRequest(line: string): string {
  return line.startsWith("PASSWORD ") ? "PASSWORD ***" : line;
}

export function tokenize(line: string): string[] {
  const tokens: string[] = [];
  for (const match of line.matchAll(TOKEN_PATTERN)) {
    const quoted = match[1];
    tokens.push(quoted !== undefined ? quoted.replace(/\\(.)/g, "$1") : match[2]);
  }
  return tokens;
}

export function decodeReply(line: string): NutReply {
  if (line === "ERR" || line.startsWith("ERR ")) {
    const rest = line.slice(3).trim();
    const spaceIndex = rest.indexOf(" ");
    const code = spaceIndex < 0 ? rest : rest.slice(0, spaceIndex);
    const detail = spaceIndex < 0 ? undefined : rest.slice(spaceIndex + 1).trim() || undefined;
    return { kind: "ERR", line, error: classifyErrorCode(code), detail };
  }
  const tokens = tokenize(line);
  return { kind: "DATA", line, verb: tokens[0] ?? "", tokens };
}

export function isOkReply(reply: NutReply): boolean {
  return reply.kind === "DATA" && reply.verb === "OK";
}

/** Parses `VAR <ups> <name> "<value>"`; the value is returned exactly as it appears between the quotes. */
export function decodeVarLine(line: string): VarLine | null {
  const match = VAR_LINE.exec(line);
  if (!match) {
    return null;
  }
  return { ups: match[1], name: match[2], value: match[3] };
}
