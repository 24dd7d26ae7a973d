import { describe, expect, it } from "vitest";
import {
  decodeReply,
  decodeVarLine,
  encodeGetVar,
  encodeInstCmd,
  encodePassword,
  formatToken,
  isOkReply,
  redactRequest,
  tokenize
} from "../src/codec";
import { classifyErrorCode, describeErrorCode, isKnownErrorCode } from "../src/error-codes";

describe("command encoding", () => {
  it("sends plain words bare", () => {
    expect(encodeGetVar("myups", "input.voltage")).toBe("GET VAR myups input.voltage");
    expect(encodeInstCmd("myups", "load.off")).toBe("INSTCMD myups load.off");
  });

  it("quotes and escapes arguments that are not plain words", () => {
    expect(formatToken("my secret")).toBe('"my secret"');
    expect(formatToken('pa"ss\\word')).toBe('"pa\\"ss\\\\word"');
    expect(encodePassword("two words")).toBe('PASSWORD "two words"');
  });

  it("redacts the PASSWORD argument only", () => {
    expect(redactRequest('PASSWORD "two words"')).toBe("PASSWORD ***");
    expect(redactRequest("USERNAME admin")).toBe("USERNAME admin");
  });
});

describe("reply decoding", () => {
  it("splits ERR lines into code and detail", () => {
    const reply = decodeReply("ERR VAR-NOT-SUPPORTED no such variable");
    expect(reply).toEqual({
      kind: "ERR",
      line: "ERR VAR-NOT-SUPPORTED no such variable",
      error: { kind: "known", code: "VAR-NOT-SUPPORTED" },
      detail: "no such variable"
    });
  });

  it("keeps unrecognized codes verbatim", () => {
    const reply = decodeReply("ERR SOMETHING-NEW");
    expect(reply).toEqual({
      kind: "ERR",
      line: "ERR SOMETHING-NEW",
      error: { kind: "unknown", code: "SOMETHING-NEW" },
      detail: undefined
    });
  });

  it("classifies everything else as data with tokens", () => {
    const reply = decodeReply('VAR myups ups.status "OL CHRG"');
    expect(reply).toEqual({
      kind: "DATA",
      line: 'VAR myups ups.status "OL CHRG"',
      verb: "VAR",
      tokens: ["VAR", "myups", "ups.status", "OL CHRG"]
    });
    expect(isOkReply(reply)).toBe(false);
    expect(isOkReply(decodeReply("OK"))).toBe(true);
    expect(isOkReply(decodeReply("OK TRACKING 1bd31808-cb49-4aec-9d75-d056e6f018d2"))).toBe(true);
  });

  it("does not mistake a verb that starts with ERR for an error", () => {
    expect(decodeReply("ERRATA 1").kind).toBe("DATA");
  });

  it("unescapes quoted tokens", () => {
    expect(tokenize('VAR ups ups.id "say \\"hi\\""')).toEqual(["VAR", "ups", "ups.id", 'say "hi"']);
  });
});

describe("decodeVarLine", () => {
  it("returns the text between the quotes unchanged", () => {
    expect(decodeVarLine('VAR myups input.voltage "230.1"')).toEqual({
      ups: "myups",
      name: "input.voltage",
      value: "230.1"
    });
    expect(decodeVarLine('VAR myups ups.model " Smart-UPS 1500 "')?.value).toBe(" Smart-UPS 1500 ");
    expect(decodeVarLine('VAR myups ups.alarm ""')?.value).toBe("");
  });

  it("rejects lines that are not VAR replies", () => {
    expect(decodeVarLine("OK")).toBeNull();
    expect(decodeVarLine("VAR myups input.voltage 230.1")).toBeNull();
    expect(decodeVarLine('VAR myups "230.1"')).toBeNull();
  });
});

describe("error codes", () => {
  it("recognizes the known set", () => {
    expect(isKnownErrorCode("ACCESS-DENIED")).toBe(true);
    expect(isKnownErrorCode("access-denied")).toBe(false);
    expect(classifyErrorCode("UNKNOWN-UPS")).toEqual({ kind: "known", code: "UNKNOWN-UPS" });
    expect(classifyErrorCode("")).toEqual({ kind: "unknown", code: "" });
  });

  it("describes codes for people", () => {
    expect(describeErrorCode({ kind: "known", code: "DATA-STALE" })).toBe("UPS data is stale");
    expect(describeErrorCode({ kind: "unknown", code: "X" })).toBe("unrecognized server error");
  });
});
