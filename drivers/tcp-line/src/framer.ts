/**
 * Splits an incoming character stream into lines. Accepts both LF and CRLF
 * terminators; a partial trailing line is kept until its terminator arrives.
 */
export class LineFramer {
  private buffer = "";

  push(chunk: string): string[] {
    this.buffer += chunk;
    const lines: string[] = [];
    let newlineIndex = this.buffer.indexOf("\n");
    while (newlineIndex >= 0) {
      const raw = this.buffer.slice(0, newlineIndex);
      this.buffer = this.buffer.slice(newlineIndex + 1);
      lines.push(raw.endsWith("\r") ? raw.slice(0, -1) : raw);
      newlineIndex = this.buffer.indexOf("\n");
    }
    return lines;
  }

  pending(): string {
    return this.buffer;
  }

  reset(): void {
    this.buffer = "";
  }
}

export function isSingleLine(text: string): boolean {
  return !/[\r\n]/.test(text);
}
