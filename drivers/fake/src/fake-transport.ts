import {
  TimeoutError,
  TransportIOError,
  createTransportMetrics,
  type LineTransport,
  type TransportConfig,
  type TransportStatus
} from "@upsctl/driver-core";

/** Returns the reply line(s) for a line sent, or nothing to leave the reader waiting. */
export type FakeResponder = (line: string) => string | string[] | undefined;

export interface FakeTransportOptions {
  respond?: FakeResponder;
  connectError?: Error;
}

/**
 * In-memory transport that answers from a responder function. Records every
 * line sent and every close, and times reads out after `timeoutMs` like the
 * TCP transport does.
 */
export class FakeTransport implements LineTransport {
  readonly sent: string[] = [];
  closeCalls = 0;
  private state: TransportStatus["state"] = "DISCONNECTED";
  private readonly metrics = createTransportMetrics();
  private readonly inbox: string[] = [];
  private pendingRead: { reject: (error: Error) => void; timer: NodeJS.Timeout } | null = null;

  constructor(
    readonly cfg: TransportConfig,
    private readonly options: FakeTransportOptions = {}
  ) {}

  async connect(): Promise<void> {
    if (this.options.connectError) {
      this.state = "CLOSED";
      throw this.options.connectError;
    }
    this.state = "CONNECTED";
  }

  async sendLine(text: string): Promise<void> {
    if (this.state !== "CONNECTED") {
      throw new TransportIOError("send", "not connected");
    }
    this.sent.push(text);
    this.metrics.linesSent += 1;
    const reply = this.options.respond?.(text);
    if (reply === undefined) return;
    this.inbox.push(...(Array.isArray(reply) ? reply : [reply]));
  }

  async readLine(): Promise<string> {
    if (this.state !== "CONNECTED") {
      throw new TransportIOError("read", "not connected");
    }
    const line = this.inbox.shift();
    if (line !== undefined) {
      this.metrics.linesReceived += 1;
      return line;
    }
    if (this.pendingRead) {
      throw new TransportIOError("read", "another read is already pending");
    }
    const { timeoutMs } = this.cfg;
    return await new Promise<string>((_resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingRead = null;
        reject(new TimeoutError("read", timeoutMs));
      }, timeoutMs);
      this.pendingRead = { reject, timer };
    });
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
    const pending = this.pendingRead;
    if (pending) {
      this.pendingRead = null;
      clearTimeout(pending.timer);
      pending.reject(new TransportIOError("read", "transport closed"));
    }
    if (this.state === "CONNECTED") {
      this.metrics.closes += 1;
    }
    this.state = "CLOSED";
  }

  getStatus(): TransportStatus {
    return { state: this.state, metrics: { ...this.metrics } };
  }
}

/** Answers exact lines from a table; anything else gets `ERR UNKNOWN-COMMAND`. */
export function scriptedResponder(replies: Record<string, string | string[]>): FakeResponder {
  const table = new Map(Object.entries(replies));
  return (line) => table.get(line) ?? "ERR UNKNOWN-COMMAND";
}
