import net from "node:net";
import pino, { type Logger } from "pino";
import {
  ConnectionError,
  TimeoutError,
  TransportIOError,
  createTransportMetrics,
  toError,
  type LineTransport,
  type TransportOperation,
  type TransportStatus
} from "@upsctl/driver-core";
import {
  TcpLineTransportConfigSchema,
  type TcpLineTransportConfig,
  type TcpLineTransportConfigInput
} from "./config";
import { LineFramer, isSingleLine } from "./framer";

interface PendingRead {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export interface TcpLineTransportOptions {
  logger?: Logger;
}

export class TcpLineTransport implements LineTransport {
  private readonly config: TcpLineTransportConfig;
  private readonly logger: Logger;
  private readonly framer = new LineFramer();
  private readonly metrics = createTransportMetrics();
  private state: TransportStatus["state"] = "DISCONNECTED";
  private socket: net.Socket | null = null;
  private queuedLines: string[] = [];
  private pendingRead: PendingRead | null = null;
  // Set once the stream can no longer deliver lines.
  private endedReason: string | null = null;

  constructor(cfg: TcpLineTransportConfigInput, options: TcpLineTransportOptions = {}) {
    this.config = TcpLineTransportConfigSchema.parse(cfg);
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  async connect(): Promise<void> {
    if (this.state !== "DISCONNECTED") {
      throw new Error(`connect() called in state ${this.state}`);
    }
    const { host, port, timeoutMs } = this.config;
    this.state = "CONNECTING";

    const socket = net.createConnection({ host, port });
    socket.setEncoding("utf8");
    socket.setNoDelay(true);
    this.socket = socket;
    this.attachSocketHandlers(socket);

    try {
      await new Promise<void>((resolve, reject) => {
        const cleanup = (): void => {
          clearTimeout(timer);
          socket.off("connect", onConnect);
          socket.off("error", onError);
        };
        const onConnect = (): void => {
          cleanup();
          resolve();
        };
        const onError = (error: Error): void => {
          cleanup();
          reject(new ConnectionError(host, port, { cause: error }));
        };
        const timer = setTimeout(() => {
          cleanup();
          reject(new TimeoutError("connect", timeoutMs));
        }, timeoutMs);
        socket.once("connect", onConnect);
        socket.once("error", onError);
      });
    } catch (error) {
      this.metrics.lastError = toError(error).message;
      this.release(socket, { destroy: true });
      this.logger.debug({ host, port, err: error }, "tcp-line: connect failed");
      throw error;
    }

    this.state = "CONNECTED";
    this.logger.debug({ host, port }, "tcp-line: connected");
  }

  async sendLine(text: string): Promise<void> {
    if (!isSingleLine(text)) {
      throw new TransportIOError("send", "line must not contain line breaks");
    }
    const socket = this.requireOpen("send");
    const { timeoutMs } = this.config;

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new TimeoutError("send", timeoutMs));
      }, timeoutMs);
      socket.write(`${text}\n`, (error?: Error | null) => {
        clearTimeout(timer);
        if (error) {
          reject(new TransportIOError("send", error.message, { cause: error }));
          return;
        }
        resolve();
      });
    });
    this.metrics.linesSent += 1;
  }

  async readLine(): Promise<string> {
    const queued = this.queuedLines.shift();
    if (queued !== undefined) {
      return queued;
    }
    if (this.pendingRead) {
      throw new TransportIOError("read", "another read is already pending");
    }
    this.requireOpen("read");
    const { timeoutMs } = this.config;

    return await new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingRead = null;
        reject(new TimeoutError("read", timeoutMs));
      }, timeoutMs);
      this.pendingRead = { resolve, reject, timer };
    });
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (this.state === "CLOSED" || !socket) {
      this.state = "CLOSED";
      return;
    }
    this.markEnded("transport closed");
    this.release(socket, { destroy: false });
    if (socket.destroyed) {
      return;
    }

    socket.end();
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        socket.destroy();
        resolve();
      }, this.config.closeGraceMs);
      socket.once("close", () => {
        clearTimeout(timer);
        resolve();
      });
    });
    this.logger.debug({ host: this.config.host, port: this.config.port }, "tcp-line: closed");
  }

  getStatus(): TransportStatus {
    return { state: this.state, metrics: { ...this.metrics } };
  }

  private attachSocketHandlers(socket: net.Socket): void {
    socket.on("data", (chunk: string | Buffer) => {
      for (const line of this.framer.push(String(chunk))) {
        this.deliver(line);
      }
    });

    socket.on("error", (error: Error) => {
      this.metrics.lastError = error.message;
      this.markEnded(error.message, error);
      if (this.state === "CONNECTED") {
        this.logger.warn({ err: error }, "tcp-line: socket error");
      }
    });

    socket.on("close", () => {
      this.markEnded("connection closed by server");
    });
  }

  private deliver(line: string): void {
    this.metrics.linesReceived += 1;
    this.metrics.lastLineAt = new Date().toISOString();
    const pending = this.pendingRead;
    if (!pending) {
      this.queuedLines.push(line);
      return;
    }
    this.pendingRead = null;
    clearTimeout(pending.timer);
    pending.resolve(line);
  }

  private markEnded(reason: string, cause?: Error): void {
    if (this.endedReason !== null) {
      return;
    }
    this.endedReason = reason;
    const pending = this.pendingRead;
    if (pending) {
      this.pendingRead = null;
      clearTimeout(pending.timer);
      pending.reject(new TransportIOError("read", reason, { cause }));
    }
  }

  private requireOpen(operation: Exclude<TransportOperation, "connect">): net.Socket {
    if (this.endedReason !== null) {
      throw new TransportIOError(operation, this.endedReason);
    }
    if (this.state !== "CONNECTED" || !this.socket) {
      throw new TransportIOError(operation, "not connected");
    }
    return this.socket;
  }

  private release(socket: net.Socket, options: { destroy: boolean }): void {
    this.socket = null;
    this.state = "CLOSED";
    this.queuedLines = [];
    this.framer.reset();
    this.metrics.closes += 1;
    if (options.destroy && !socket.destroyed) {
      socket.destroy();
    }
  }
}
