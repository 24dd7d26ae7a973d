import type { Endpoint } from "@upsctl/schemas";

export type TransportConfig = Endpoint;

export interface TransportMetrics {
  linesSent: number;
  linesReceived: number;
  closes: number;
  lastError?: string;
  lastLineAt?: string;
}

export interface TransportStatus {
  state: "DISCONNECTED" | "CONNECTING" | "CONNECTED" | "CLOSED";
  metrics: TransportMetrics;
}

/**
 * One line-delimited text stream to a server. Strictly request/response:
 * callers send a line and read its reply before sending the next one.
 */
export interface LineTransport {
  connect(): Promise<void>;
  sendLine(text: string): Promise<void>;
  readLine(): Promise<string>;
  /** Idempotent. Never rejects. */
  close(): Promise<void>;
  getStatus(): TransportStatus;
}

export type TransportFactory = (cfg: TransportConfig) => LineTransport;

export function createTransportMetrics(): TransportMetrics {
  return { linesSent: 0, linesReceived: 0, closes: 0 };
}
