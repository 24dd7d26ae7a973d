import type { TransportFactory } from "@upsctl/driver-core";
import { TcpLineTransport, type TcpLineTransportOptions } from "./transport";

export { TcpLineTransport, type TcpLineTransportOptions } from "./transport";
export { LineFramer, isSingleLine } from "./framer";
export * from "./config";

export const createTcpLineTransport: TransportFactory = (cfg) => new TcpLineTransport(cfg);

export function tcpLineTransportFactory(options: TcpLineTransportOptions): TransportFactory {
  return (cfg) => new TcpLineTransport(cfg, options);
}

export default createTcpLineTransport;
