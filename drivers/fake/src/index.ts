import type { TransportFactory } from "@upsctl/driver-core";
import { FakeTransport, type FakeTransportOptions } from "./fake-transport";

export { FakeTransport, scriptedResponder, type FakeResponder, type FakeTransportOptions } from "./fake-transport";

export interface FakeTransportFactory {
  factory: TransportFactory;
  instances: FakeTransport[];
}

export function createFakeTransportFactory(options: FakeTransportOptions = {}): FakeTransportFactory {
  const instances: FakeTransport[] = [];
  return {
    instances,
    factory: (cfg) => {
      const transport = new FakeTransport(cfg, options);
      instances.push(transport);
      return transport;
    }
  };
}

export default createFakeTransportFactory;
