import { describe, expect, it } from "vitest";
import { TimeoutError, TransportIOError } from "@upsctl/driver-core";
import { FakeTransport, scriptedResponder } from "../src/fake-transport";
import { createFakeTransportFactory } from "../src";

const cfg = { host: "nut.test", port: 3493, timeoutMs: 50 };

describe("FakeTransport", () => {
  it("answers sent lines from the script in order", async () => {
    const transport = new FakeTransport(cfg, {
      respond: scriptedResponder({ "USERNAME admin": "OK", VER: ["Network UPS Tools upsd 2.8.0", "OK"] })
    });
    await transport.connect();
    await transport.sendLine("USERNAME admin");
    await transport.sendLine("VER");

    expect(await transport.readLine()).toBe("OK");
    expect(await transport.readLine()).toBe("Network UPS Tools upsd 2.8.0");
    expect(await transport.readLine()).toBe("OK");
    expect(transport.sent).toEqual(["USERNAME admin", "VER"]);
  });

  it("replies ERR UNKNOWN-COMMAND to unscripted lines", async () => {
    const transport = new FakeTransport(cfg, { respond: scriptedResponder({}) });
    await transport.connect();
    await transport.sendLine("LIST UPS");
    expect(await transport.readLine()).toBe("ERR UNKNOWN-COMMAND");
  });

  it("times reads out when nothing is queued", async () => {
    const transport = new FakeTransport(cfg);
    await transport.connect();
    await transport.sendLine("GET VAR myups input.voltage");
    await expect(transport.readLine()).rejects.toBeInstanceOf(TimeoutError);
  });

  it("rejects a waiting read when closed", async () => {
    const transport = new FakeTransport({ ...cfg, timeoutMs: 5000 });
    await transport.connect();
    const read = transport.readLine().catch((err: unknown) => err);

    await transport.close();

    const error = await read;
    expect(error).toBeInstanceOf(TransportIOError);
    expect(error).toMatchObject({ operation: "read", message: "read failed: transport closed" });
  });

  it("counts one release however often close is called", async () => {
    const transport = new FakeTransport(cfg);
    await transport.connect();
    await transport.close();
    await transport.close();
    expect(transport.closeCalls).toBe(2);
    expect(transport.getStatus().metrics.closes).toBe(1);
    await expect(transport.sendLine("VER")).rejects.toBeInstanceOf(TransportIOError);
  });

  it("keeps every transport the factory creates", () => {
    const { factory, instances } = createFakeTransportFactory();
    const first = factory(cfg);
    const second = factory(cfg);
    expect(instances).toHaveLength(2);
    expect(instances[0]).toBe(first);
    expect(instances[1]).toBe(second);
  });
});
