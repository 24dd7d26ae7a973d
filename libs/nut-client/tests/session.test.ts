import { afterEach, describe, expect, it } from "vitest";
import type { NutClient } from "../src/client";
import { AuthenticationError, ConnectionError, ProtocolError, TimeoutError } from "../src/errors";
import { withNutSession } from "../src/session";
import { startMockNutServer, waitFor, type MockNutServer } from "./support/mock-nut-server";

describe.sequential("withNutSession against a mock NUT server", () => {
  let server: MockNutServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it("reads input voltage", async () => {
    const active = await startMockNutServer({ variables: { "input.voltage": "230.1" } });
    server = active;

    const value = await withNutSession({ host: "127.0.0.1", port: active.port, timeoutMs: 1000 }, (client) =>
      client.getVar("myups", "input.voltage")
    );

    expect(value).toBe("230.1");
    expect(active.received).toEqual(["GET VAR myups input.voltage"]);
    await waitFor(() => active.closedConnections() === 1);
  });

  it("understands a server that terminates lines with CRLF", async () => {
    const active = await startMockNutServer({ variables: { "output.current": "0.8" }, lineEnding: "\r\n" });
    server = active;

    const value = await withNutSession({ host: "127.0.0.1", port: active.port, timeoutMs: 1000 }, (client) =>
      client.getVar("myups", "output.current")
    );
    expect(value).toBe("0.8");
  });

  it("keeps working after a variable is not supported", async () => {
    const active = await startMockNutServer({ variables: { "input.voltage": "231.0" } });
    server = active;

    const results = await withNutSession({ host: "127.0.0.1", port: active.port, timeoutMs: 1000 }, async (client) => {
      const failure = await client.getVar("myups", "bogus.var").catch((err: unknown) => err);
      const value = await client.getVar("myups", "input.voltage");
      return { failure, value };
    });

    expect(results.failure).toBeInstanceOf(ProtocolError);
    expect(results.failure).toMatchObject({ code: "VAR-NOT-SUPPORTED" });
    expect(results.value).toBe("231.0");
    expect(active.connections()).toBe(1);
  });

  it("switches the load off with credentials", async () => {
    const active = await startMockNutServer({ users: { admin: "test-secret" } });
    server = active;

    await withNutSession(
      { host: "127.0.0.1", port: active.port, timeoutMs: 1000 },
      (client) => client.execute("myups", "LOAD_OFF"),
      { credentials: { username: "admin", password: "test-secret" } }
    );

    expect(active.executed).toEqual(["load.off"]);
    expect(active.received).toEqual(["USERNAME admin", "PASSWORD test-secret", "INSTCMD myups load.off"]);
  });

  it("does not send INSTCMD once the password is rejected", async () => {
    const active = await startMockNutServer({ users: { admin: "test-secret" } });
    server = active;

    const error = await withNutSession(
      { host: "127.0.0.1", port: active.port, timeoutMs: 1000 },
      (client) => client.execute("myups", "LOAD_ON"),
      { credentials: { username: "admin", password: "wrong" } }
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toMatchObject({ step: "PASSWORD", code: "INVALID-PASSWORD" });
    expect(active.received).toEqual(["USERNAME admin", "PASSWORD wrong"]);
    expect(active.executed).toEqual([]);
  });

  it("reports ACCESS-DENIED for a load command sent without credentials", async () => {
    const active = await startMockNutServer({ users: { admin: "test-secret" } });
    server = active;

    const error = await withNutSession({ host: "127.0.0.1", port: active.port, timeoutMs: 1000 }, (client) =>
      client.execute("myups", "LOAD_OFF")
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toMatchObject({ code: "ACCESS-DENIED" });
    expect(active.received).toEqual(["INSTCMD myups load.off"]);
  });

  it("times out a silent server and closes the connection once", async () => {
    const active = await startMockNutServer({ silentFor: (line) => line.startsWith("GET VAR") });
    server = active;
    const observed: NutClient[] = [];

    const error = await withNutSession({ host: "127.0.0.1", port: active.port, timeoutMs: 150 }, (client) => {
      observed.push(client);
      return client.getVar("myups", "input.voltage");
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(observed[0]?.state).toBe("FAILED");
    await waitFor(() => active.closedConnections() === 1);
    expect(active.connections()).toBe(1);
  });

  it("surfaces a refused connection", async () => {
    const vacated = await startMockNutServer();
    const { port } = vacated;
    await vacated.close();

    const error = await withNutSession({ host: "127.0.0.1", port, timeoutMs: 1000 }, (client) =>
      client.getVar("myups", "input.voltage")
    ).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConnectionError);
  });
});
