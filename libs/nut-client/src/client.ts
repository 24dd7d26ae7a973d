import type { LineTransport, TransportFactory } from "@upsctl/driver-core";
import { createTcpLineTransport } from "@upsctl/driver-tcp-line";
import {
  CommandRequestSchema,
  CredentialsSchema,
  INSTANT_COMMAND_NAMES,
  UpsNameSchema,
  VariableRefSchema,
  type Credentials,
  type LoadCommand
} from "@upsctl/schemas";
import {
  decodeReply,
  decodeVarLine,
  encodeGetVar,
  encodeInstCmd,
  encodeLogin,
  encodePassword,
  encodeUsername,
  isOkReply,
  redactRequest,
  type NutReply
} from "./codec";
import { NutClientConfigSchema, type NutClientConfig, type NutClientConfigInput } from "./config";
import {
  AuthenticationError,
  ClientStateError,
  ProtocolError,
  UnexpectedResponseError,
  type AuthenticationStep
} from "./errors";
import { createSilentLogger, type Logger } from "./logger";

export type ClientState = "DISCONNECTED" | "CONNECTED" | "AUTHENTICATED" | "FAILED" | "CLOSED";

export interface NutClientDependencies {
  transportFactory?: TransportFactory;
  logger?: Logger;
}

export interface AuthenticateOptions {
  /** Also send `LOGIN <ups>` to attach to the UPS as a client. */
  login?: string;
}

/**
 * Speaks the NUT line protocol over one connection, one request at a time.
 *
 * Timeouts, I/O failures, rejected credentials and replies that do not match
 * their request leave the client FAILED with the connection already closed.
 * An `ERR` reply to GET VAR or INSTCMD is returned as a {@link ProtocolError}
 * and the connection stays usable.
 */
export class NutClient {
  private readonly config: NutClientConfig;
  private readonly transportFactory: TransportFactory;
  private readonly logger: Logger;
  private transport: LineTransport | null = null;
  private currentState: ClientState = "DISCONNECTED";

  constructor(config: NutClientConfigInput, deps: NutClientDependencies = {}) {
    this.config = NutClientConfigSchema.parse(config);
    this.transportFactory = deps.transportFactory ?? createTcpLineTransport;
    this.logger = deps.logger ?? createSilentLogger();
  }

  get state(): ClientState {
    return this.currentState;
  }

  async connect(): Promise<void> {
    if (this.currentState !== "DISCONNECTED") {
      throw new ClientStateError("connect", this.currentState);
    }
    const { host, port, timeoutMs } = this.config;
    const transport = this.transportFactory({ host, port, timeoutMs });
    this.transport = transport;
    try {
      await transport.connect();
    } catch (error) {
      await this.fail(error);
      throw error;
    }
    this.currentState = "CONNECTED";
    this.logger.debug({ host, port }, "nut-client: connected");
  }

  async authenticate(credentials: Credentials, options: AuthenticateOptions = {}): Promise<void> {
    const transport = this.requireTransport("authenticate", ["CONNECTED"]);
    const { username, password } = CredentialsSchema.parse(credentials);
    const login = options.login === undefined ? undefined : UpsNameSchema.parse(options.login);

    await this.guard(async () => {
      await this.expectOk(transport, "USERNAME", encodeUsername(username));
      if (password !== undefined) {
        await this.expectOk(transport, "PASSWORD", encodePassword(password));
      }
      if (login !== undefined) {
        await this.expectOk(transport, "LOGIN", encodeLogin(login));
      }
    });
    this.currentState = "AUTHENTICATED";
    this.logger.debug({ username }, "nut-client: authenticated");
  }

  /** Returns the raw value of `GET VAR <ups> <name>`. */
  async getVar(ups: string, name: string): Promise<string> {
    const transport = this.requireTransport("get a variable", ["CONNECTED", "AUTHENTICATED"]);
    const ref = VariableRefSchema.parse({ ups, name });
    const request = encodeGetVar(ref.ups, ref.name);

    return await this.guard(async () => {
      const reply = await this.exchange(transport, request);
      if (reply.kind === "ERR") {
        throw new ProtocolError(request, reply.error, reply.detail);
      }
      const decoded = decodeVarLine(reply.line);
      if (!decoded || decoded.ups !== ref.ups || decoded.name !== ref.name) {
        throw new UnexpectedResponseError(request, reply.line);
      }
      return decoded.value;
    });
  }

  /** Reads variables one after another, stopping at the first failure. */
  async getVars(ups: string, names: readonly string[]): Promise<Record<string, string>> {
    const values: Record<string, string> = {};
    for (const name of names) {
      values[name] = await this.getVar(ups, name);
    }
    return values;
  }

  /** Sends `INSTCMD` for one of the load commands. */
  async execute(ups: string, command: LoadCommand): Promise<void> {
    const transport = this.requireTransport("run a command", ["CONNECTED", "AUTHENTICATED"]);
    const parsed = CommandRequestSchema.parse({ ups, command });
    const request = encodeInstCmd(parsed.ups, INSTANT_COMMAND_NAMES[parsed.command]);

    await this.guard(async () => {
      const reply = await this.exchange(transport, request);
      if (reply.kind === "ERR") {
        throw new ProtocolError(request, reply.error, reply.detail);
      }
      if (!isOkReply(reply)) {
        throw new UnexpectedResponseError(request, reply.line);
      }
    });
    this.logger.info({ ups: parsed.ups, command: INSTANT_COMMAND_NAMES[parsed.command] }, "nut-client: command accepted");
  }

  /** Always succeeds; errors from closing the connection are logged. */
  async disconnect(): Promise<void> {
    if (this.currentState !== "FAILED") {
      this.currentState = "CLOSED";
    }
    await this.release();
  }

  private async expectOk(transport: LineTransport, step: AuthenticationStep, request: string): Promise<void> {
    const reply = await this.exchange(transport, request);
    if (reply.kind === "ERR") {
      throw new AuthenticationError(step, reply.error, reply.detail);
    }
    if (!isOkReply(reply)) {
      throw new UnexpectedResponseError(redactRequest(request), reply.line);
    }
  }

  private async exchange(transport: LineTransport, request: string): Promise<NutReply> {
    this.trace("send", redactRequest(request));
    await transport.sendLine(request);
    const line = await transport.readLine();
    this.trace("receive", line);
    return decodeReply(line);
  }

  /** Runs one request; anything but a ProtocolError fails the client and closes the connection. */
  private async guard<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (!(error instanceof ProtocolError)) {
        await this.fail(error);
      }
      throw error;
    }
  }

  private async fail(error: unknown): Promise<void> {
    this.currentState = "FAILED";
    this.logger.debug({ err: error }, "nut-client: connection failed");
    await this.release();
  }

  private async release(): Promise<void> {
    const transport = this.transport;
    this.transport = null;
    if (!transport) {
      return;
    }
    try {
      await transport.close();
    } catch (error) {
      this.logger.warn({ err: error }, "nut-client: error while closing the connection");
    }
  }

  private requireTransport(operation: string, allowed: ClientState[]): LineTransport {
    if (!allowed.includes(this.currentState) || !this.transport) {
      throw new ClientStateError(operation, this.currentState);
    }
    return this.transport;
  }

  private trace(direction: "send" | "receive", line: string): void {
    if (this.config.debug) {
      this.logger.debug({ direction, line }, "nut-client: traffic");
    }
  }
}
