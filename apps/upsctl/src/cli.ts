import { parseArgs } from "node:util";
import { z } from "zod";
import {
  NonEmptyStringSchema,
  PortSchema,
  TimeoutMsSchema,
  UpsNameSchema,
  UsageTypeArgSchema,
  type Credentials,
  type LoadCommand,
  type UsageType
} from "@upsctl/schemas";
import type { CliDefaults, LogLevel } from "./config";
import { UsageError } from "./errors";

export const USAGE_TEXT = `Usage: upsctl --server <host> --port <port> --ups-name <ups> [options] <command>

Commands:
  load-off                 Turn load off on UPS
  load-on                  Turn load on on UPS
  usage <type>...          Fetch usage data
                           (types: voltage_in, voltage_out, current_out, power)

Options:
  -s, --server <host>      NUT UPS server host name        [env: NUT_HOST]
  -p, --port <port>        NUT UPS server TCP port         [env: NUT_PORT, default 3493]
  -u, --ups-name <ups>     Name of the UPS                 [env: NUT_UPS]
  -n, --username <name>    NUT user allowed to run INSTCMD [env: NUT_USERNAME]
  -w, --password <secret>  NUT user password               [env: NUT_PASSWORD]
  -t, --timeout <ms>       Connect/read/write timeout      [env: NUT_TIMEOUT_MS, default 5000]
  -d, --debug              Log network traffic to stderr
  -h, --help               Print help
  -V, --version            Print version`;

export type CliCommand =
  | { kind: "load"; command: LoadCommand }
  | { kind: "usage"; types: UsageType[] };

export interface CliOptions {
  host: string;
  port: number;
  ups: string;
  timeoutMs: number;
  credentials?: Credentials;
  debug: boolean;
  logLevel: LogLevel;
  command: CliCommand;
}

export type CliInvocation = { kind: "help" } | { kind: "version" } | { kind: "run"; options: CliOptions };

const FLAG_NAMES: Record<string, string> = {
  host: "--server",
  port: "--port",
  ups: "--ups-name",
  timeoutMs: "--timeout",
  username: "--username"
};

const TargetSchema = z.object({
  host: NonEmptyStringSchema,
  port: z.coerce.number().pipe(PortSchema),
  ups: UpsNameSchema,
  timeoutMs: z.coerce.number().pipe(TimeoutMsSchema)
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const key = String(issue.path[0] ?? "");
      const flag = FLAG_NAMES[key] ?? key;
      return issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined"
        ? `${flag} is required`
        : `${flag}: ${issue.message}`;
    })
    .join("; ");
}

function parseCommand(positionals: string[]): CliCommand {
  const name: string | undefined = positionals[0];
  const rest = positionals.slice(1);
  switch (name) {
    case "load-on":
    case "load-off":
      if (rest.length > 0) {
        throw new UsageError(`${name} takes no arguments`);
      }
      return { kind: "load", command: name === "load-on" ? "LOAD_ON" : "LOAD_OFF" };
    case "usage": {
      if (rest.length === 0) {
        throw new UsageError("usage needs at least one type");
      }
      const types = rest.map((value) => {
        const parsed = UsageTypeArgSchema.safeParse(value);
        if (!parsed.success) {
          throw new UsageError(parsed.error.issues.map((issue) => issue.message).join("; "));
        }
        return parsed.data;
      });
      return { kind: "usage", types };
    }
    case undefined:
      throw new UsageError("a command is required");
    default:
      throw new UsageError(`unknown command "${name}"`);
  }
}

export function parseCli(argv: string[], defaults: CliDefaults): CliInvocation {
  let parsed: ReturnType<typeof parseWithFlags>;
  try {
    parsed = parseWithFlags(argv);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
  const { values, positionals } = parsed;

  if (values.help) return { kind: "help" };
  if (values.version) return { kind: "version" };

  const command = parseCommand(positionals);
  const target = TargetSchema.safeParse({
    host: values.server ?? defaults.host,
    port: values.port ?? defaults.port,
    ups: values["ups-name"] ?? defaults.ups,
    timeoutMs: values.timeout ?? defaults.timeoutMs
  });
  if (!target.success) {
    throw new UsageError(describeIssues(target.error));
  }

  const username = values.username ?? defaults.username;
  const password = values.password ?? defaults.password;
  if (password !== undefined && username === undefined) {
    throw new UsageError("--password needs --username");
  }

  const debug = values.debug ?? false;
  return {
    kind: "run",
    options: {
      ...target.data,
      credentials: username === undefined ? undefined : { username, password },
      debug,
      logLevel: debug ? "debug" : defaults.logLevel,
      command
    }
  };
}

function parseWithFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      server: { type: "string", short: "s" },
      port: { type: "string", short: "p" },
      "ups-name": { type: "string", short: "u" },
      username: { type: "string", short: "n" },
      password: { type: "string", short: "w" },
      timeout: { type: "string", short: "t" },
      debug: { type: "boolean", short: "d" },
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "V" }
    }
  });
}
