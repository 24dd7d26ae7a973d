import { createRequire } from "node:module";
import type { DestinationStream } from "pino";
import { z } from "zod";
import type { TransportFactory } from "@upsctl/driver-core";
import { tcpLineTransportFactory } from "@upsctl/driver-tcp-line";
import { INSTANT_COMMAND_NAMES } from "@upsctl/schemas";
import { createLogger, withNutSession } from "@upsctl/nut-client";
import { USAGE_TEXT, parseCli, type CliOptions } from "./cli";
import { loadCliDefaults } from "./config";
import { UsageError } from "./errors";
import { readUsage } from "./usage";

const require = createRequire(import.meta.url);
const PackageJsonSchema = z.object({ version: z.string() });

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export interface MainDependencies {
  env?: NodeJS.ProcessEnv;
  transportFactory?: TransportFactory;
  logDestination?: DestinationStream;
}

const processIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`)
};

export function readVersion(): string {
  return PackageJsonSchema.parse(require("../package.json")).version;
}

async function run(options: CliOptions, io: CliIo, deps: MainDependencies): Promise<void> {
  const logger = createLogger({ name: "upsctl", level: options.logLevel, destination: deps.logDestination });
  const { host, port, timeoutMs, debug, ups, credentials, command } = options;

  await withNutSession(
    { host, port, timeoutMs, debug },
    async (client) => {
      if (command.kind === "load") {
        await client.execute(ups, command.command);
        io.stdout(`${INSTANT_COMMAND_NAMES[command.command]}: OK`);
        return;
      }
      await readUsage(client, ups, command.types, io.stdout);
    },
    {
      credentials,
      logger,
      transportFactory: deps.transportFactory ?? tcpLineTransportFactory({ logger })
    }
  );
}

/** Runs one invocation and resolves to the process exit code. */
export async function main(argv: string[], io: CliIo = processIo, deps: MainDependencies = {}): Promise<number> {
  let invocation: ReturnType<typeof parseCli>;
  try {
    invocation = parseCli(argv, loadCliDefaults(deps.env ?? process.env));
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.stderr(`upsctl: ${error.message}`);
    io.stderr(USAGE_TEXT);
    return 2;
  }

  switch (invocation.kind) {
    case "help":
      io.stdout(USAGE_TEXT);
      return 0;
    case "version":
      io.stdout(`upsctl ${readVersion()}`);
      return 0;
    case "run":
      try {
        await run(invocation.options, io, deps);
        return 0;
      } catch (error) {
        io.stderr(`upsctl: ${error instanceof Error ? error.message : String(error)}`);
        return 1;
      }
  }
}
