import type { Credentials } from "@upsctl/schemas";
import { NutClient, type NutClientDependencies } from "./client";
import type { NutClientConfigInput } from "./config";

export interface NutSessionOptions extends NutClientDependencies {
  credentials?: Credentials;
  /** UPS to attach to with LOGIN after authenticating. */
  login?: string;
}

/**
 * Connects, authenticates when credentials are given, runs `work` and
 * disconnects on every path out.
 */
export async function withNutSession<T>(
  config: NutClientConfigInput,
  work: (client: NutClient) => Promise<T>,
  options: NutSessionOptions = {}
): Promise<T> {
  const { credentials, login, ...deps } = options;
  const client = new NutClient(config, deps);
  try {
    await client.connect();
    if (credentials) {
      await client.authenticate(credentials, { login });
    }
    return await work(client);
  } finally {
    await client.disconnect();
  }
}
