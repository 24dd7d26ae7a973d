import { z } from "zod";
import { EndpointSchema } from "@upsctl/schemas";

export const NutClientConfigSchema = EndpointSchema.extend({
  /** Log every protocol line sent and received at debug level. */
  debug: z.boolean().default(false)
});

export type NutClientConfig = z.infer<typeof NutClientConfigSchema>;
export type NutClientConfigInput = z.input<typeof NutClientConfigSchema>;
