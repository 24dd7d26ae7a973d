import { z } from "zod";
import { NonEmptyStringSchema, PortSchema, TimeoutMsSchema } from "../common/scalars";

export const DEFAULT_NUT_PORT = 3493;
export const DEFAULT_TIMEOUT_MS = 5000;

export const EndpointSchema = z.object({
  host: NonEmptyStringSchema,
  port: PortSchema.default(DEFAULT_NUT_PORT),
  timeoutMs: TimeoutMsSchema.default(DEFAULT_TIMEOUT_MS)
});

export type Endpoint = z.infer<typeof EndpointSchema>;
export type EndpointInput = z.input<typeof EndpointSchema>;

export const CredentialsSchema = z.object({
  username: NonEmptyStringSchema,
  // Sent quoted when it contains spaces, so only line breaks are refused.
  password: z
    .string()
    .min(1)
    .regex(/^[^\r\n]+$/, "must not contain line breaks")
    .optional()
});

export type Credentials = z.infer<typeof CredentialsSchema>;
