import { z } from "zod";

export const NonEmptyStringSchema = z.string().min(1);
export const PortSchema = z.number().int().min(1).max(65535);
// Node's timers hold at most a signed 32-bit delay.
export const MAX_TIMEOUT_MS = 2_147_483_647;
export const TimeoutMsSchema = z.number().int().positive().max(MAX_TIMEOUT_MS);

// A single protocol token: no whitespace, quotes or control characters.
export const NutTokenSchema = z
  .string()
  .min(1)
  .regex(/^[^\s"\\\u0000-\u001f\u007f]+$/, "must be a single token without whitespace or quotes");
