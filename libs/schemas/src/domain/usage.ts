import { z } from "zod";

export const UsageTypeSchema = z.enum(["VOLTAGE_IN", "VOLTAGE_OUT", "CURRENT_OUT", "POWER"]);

export type UsageType = z.infer<typeof UsageTypeSchema>;

const USAGE_ALIASES = new Map<string, UsageType>([
  ["vin", "VOLTAGE_IN"],
  ["volt_in", "VOLTAGE_IN"],
  ["voltage_in", "VOLTAGE_IN"],
  ["vout", "VOLTAGE_OUT"],
  ["volt_out", "VOLTAGE_OUT"],
  ["voltage_out", "VOLTAGE_OUT"],
  ["cout", "CURRENT_OUT"],
  ["cur_out", "CURRENT_OUT"],
  ["current_out", "CURRENT_OUT"],
  ["pwr", "POWER"],
  ["power", "POWER"]
]);

export const USAGE_TYPE_VALUES = ["voltage_in", "voltage_out", "current_out", "power"] as const;

export const UsageTypeArgSchema = z
  .string()
  .transform((value, ctx) => {
    const usageType = USAGE_ALIASES.get(value);
    if (!usageType) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid usage type value "${value}". Allowed values: ${USAGE_TYPE_VALUES.join(", ")}`
      });
      return z.NEVER;
    }
    return usageType;
  });
