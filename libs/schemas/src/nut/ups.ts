import { z } from "zod";
import { NutTokenSchema } from "../common/scalars";

export const UpsNameSchema = NutTokenSchema;
export const VariableNameSchema = NutTokenSchema.regex(
  /^[a-z0-9_]+(\.[a-z0-9_]+)*$/i,
  "must be a dotted NUT variable name"
);

export const VariableRefSchema = z.object({
  ups: UpsNameSchema,
  name: VariableNameSchema
});

export type VariableRef = z.infer<typeof VariableRefSchema>;

export const TELEMETRY_VARIABLES = {
  inputVoltage: "input.voltage",
  outputVoltage: "output.voltage",
  outputCurrent: "output.current"
} as const;

export const LoadCommandSchema = z.enum(["LOAD_ON", "LOAD_OFF"]);

export type LoadCommand = z.infer<typeof LoadCommandSchema>;

export const INSTANT_COMMAND_NAMES: Record<LoadCommand, string> = {
  LOAD_ON: "load.on",
  LOAD_OFF: "load.off"
};

export const CommandRequestSchema = z.object({
  ups: UpsNameSchema,
  command: LoadCommandSchema
});

export type CommandRequest = z.infer<typeof CommandRequestSchema>;
