import type { NutClient } from "@upsctl/nut-client";
import { TELEMETRY_VARIABLES, type UsageType } from "@upsctl/schemas";
import { InvalidReadingError } from "./errors";

const USAGE_VARIABLES: Record<Exclude<UsageType, "POWER">, string> = {
  VOLTAGE_IN: TELEMETRY_VARIABLES.inputVoltage,
  VOLTAGE_OUT: TELEMETRY_VARIABLES.outputVoltage,
  CURRENT_OUT: TELEMETRY_VARIABLES.outputCurrent
};

export function parseReading(variable: string, raw: string): number {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (trimmed === "" || !Number.isFinite(value)) {
    throw new InvalidReadingError(variable, raw);
  }
  return value;
}

export function formatReading(variable: string, value: string): string {
  return `${variable}: ${value}`;
}

export function formatPower(watts: number): string {
  return `power: ${watts.toFixed(2)} W`;
}

/**
 * Reads each requested usage type in order and hands one output line per type
 * to `emit` as `<variable>: <value>`. Power is output voltage times output current.
 */
export async function readUsage(
  client: NutClient,
  ups: string,
  types: readonly UsageType[],
  emit: (line: string) => void
): Promise<void> {
  for (const type of types) {
    if (type === "POWER") {
      const voltage = parseReading(
        TELEMETRY_VARIABLES.outputVoltage,
        await client.getVar(ups, TELEMETRY_VARIABLES.outputVoltage)
      );
      const current = parseReading(
        TELEMETRY_VARIABLES.outputCurrent,
        await client.getVar(ups, TELEMETRY_VARIABLES.outputCurrent)
      );
      emit(formatPower(voltage * current));
      continue;
    }
    const variable = USAGE_VARIABLES[type];
    emit(formatReading(variable, await client.getVar(ups, variable)));
  }
}
