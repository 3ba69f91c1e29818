import { UnknownModelError } from "./errors";
import type { DecodeRule, DeviceProfile, MeasurementSpec } from "./types";

function spec(definition: MeasurementSpec): MeasurementSpec {
  const decode: DecodeRule =
    definition.decode.kind === "weightedSum"
      ? Object.freeze({
          kind: "weightedSum",
          terms: Object.freeze([
            Object.freeze({ ...definition.decode.terms[0] }),
            Object.freeze({ ...definition.decode.terms[1] }),
          ] as const),
        })
      : Object.freeze({ ...definition.decode });
  return Object.freeze({ ...definition, decode });
}

function profile(definition: DeviceProfile): DeviceProfile {
  return Object.freeze({
    ...definition,
    aliases: Object.freeze([...definition.aliases]),
    registers: Object.freeze({ ...definition.registers }),
    specs: Object.freeze(definition.specs.map(spec)),
  });
}

export const AQM300 = profile({
  model: "AQM300",
  name: "AQM-300",
  description: "Indoor air-quality monitor (CO2, particulates, TVOC, climate, light) over Modbus TCP",
  aliases: ["AQM"],
  registers: { kind: "input", start: 0 },
  specs: [
    {
      id: "co2",
      unit: "ppm",
      deviceClass: "carbon_dioxide",
      stateClass: "measurement",
      decode: { kind: "multiply", index: 2, factor: 1 },
    },
    {
      id: "pm25",
      unit: "µg/m³",
      deviceClass: "pm25",
      stateClass: "measurement",
      decode: { kind: "multiply", index: 3, factor: 1 },
    },
    {
      id: "pm10",
      unit: "µg/m³",
      deviceClass: "pm10",
      stateClass: "measurement",
      decode: { kind: "multiply", index: 4, factor: 1 },
    },
    {
      id: "tvoc",
      unit: "ppb",
      deviceClass: "volatile_organic_compounds",
      stateClass: "measurement",
      decode: { kind: "multiply", index: 5, factor: 1 },
    },
    {
      id: "humidity",
      unit: "%",
      deviceClass: "humidity",
      stateClass: "measurement",
      decode: { kind: "scale", index: 1, decimals: 1 },
    },
    {
      id: "illuminance",
      unit: "lx",
      deviceClass: "illuminance",
      stateClass: "measurement",
      decode: { kind: "multiply", index: 6, factor: 1 },
    },
    {
      id: "temperature",
      unit: "°C",
      deviceClass: "temperature",
      stateClass: "measurement",
      decode: { kind: "scale", index: 0, decimals: 1 },
    },
  ],
});

// Energy buckets are reported in tens of Wh, except r[16] (current 20 min, Wh)
// and the r[40]/r[41] lifetime counter (Wh, low word first).
export const PMM300 = profile({
  model: "PMM300",
  name: "PMM-300",
  description: "Single-phase power meter with hourly/daily/monthly energy buckets over Modbus TCP",
  aliases: ["PMM"],
  registers: { kind: "input", start: 0 },
  specs: [
    {
      id: "power",
      unit: "W",
      deviceClass: "power",
      stateClass: "measurement",
      decode: { kind: "multiply", index: 2, factor: 1 },
    },
    {
      id: "this_month_energy",
      unit: "Wh",
      deviceClass: "energy",
      stateClass: "total",
      decode: { kind: "multiply", index: 10, factor: 10 },
    },
    {
      id: "this_day_energy",
      unit: "Wh",
      deviceClass: "energy",
      stateClass: "total",
      decode: { kind: "multiply", index: 8, factor: 10 },
    },
    {
      id: "total_energy",
      unit: "Wh",
      deviceClass: "energy",
      stateClass: "total_increasing",
      decode: { kind: "composite32", lowIndex: 40, highIndex: 41 },
    },
    {
      id: "voltage",
      unit: "V",
      deviceClass: "voltage",
      stateClass: "measurement",
      decode: { kind: "scale", index: 0, decimals: 1 },
    },
    {
      id: "current",
      unit: "A",
      deviceClass: "current",
      stateClass: "measurement",
      decode: { kind: "scale", index: 1, decimals: 2 },
    },
    {
      id: "power_factor",
      unit: "%",
      deviceClass: "power_factor",
      stateClass: "measurement",
      decode: { kind: "scale", index: 3, decimals: 1 },
    },
    {
      id: "frequency",
      unit: "Hz",
      deviceClass: "frequency",
      stateClass: "measurement",
      decode: { kind: "scale", index: 4, decimals: 1 },
    },
    {
      // TODO: confirm the bucket*10 + 20-minute-remainder formula against the vendor register map
      id: "this_hour_energy",
      unit: "Wh",
      deviceClass: "energy",
      stateClass: "total",
      decode: {
        kind: "weightedSum",
        terms: [
          { index: 6, factor: 10 },
          { index: 16, factor: 1 },
        ],
      },
    },
    {
      id: "before_hour_energy",
      unit: "Wh",
      deviceClass: "energy",
      stateClass: "total",
      decode: { kind: "multiply", index: 7, factor: 10 },
    },
    {
      id: "yesterday_energy",
      unit: "Wh",
      deviceClass: "energy",
      stateClass: "total",
      decode: { kind: "multiply", index: 9, factor: 10 },
    },
    {
      id: "last_month_energy",
      unit: "Wh",
      deviceClass: "energy",
      stateClass: "total",
      decode: { kind: "multiply", index: 11, factor: 10 },
    },
    {
      id: "two_months_ago_energy",
      unit: "Wh",
      deviceClass: "energy",
      stateClass: "total",
      decode: { kind: "multiply", index: 12, factor: 10 },
    },
    {
      id: "this_month_forecast_energy",
      unit: "Wh",
      deviceClass: "energy",
      stateClass: "total",
      decode: { kind: "multiply", index: 13, factor: 10 },
    },
  ],
});

export const DEVICE_PROFILES: readonly DeviceProfile[] = Object.freeze([AQM300, PMM300]);

export function getProfileByModel(model: string): DeviceProfile | undefined {
  const key = model.trim().toUpperCase();
  return DEVICE_PROFILES.find((p) => p.model === key || p.aliases.includes(key));
}

export function specsFor(model: string): readonly MeasurementSpec[] {
  const found = getProfileByModel(model);
  if (!found) {
    throw new UnknownModelError(model);
  }
  return found.specs;
}
