export type RegisterKind = "holding" | "input";

/** One read of a device's registers, index 0 = first word of the read. */
export type RegisterSnapshot = readonly number[];

export type UnitOfMeasurement =
  | "%"
  | "°C"
  | "lx"
  | "ppm"
  | "ppb"
  | "µg/m³"
  | "W"
  | "Wh"
  | "V"
  | "A"
  | "Hz";

export type DeviceClass =
  | "temperature"
  | "humidity"
  | "illuminance"
  | "carbon_dioxide"
  | "pm25"
  | "pm10"
  | "volatile_organic_compounds"
  | "power"
  | "energy"
  | "voltage"
  | "current"
  | "power_factor"
  | "frequency";

// measurement = instantaneous, total = resettable counter, total_increasing = monotonic counter
export type StateClass = "measurement" | "total" | "total_increasing";

export interface WeightedTerm {
  index: number;
  factor: number;
}

export type DecodeRule =
  | { kind: "scale"; index: number; decimals: 0 | 1 | 2 }
  | { kind: "multiply"; index: number; factor: 1 | 10 }
  | { kind: "composite32"; lowIndex: number; highIndex: number }
  | { kind: "weightedSum"; terms: readonly [WeightedTerm, WeightedTerm] };

export interface MeasurementSpec {
  readonly id: string;
  readonly unit: UnitOfMeasurement;
  readonly deviceClass: DeviceClass;
  readonly stateClass: StateClass;
  readonly decode: DecodeRule;
}

export interface DeviceProfile {
  readonly model: string;
  readonly name: string;
  readonly description?: string;
  readonly aliases: readonly string[];
  readonly registers: {
    readonly kind: RegisterKind;
    readonly start: number;
  };
  readonly specs: readonly MeasurementSpec[];
}

interface ReadingBase {
  readonly id: string;
  readonly unit: UnitOfMeasurement;
  readonly deviceClass: DeviceClass;
  readonly stateClass: StateClass;
  readonly timestamp: Date;
}

export type MeasurementReading =
  | (ReadingBase & { readonly available: true; readonly value: number })
  | (ReadingBase & { readonly available: false; readonly value: null });
