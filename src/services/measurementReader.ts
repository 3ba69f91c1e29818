import type { Logger } from "pino";
import { decode } from "../devices/decode";
import { DecodeError } from "../devices/errors";
import type { MeasurementReading, MeasurementSpec } from "../devices/types";
import { captureWindow, type RegisterWindow, type WindowCapture } from "./registerWindow";

export class MeasurementReader {
  private readonly logger: Logger;

  constructor(
    readonly spec: MeasurementSpec,
    private readonly window: RegisterWindow,
    logger: Logger,
  ) {
    this.logger = logger.child({ measurement: spec.id });
  }

  /**
   * Polls the window and decodes the fresh snapshot. Resolves to an
   * unavailable reading instead of rejecting.
   */
  async refresh(): Promise<MeasurementReading> {
    try {
      await this.window.poll();
    } catch (err) {
      this.logger.warn({ err }, "Register window poll rejected");
      return this.unavailable(new Date());
    }
    return this.read(captureWindow(this.window));
  }

  read(capture: WindowCapture): MeasurementReading {
    if (!capture.available) {
      return this.unavailable(capture.capturedAt);
    }
    try {
      const value = decode(this.spec, capture.registers);
      const reading: MeasurementReading = { ...this.metadata(capture.capturedAt), available: true, value };
      return Object.freeze(reading);
    } catch (err) {
      if (!(err instanceof DecodeError)) {
        throw err;
      }
      this.logger.warn(
        { err, registers: capture.registers.length },
        "Failed to decode measurement, reporting unavailable",
      );
      return this.unavailable(capture.capturedAt);
    }
  }

  private unavailable(timestamp: Date): MeasurementReading {
    const reading: MeasurementReading = { ...this.metadata(timestamp), available: false, value: null };
    return Object.freeze(reading);
  }

  private metadata(timestamp: Date) {
    return {
      id: this.spec.id,
      unit: this.spec.unit,
      deviceClass: this.spec.deviceClass,
      stateClass: this.spec.stateClass,
      timestamp,
    };
  }
}
