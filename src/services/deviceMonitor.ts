import type { Logger } from "pino";
import type { MeasurementReading, MeasurementSpec } from "../devices/types";
import { MeasurementReader } from "./measurementReader";
import type { ReadingPublisher } from "./mqttService";
import { captureWindow, type RegisterWindow, type WindowCapture } from "./registerWindow";

export interface DeviceDescriptor {
  id: string;
  name: string;
  model: string;
  host: string;
  port: number;
}

export interface DeviceStatus extends DeviceDescriptor {
  available: boolean;
  lastCycleAt: Date | null;
}

/**
 * Polling loop for one physical device: one poll per cycle, the captured
 * snapshot fanned out to every measurement reader.
 */
export class DeviceMonitor {
  private timer: NodeJS.Timeout | null = null;
  private cycle: Promise<readonly MeasurementReading[]> | null = null;
  private latest: readonly MeasurementReading[] = [];
  private lastAvailable = false;
  private lastCycleAt: Date | null = null;
  private readonly readers: readonly MeasurementReader[];
  private readonly logger: Logger;

  constructor(
    readonly device: DeviceDescriptor,
    private readonly window: RegisterWindow,
    specs: readonly MeasurementSpec[],
    private readonly publisher: ReadingPublisher,
    private readonly intervalMs: number,
    logger: Logger,
  ) {
    this.logger = logger.child({ deviceId: device.id });
    this.readers = specs.map((spec) => new MeasurementReader(spec, window, this.logger));
  }

  start(): void {
    if (this.timer) return;
    this.logger.info(
      { model: this.device.model, host: this.device.host, intervalMs: this.intervalMs },
      "Starting device monitor",
    );

    void this.runCycle();
    this.timer = setInterval(() => {
      void this.runCycle();
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.logger.info("Stopped device monitor");
  }

  get readings(): readonly MeasurementReading[] {
    return this.latest;
  }

  status(): DeviceStatus {
    return { ...this.device, available: this.lastAvailable, lastCycleAt: this.lastCycleAt };
  }

  /** Runs one cycle; a tick arriving while the previous cycle is in flight is skipped. */
  async runCycle(): Promise<readonly MeasurementReading[]> {
    if (this.cycle) {
      this.logger.debug("Previous polling cycle still running, skipping tick");
      return this.cycle;
    }
    this.cycle = this.poll().finally(() => {
      this.cycle = null;
    });
    return this.cycle;
  }

  private async poll(): Promise<readonly MeasurementReading[]> {
    let capture: WindowCapture;
    try {
      await this.window.poll();
      capture = captureWindow(this.window);
    } catch (err) {
      this.logger.warn({ err }, "Register window poll rejected");
      capture = Object.freeze({ registers: Object.freeze([]), available: false, capturedAt: new Date() });
    }

    const readings = Object.freeze(this.readers.map((reader) => reader.read(capture)));
    this.latest = readings;
    this.lastAvailable = capture.available;
    this.lastCycleAt = capture.capturedAt;

    this.logger.debug(
      {
        available: capture.available,
        decoded: readings.filter((r) => r.available).length,
        total: readings.length,
      },
      "Polling cycle completed",
    );

    try {
      await this.publisher.publishReadings(this.device.id, capture.available, readings);
    } catch (err) {
      this.logger.error({ err }, "Failed to publish readings");
    }
    return readings;
  }
}
