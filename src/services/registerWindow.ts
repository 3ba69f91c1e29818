import type { Logger } from "pino";
import type { RegisterKind, RegisterSnapshot } from "../devices/types";
import type { ModbusTcpClient } from "./modbus/ModbusTcpClient";

/**
 * Latest view of one device's registers. `poll()` never rejects for ordinary
 * transport failures; they show up as `available === false`.
 */
export interface RegisterWindow {
  poll(): Promise<void>;
  readonly registers: RegisterSnapshot;
  readonly available: boolean;
}

/** Immutable capture of a window, handed to every reader of one cycle. */
export interface WindowCapture {
  readonly registers: RegisterSnapshot;
  readonly available: boolean;
  readonly capturedAt: Date;
}

export function captureWindow(window: RegisterWindow, at: Date = new Date()): WindowCapture {
  return Object.freeze({
    registers: window.registers,
    available: window.available,
    capturedAt: at,
  });
}

export class PollTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Register poll did not complete within ${timeoutMs} ms`);
    this.name = "PollTimeoutError";
  }
}

export type RegisterSource = Pick<ModbusTcpClient, "connect" | "isConnected" | "read" | "safeDisconnect">;

export interface RegisterRange {
  kind: RegisterKind;
  start: number;
  count: number;
}

const EMPTY_SNAPSHOT: RegisterSnapshot = Object.freeze([]);

function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new PollTimeoutError(timeoutMs)), timeoutMs);
  });
  return Promise.race([work, expiry]).finally(() => clearTimeout(timer));
}

export class ModbusRegisterWindow implements RegisterWindow {
  private snapshot: RegisterSnapshot = EMPTY_SNAPSHOT;
  private isAvailable = false;
  private inflight: Promise<void> | null = null;

  constructor(
    private readonly source: RegisterSource,
    private readonly range: RegisterRange,
    private readonly timeoutMs: number,
    private readonly logger: Logger,
  ) {}

  get registers(): RegisterSnapshot {
    return this.snapshot;
  }

  get available(): boolean {
    return this.isAvailable;
  }

  poll(): Promise<void> {
    // concurrent callers share one round trip
    if (!this.inflight) {
      this.inflight = this.fetch().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async fetch(): Promise<void> {
    const work = this.readRange();
    try {
      const words = await withTimeout(work, this.timeoutMs);
      this.snapshot = Object.freeze([...words]);
      this.isAvailable = true;
      this.logger.trace({ count: words.length }, "Register poll completed");
    } catch (err) {
      if (err instanceof PollTimeoutError) {
        // a late answer to a timed-out read is dropped
        void work.catch((lateErr: unknown) => {
          this.logger.debug({ err: lateErr }, "Abandoned register read failed");
        });
      }
      this.snapshot = EMPTY_SNAPSHOT;
      this.isAvailable = false;
      this.logger.warn({ err, range: this.range }, "Register poll failed, device unavailable");
      await this.source.safeDisconnect().catch((closeErr: unknown) => {
        this.logger.warn({ err: closeErr }, "Failed to drop Modbus connection after poll failure");
      });
    }
  }

  private async readRange(): Promise<number[]> {
    if (!this.source.isConnected()) {
      await this.source.connect();
    }
    return this.source.read(this.range.kind, this.range.start, this.range.count);
  }
}
