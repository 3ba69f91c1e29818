import mqtt from "mqtt";
import type { MqttClient } from "mqtt";
import type { Logger } from "pino";
import type { AppConfig } from "../config/options";
import type { MeasurementReading } from "../devices/types";

export interface ReadingPublisher {
  publishReadings(deviceId: string, available: boolean, readings: readonly MeasurementReading[]): Promise<void>;
}

/** `{ co2: 412, pm25: null, … }`; unavailable readings become null, never 0. */
export function buildStatePayload(readings: readonly MeasurementReading[]): Record<string, number | null> {
  const payload: Record<string, number | null> = {};
  for (const reading of readings) {
    payload[reading.id] = reading.available ? reading.value : null;
  }
  return payload;
}

export class MqttService implements ReadingPublisher {
  private client: MqttClient | null = null;
  private connected = false;

  constructor(
    private readonly config: AppConfig["mqtt"],
    private readonly logger: Logger,
  ) {}

  async connect(): Promise<void> {
    if (!this.config.host) {
      this.logger.info("MQTT host not configured, readings will not be published");
      return;
    }

    const brokerUrl = `mqtt://${this.config.host}:${this.config.port}`;
    this.logger.info({ brokerUrl }, "Connecting to MQTT broker");

    try {
      this.client = await mqtt.connectAsync(brokerUrl, {
        username: this.config.user ?? undefined,
        password: this.config.password ?? undefined,
        clientId: `${this.config.baseTopic}-${process.pid}`,
        clean: true,
      });
      this.connected = true;
      this.watchConnection(this.client);
      this.logger.info("MQTT connected");
    } catch (err) {
      // mqtt keeps no client after a failed connectAsync; the service stays up without publishing
      this.logger.error({ err, brokerUrl }, "Failed to connect to MQTT broker");
    }
  }

  /** mqtt reconnects on its own; publishing pauses while the broker is away. */
  private watchConnection(client: MqttClient): void {
    client.on("error", (err) => {
      this.logger.error({ err }, "MQTT error");
    });
    client.on("close", () => this.setBrokerReachable(false));
    client.on("connect", () => this.setBrokerReachable(true));
  }

  private setBrokerReachable(reachable: boolean): void {
    if (reachable === this.connected) return;
    this.connected = reachable;
    if (reachable) {
      this.logger.info("MQTT reconnected, publishing resumed");
    } else {
      this.logger.warn("MQTT connection lost, publishing paused");
    }
  }

  async publishReadings(
    deviceId: string,
    available: boolean,
    readings: readonly MeasurementReading[],
  ): Promise<void> {
    if (!this.client || !this.connected) return;

    const base = `${this.config.baseTopic}/${deviceId}`;
    try {
      await this.client.publishAsync(`${base}/availability`, available ? "online" : "offline", {
        retain: true,
      });
      if (!available) return;

      const payload = JSON.stringify(buildStatePayload(readings));
      this.logger.debug({ topic: `${base}/state`, payload }, "MQTT: Publishing state");
      await this.client.publishAsync(`${base}/state`, payload, { retain: false });
    } catch (err) {
      this.logger.error({ err, deviceId }, "Failed to publish readings");
    }
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      this.logger.info("MQTT: Disconnecting...");
      await this.client.endAsync();
      this.client = null;
      this.connected = false;
    }
  }
}
