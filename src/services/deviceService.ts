import type { Logger } from "pino";
import type { AppConfig, DeviceConfig } from "../config/options";
import { registerSpan } from "../devices/decode";
import { getProfileByModel } from "../devices/definitions";
import { UnknownModelError } from "../devices/errors";
import { DeviceMonitor } from "./deviceMonitor";
import { getSharedModbusClient, type ModbusTcpConfig } from "./modbus/ModbusTcpClient";
import type { ReadingPublisher } from "./mqttService";
import { ModbusRegisterWindow, type RegisterSource } from "./registerWindow";

export type RegisterSourceFactory = (cfg: ModbusTcpConfig, logger: Logger) => RegisterSource;

export function createDeviceMonitor(
  device: DeviceConfig,
  options: Pick<AppConfig, "pollIntervalMs" | "pollTimeoutMs">,
  publisher: ReadingPublisher,
  logger: Logger,
  sourceFactory: RegisterSourceFactory = getSharedModbusClient,
): DeviceMonitor {
  const profile = getProfileByModel(device.model);
  if (!profile) {
    throw new UnknownModelError(device.model);
  }

  const source = sourceFactory(
    { host: device.host, port: device.port, unitId: device.unitId, timeoutMs: options.pollTimeoutMs },
    logger,
  );
  const window = new ModbusRegisterWindow(
    source,
    { kind: profile.registers.kind, start: profile.registers.start, count: registerSpan(profile.specs) },
    options.pollTimeoutMs,
    logger.child({ deviceId: device.id }),
  );

  return new DeviceMonitor(
    {
      id: device.id,
      name: device.name ?? `${profile.name} ${device.host}`,
      model: profile.model,
      host: device.host,
      port: device.port,
    },
    window,
    profile.specs,
    publisher,
    options.pollIntervalMs,
    logger,
  );
}

/** Builds a monitor per configured device; a device of an unknown model is logged and skipped. */
export function createDeviceMonitors(
  config: Pick<AppConfig, "devices" | "pollIntervalMs" | "pollTimeoutMs">,
  publisher: ReadingPublisher,
  logger: Logger,
  sourceFactory: RegisterSourceFactory = getSharedModbusClient,
): DeviceMonitor[] {
  const monitors: DeviceMonitor[] = [];
  for (const device of config.devices) {
    try {
      monitors.push(createDeviceMonitor(device, config, publisher, logger, sourceFactory));
    } catch (err) {
      if (!(err instanceof UnknownModelError)) {
        throw err;
      }
      logger.error({ err, deviceId: device.id, model: device.model }, "Skipping device with unknown model");
    }
  }
  return monitors;
}
