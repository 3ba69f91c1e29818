import "dotenv/config";

import express from "express";
import type { Request, Response } from "express";
import { createServer } from "http";

import { createLogger } from "./logger";
import { loadConfig, getConfig, ConfigError } from "./config/options";
import { createRequestLogger } from "./middleware/requestLogger";
import { createErrorHandler } from "./middleware/errorHandler";
import { createDevicesRouter } from "./routes/devices";
import { createDeviceMonitors } from "./services/deviceService";
import { MqttService } from "./services/mqttService";
import { closeSharedModbusClients } from "./services/modbus/ModbusTcpClient";

try {
  loadConfig();
} catch (error) {
  if (!(error instanceof ConfigError)) throw error;
  createLogger("info").fatal({ error }, "Invalid configuration");
  process.exit(1);
}
const config = getConfig();
const logger = createLogger(config.logLevel);

const mqttService = new MqttService(config.mqtt, logger.child({ component: "mqtt" }));
const monitors = createDeviceMonitors(config, mqttService, logger);

const app = express();
app.disable("x-powered-by");
app.use(express.json());
app.use(createRequestLogger(logger));

app.get("/api/health", (_request: Request, response: Response) => {
  response.json({ status: "ok" });
});
app.use("/api", createDevicesRouter(monitors));
app.use(createErrorHandler(logger));

const httpServer = createServer(app);
const host = "0.0.0.0";

async function start() {
  if (monitors.length === 0) {
    logger.warn("No devices configured");
  }
  await mqttService.connect();
  for (const monitor of monitors) {
    monitor.start();
  }

  httpServer.listen(config.webPort, host, () => {
    logger.info({ port: config.webPort, devices: monitors.length }, "Sensor hub listening");
  });
}

async function shutdown(signal: string) {
  logger.info({ signal }, "Shutting down sensor hub");

  for (const monitor of monitors) {
    monitor.stop();
  }
  await mqttService.disconnect();
  await closeSharedModbusClients();

  await new Promise<void>((resolve) => {
    httpServer.close(() => resolve());
  });

  process.exit(0);
}

process.on("SIGINT", (signal) => {
  void shutdown(signal.toString());
});

process.on("SIGTERM", (signal) => {
  void shutdown(signal.toString());
});

void start().catch((error) => {
  logger.fatal({ error }, "Failed to start sensor hub");
  process.exit(1);
});
