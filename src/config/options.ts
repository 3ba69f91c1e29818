import { existsSync, readFileSync } from "fs";
import { z } from "zod";

const DEFAULT_OPTIONS_PATH = "/data/options.json";

const port = (fallback: number) => z.coerce.number().int().min(1).max(65535).default(fallback);
const optionalText = z
  .string()
  .nullish()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : null));

const DeviceSchema = z.object({
  id: z.string().trim().min(1, "device id is required"),
  name: z.string().trim().min(1).optional(),
  model: z.string().trim().min(1, "device model is required"),
  host: z.string().trim().min(1, "device host is required"),
  port: port(502),
  unitId: z.coerce.number().int().min(0).max(255).default(1),
});

const OptionsSchema = z
  .object({
    logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
    webPort: port(8099),
    pollIntervalMs: z.coerce.number().int().positive().default(5000),
    pollTimeoutMs: z.coerce.number().int().positive().default(3000),
    mqtt: z
      .object({
        host: optionalText,
        port: port(1883),
        user: optionalText,
        password: optionalText,
        baseTopic: z.string().trim().min(1).default("sensorhub"),
      })
      .default({}),
    devices: z.array(DeviceSchema).default([]),
  })
  .superRefine((options, ctx) => {
    const seen = new Set<string>();
    options.devices.forEach((device, index) => {
      if (seen.has(device.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["devices", index, "id"],
          message: `duplicate device id '${device.id}'`,
        });
      }
      seen.add(device.id);
    });
  });

export type AppConfig = z.infer<typeof OptionsSchema>;
export type DeviceConfig = AppConfig["devices"][number];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickEnv(env: Env, mapping: Record<string, string>): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const [envKey, optionKey] of Object.entries(mapping)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== "") {
      picked[optionKey] = value;
    }
  }
  return picked;
}

/** Validates add-on options, with environment variables taking precedence. */
export function parseOptions(raw: unknown, env: Env = {}): AppConfig {
  const fileOptions = isRecord(raw) ? raw : {};
  const fileMqtt = isRecord(fileOptions.mqtt) ? fileOptions.mqtt : {};

  const merged = {
    ...fileOptions,
    ...pickEnv(env, {
      LOG_LEVEL: "logLevel",
      WEB_PORT: "webPort",
      POLL_INTERVAL_MS: "pollIntervalMs",
      POLL_TIMEOUT_MS: "pollTimeoutMs",
    }),
    mqtt: {
      ...fileMqtt,
      ...pickEnv(env, {
        MQTT_HOST: "host",
        MQTT_PORT: "port",
        MQTT_USER: "user",
        MQTT_PASSWORD: "password",
        MQTT_BASE_TOPIC: "baseTopic",
      }),
    },
  };

  const parsed = OptionsSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}

function readOptionsFile(path: string): unknown {
  if (!existsSync(path)) {
    return {};
  }
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read options file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

let current: AppConfig | null = null;

export function loadConfig(env: Env = process.env): AppConfig {
  const raw = readOptionsFile(env.OPTIONS_PATH ?? DEFAULT_OPTIONS_PATH);
  current = parseOptions(raw, env);
  return current;
}

export function getConfig(): AppConfig {
  if (!current) {
    throw new ConfigError("Configuration has not been loaded");
  }
  return current;
}
