import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { ConfigurationError, asErrorMessage } from "../core/errors.js";
import { mqttSettingsSchema, parseWith } from "./schemas.js";
import type { MqttSettings, MqttSettingsInput } from "./types.js";

export type LoadSettingsOptions = {
  path?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: MqttSettingsInput;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asNumber(value: string): number {
  return value.trim() === "" ? Number.NaN : Number(value);
}

function asBool(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
}

async function readJsonFile(relativePath: string): Promise<Record<string, unknown>> {
  const fullPath = resolve(process.cwd(), relativePath);
  let raw: string;
  try {
    raw = await readFile(fullPath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read settings file ${fullPath}: ${asErrorMessage(error)}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigurationError(`Settings file ${fullPath} is not valid JSON`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Settings file ${fullPath} must contain a JSON object`);
  }
  return parsed;
}

export function settingsFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (env.MQTT_HOST) out.host = env.MQTT_HOST;
  if (env.MQTT_PORT) out.port = asNumber(env.MQTT_PORT);
  if (env.MQTT_USERNAME) out.username = env.MQTT_USERNAME;
  if (env.MQTT_PASSWORD) out.password = env.MQTT_PASSWORD;
  if (env.MQTT_CLIENT_NAME) out.clientName = env.MQTT_CLIENT_NAME;
  if (env.MQTT_USE_TLS) out.useTls = asBool(env.MQTT_USE_TLS);
  if (env.MQTT_DISCOVERY_PREFIX) out.discoveryPrefix = env.MQTT_DISCOVERY_PREFIX;
  if (env.MQTT_STATE_PREFIX) out.statePrefix = env.MQTT_STATE_PREFIX;
  return out;
}

export function parseMqttSettings(input: unknown): MqttSettings {
  return parseWith(mqttSettingsSchema, input, "MQTT settings");
}

export async function loadMqttSettings(options: LoadSettingsOptions = {}): Promise<MqttSettings> {
  const fromFile = options.path ? await readJsonFile(options.path) : {};
  return parseMqttSettings({
    ...fromFile,
    ...settingsFromEnv(options.env ?? process.env),
    ...options.overrides,
  });
}
