import type { z } from "zod";
import { parseWith } from "../config/schemas.js";
import type { ConfigPayload, ConfigValue, DeviceInfo, EntityDescriptor, EntityInfo } from "../config/types.js";
import { cleanString } from "./clean-string.js";
import { ConfigurationError } from "./errors.js";

function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

function toConfigValue(value: unknown): ConfigValue | undefined {
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (Array.isArray(value)) {
    return value.map(toConfigValue).filter((item): item is ConfigValue => item !== undefined);
  }
  return undefined;
}

export function defineEntity<TSchema extends z.ZodType<EntityInfo, z.ZodTypeDef, unknown>>(
  component: string,
  schema: TSchema,
  input: z.input<TSchema>,
): EntityDescriptor<z.output<TSchema>> {
  const info = parseWith(schema, input, `${component} entity`);
  if (info.device && !info.uniqueId) {
    throw new ConfigurationError("A unique_id is required if a device is defined");
  }
  if (cleanString(info.name) === "") {
    throw new ConfigurationError(`Entity name "${info.name}" has no usable characters for a topic`);
  }
  const deviceName = info.device?.name;
  if (deviceName !== undefined && cleanString(deviceName) === "") {
    throw new ConfigurationError(`Device name "${deviceName}" has no usable characters for a topic`);
  }
  return Object.freeze({ ...info, component });
}

export function trimSlashes(prefix: string): string {
  return prefix.replace(/^\/+|\/+$/g, "");
}

export function entityTopicPath(component: string, deviceName: string | undefined, entityName: string): string {
  const segments = [component];
  if (deviceName !== undefined) segments.push(cleanString(deviceName));
  segments.push(cleanString(entityName));
  return segments.join("/");
}

export function deviceConfig(device: DeviceInfo): ConfigPayload {
  const out: ConfigPayload = {};
  for (const [key, value] of Object.entries(device)) {
    const converted = toConfigValue(value);
    if (converted !== undefined) out[toSnakeCase(key)] = converted;
  }
  return out;
}

/** Discovery fields shared by every entity kind, in snake_case, without undefined values. */
export function entityConfig(entity: EntityDescriptor): ConfigPayload {
  const out: ConfigPayload = {
    component: entity.component,
    name: entity.name,
  };
  if (entity.uniqueId !== undefined) out.unique_id = entity.uniqueId;
  if (entity.objectId !== undefined) out.object_id = entity.objectId;
  if (entity.icon !== undefined) out.icon = entity.icon;
  if (entity.entityCategory !== undefined) out.entity_category = entity.entityCategory;
  if (entity.enabledByDefault !== undefined) out.enabled_by_default = entity.enabledByDefault;
  if (entity.expireAfter !== undefined) out.expire_after = entity.expireAfter;
  if (entity.forceUpdate !== undefined) out.force_update = entity.forceUpdate;
  if (entity.qos !== undefined) out.qos = entity.qos;
  if (entity.device) out.device = deviceConfig(entity.device);
  return out;
}
