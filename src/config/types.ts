import type { z } from "zod";
import type { deviceInfoSchema, entityInfoSchema, mqttSettingsSchema } from "./schemas.js";

export type MqttSettingsInput = z.input<typeof mqttSettingsSchema>;
export type MqttSettings = z.output<typeof mqttSettingsSchema>;

export type DeviceInfo = z.output<typeof deviceInfoSchema>;

export type EntityInfoInput = z.input<typeof entityInfoSchema>;
export type EntityInfo = z.output<typeof entityInfoSchema>;

export type EntityDescriptor<TInfo extends EntityInfo = EntityInfo> = Readonly<TInfo & { component: string }>;

export type ConfigValue =
  | string
  | number
  | boolean
  | readonly ConfigValue[]
  | { readonly [key: string]: ConfigValue };

export type ConfigPayload = Record<string, ConfigValue>;
