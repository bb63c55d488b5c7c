import { z } from "zod";
import { entityInfoSchema } from "../config/schemas.js";
import type { ConfigPayload, EntityDescriptor } from "../config/types.js";
import { Discoverable } from "../core/discoverable.js";
import type { DiscoverableOptions } from "../core/discoverable.js";
import { defineEntity, entityConfig } from "../core/entity.js";
import { AVAILABILITY_PAYLOADS, onOffPayload } from "../core/on-off.js";

export const BINARY_SENSOR_COMPONENT = "binary_sensor";

export const binarySensorInfoSchema = entityInfoSchema.extend({
  payloadOn: z.string().default("on"),
  payloadOff: z.string().default("off"),
  offDelay: z.number().int().positive().optional(),
  deviceClass: z.string().optional(),
});

export type BinarySensorInfoInput = z.input<typeof binarySensorInfoSchema>;
export type BinarySensorInfo = z.output<typeof binarySensorInfoSchema>;
export type BinarySensorDescriptor = EntityDescriptor<BinarySensorInfo>;

export type BinarySensorOptions = DiscoverableOptions & {
  info: BinarySensorInfoInput;
};

export class BinarySensor extends Discoverable<BinarySensorDescriptor> {
  private lastState: boolean | undefined;

  constructor(options: BinarySensorOptions) {
    super(defineEntity(BINARY_SENSOR_COMPONENT, binarySensorInfoSchema, options.info), options);
  }

  get state(): boolean | undefined {
    return this.lastState;
  }

  generateConfig(): ConfigPayload {
    const config = entityConfig(this.entity);
    config.state_topic = this.stateTopic;
    config.json_attributes_topic = this.attributesTopic;
    config.payload_on = this.entity.payloadOn;
    config.payload_off = this.entity.payloadOff;
    if (this.entity.offDelay !== undefined) config.off_delay = this.entity.offDelay;
    if (this.entity.deviceClass !== undefined) config.device_class = this.entity.deviceClass;
    if (this.manualAvailability) {
      config.availability_topic = this.availabilityTopic;
      config.payload_available = AVAILABILITY_PAYLOADS.on;
      config.payload_not_available = AVAILABILITY_PAYLOADS.off;
    }
    return config;
  }

  on(): void {
    this.updateState(true);
  }

  off(): void {
    this.updateState(false);
  }

  updateState(state: boolean): void {
    const payload = onOffPayload(state, { on: this.entity.payloadOn, off: this.entity.payloadOff });
    this.logger.info({ entity: this.entity.name, state: payload }, "Setting binary sensor state");
    this.publishState(payload);
    this.lastState = state;
  }
}
