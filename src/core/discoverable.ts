import type { ConfigPayload, EntityDescriptor, MqttSettings } from "../config/types.js";
import type { QoS, Transport } from "../transport/transport.js";
import { entityTopicPath, trimSlashes } from "./entity.js";
import { CapabilityError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { AVAILABILITY_PAYLOADS, onOffPayload } from "./on-off.js";

export type DiscoverableOptions = {
  settings: MqttSettings;
  transport: Transport;
  logger?: Logger;
  manualAvailability?: boolean;
};

const COMMAND_QOS: QoS = 1;

export abstract class Discoverable<TEntity extends EntityDescriptor = EntityDescriptor> {
  readonly entity: TEntity;
  readonly entityTopic: string;
  readonly configTopic: string;
  readonly stateTopic: string;
  readonly attributesTopic: string;
  readonly availabilityTopic: string;
  protected readonly settings: MqttSettings;
  protected readonly transport: Transport;
  protected readonly logger: Logger;
  protected readonly manualAvailability: boolean;
  private subscriptions = new Set<string>();
  private detachers: Array<() => void> = [];

  constructor(entity: TEntity, options: DiscoverableOptions) {
    this.entity = entity;
    this.settings = options.settings;
    this.transport = options.transport;
    this.logger = options.logger ?? createLogger({ name: entity.component });
    this.manualAvailability = options.manualAvailability ?? false;

    const statePrefix = trimSlashes(options.settings.statePrefix);
    this.entityTopic = entityTopicPath(entity.component, entity.device?.name, entity.name);
    this.configTopic = `${trimSlashes(options.settings.discoveryPrefix)}/${this.entityTopic}/config`;
    this.stateTopic = `${statePrefix}/${this.entityTopic}/state`;
    this.attributesTopic = `${statePrefix}/${this.entityTopic}/attributes`;
    this.availabilityTopic = `${statePrefix}/${this.entityTopic}/availability`;
  }

  abstract generateConfig(): ConfigPayload;

  /** Topics to subscribe on every connect; inbound messages on them reach handleMessage. */
  protected commandTopics(): string[] {
    return [];
  }

  protected handleMessage(_topic: string, _payload: Buffer): void {
    // Entities without command topics ignore inbound traffic.
  }

  start(): void {
    if (this.detachers.length > 0) return;
    this.detachers.push(
      this.transport.onConnect(() => this.handleConnect()),
      this.transport.onMessage((topic, payload) => {
        if (!this.subscriptions.has(topic)) return;
        this.handleMessage(topic, payload);
      }),
    );
    if (this.transport.connected) {
      this.handleConnect();
    }
  }

  stop(): void {
    for (const detach of this.detachers) {
      detach();
    }
    this.detachers = [];
    this.subscriptions.clear();
  }

  writeConfig(): void {
    const config = this.generateConfig();
    this.logger.debug({ entity: this.entity.name, topic: this.configTopic }, "Writing discovery config");
    this.transport.publish(this.configTopic, JSON.stringify(config), { retain: true });
  }

  /** Removes the entity from Home Assistant by clearing its retained discovery message. */
  clear(): void {
    this.logger.info({ entity: this.entity.name, topic: this.configTopic }, "Clearing discovery config");
    this.transport.publish(this.configTopic, "", { retain: true });
  }

  setAttributes(attributes: Record<string, unknown>): void {
    this.logger.info({ entity: this.entity.name, topic: this.attributesTopic }, "Setting attributes");
    this.transport.publish(this.attributesTopic, JSON.stringify(attributes), { retain: true });
  }

  setAvailability(available: boolean): void {
    if (!this.manualAvailability) {
      throw new CapabilityError(`Manual availability is not enabled for ${this.entity.name}`);
    }
    const message = onOffPayload(available, AVAILABILITY_PAYLOADS);
    this.logger.info({ entity: this.entity.name, availability: message }, "Setting availability");
    this.transport.publish(this.availabilityTopic, message, { retain: true });
  }

  protected publishState(value: string, topic: string = this.stateTopic, retain = true): void {
    this.transport.publish(topic, value, { retain });
  }

  private handleConnect(): void {
    this.logger.debug({ entity: this.entity.name }, "Transport connected");
    this.writeConfig();
    for (const topic of this.commandTopics()) {
      this.subscriptions.add(topic);
      this.transport.subscribe(topic, COMMAND_QOS);
    }
  }
}
