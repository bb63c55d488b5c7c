import { readFile } from "node:fs/promises";
import mqtt from "mqtt";
import type { IClientOptions, IClientPublishOptions, IClientSubscribeOptions } from "mqtt";
import type { MqttSettings } from "../config/types.js";
import { asErrorMessage } from "../core/errors.js";
import { createLogger } from "../core/logger.js";
import type { Logger } from "../core/logger.js";
import type { MessageListener, PublishOptions, QoS, Transport } from "./transport.js";

type LifecycleEvent = "connect" | "close" | "reconnect" | "offline";
type MessageEventListener = (topic: string, payload: Buffer) => void;
type ErrorEventListener = (error: Error) => void;

/** The part of an MQTT.js client the transport drives. */
export type MqttClientLike = {
  readonly connected: boolean;
  publish(topic: string, message: string, opts: IClientPublishOptions, callback: (error?: Error) => void): unknown;
  subscribe(topic: string, opts: IClientSubscribeOptions, callback: (error: Error | null) => void): unknown;
  on(event: LifecycleEvent, listener: () => void): unknown;
  on(event: "message", listener: MessageEventListener): unknown;
  on(event: "error", listener: ErrorEventListener): unknown;
  removeListener(event: LifecycleEvent, listener: () => void): unknown;
  removeListener(event: "message", listener: MessageEventListener): unknown;
  endAsync(): Promise<void>;
};

export function brokerUrl(settings: MqttSettings): string {
  const protocol = settings.useTls ? "mqtts" : "mqtt";
  return `${protocol}://${settings.host}:${settings.port}`;
}

export function toClientOptions(settings: MqttSettings): IClientOptions {
  const options: IClientOptions = {};
  if (settings.clientName) options.clientId = settings.clientName;
  if (settings.username) options.username = settings.username;
  if (settings.password) options.password = settings.password;
  return options;
}

async function withTlsFiles(settings: MqttSettings, options: IClientOptions): Promise<IClientOptions> {
  if (!settings.useTls) return options;
  const [ca, cert, key] = await Promise.all([
    settings.tlsCaCert ? readFile(settings.tlsCaCert) : undefined,
    settings.tlsCertfile ? readFile(settings.tlsCertfile) : undefined,
    settings.tlsKey ? readFile(settings.tlsKey) : undefined,
  ]);
  return { ...options, ca, cert, key };
}

export class MqttTransport implements Transport {
  constructor(
    private readonly client: MqttClientLike,
    private readonly logger: Logger = createLogger({ name: "mqtt-transport" }),
  ) {
    client.on("close", () => {
      this.logger.debug({ tag: "mqtt" }, "Connection closed");
    });
    client.on("reconnect", () => {
      this.logger.debug({ tag: "mqtt" }, "Reconnecting");
    });
    client.on("offline", () => {
      this.logger.debug({ tag: "mqtt" }, "Offline");
    });
    client.on("error", (error) => {
      this.logger.error({ tag: "mqtt", message: error.message }, "Client error");
    });
  }

  get connected(): boolean {
    return this.client.connected;
  }

  publish(topic: string, payload: string, options: PublishOptions = {}): void {
    this.client.publish(topic, payload, { qos: options.qos ?? 0, retain: options.retain ?? false }, (error) => {
      if (error) {
        this.logger.error({ tag: "mqtt", topic, message: asErrorMessage(error) }, "Publish failed");
      }
    });
  }

  subscribe(topic: string, qos: QoS = 0): void {
    this.client.subscribe(topic, { qos }, (error) => {
      if (error) {
        this.logger.error({ tag: "mqtt", topic, message: asErrorMessage(error) }, "Error subscribing to MQTT topic");
        return;
      }
      this.logger.debug({ tag: "mqtt", topic, qos }, "Subscribed");
    });
  }

  onConnect(listener: () => void): () => void {
    this.client.on("connect", listener);
    return () => {
      this.client.removeListener("connect", listener);
    };
  }

  onMessage(listener: MessageListener): () => void {
    const forward = (topic: string, payload: Buffer): void => listener(topic, payload);
    this.client.on("message", forward);
    return () => {
      this.client.removeListener("message", forward);
    };
  }

  async end(): Promise<void> {
    await this.client.endAsync();
  }
}

export async function connectMqttTransport(settings: MqttSettings, logger?: Logger): Promise<MqttTransport> {
  const url = brokerUrl(settings);
  const options = await withTlsFiles(settings, toClientOptions(settings));
  const transportLogger = logger ?? createLogger({ name: "mqtt-transport" });
  transportLogger.info({ tag: "mqtt", brokerUrl: url, clientId: options.clientId ?? null }, "Connecting to MQTT broker");
  return new MqttTransport(mqtt.connect(url, options), transportLogger);
}
