import { EventEmitter } from "node:events";
import type { IClientPublishOptions, IClientSubscribeOptions } from "mqtt";
import { describe, expect, it, vi } from "vitest";
import { parseMqttSettings } from "../config/load-settings.js";
import { MqttTransport, brokerUrl, toClientOptions } from "./mqtt-transport.js";
import type { MqttClientLike } from "./mqtt-transport.js";

describe("brokerUrl", () => {
  it("uses mqtt:// by default", () => {
    expect(brokerUrl(parseMqttSettings({ host: "broker.local" }))).toBe("mqtt://broker.local:1883");
  });

  it("switches to mqtts:// with TLS", () => {
    expect(brokerUrl(parseMqttSettings({ host: "broker.local", port: 8883, useTls: true }))).toBe(
      "mqtts://broker.local:8883",
    );
  });
});

describe("toClientOptions", () => {
  it("maps credentials and client name", () => {
    const settings = parseMqttSettings({ clientName: "speaker-bridge", username: "user", password: "test-secret" });
    expect(toClientOptions(settings)).toEqual({ clientId: "speaker-bridge", username: "user", password: "test-secret" });
  });

  it("leaves unset fields out", () => {
    expect(toClientOptions(parseMqttSettings({}))).toEqual({});
  });
});

class FakeClient extends EventEmitter implements MqttClientLike {
  connected = false;
  publishError: Error | undefined;
  subscribeError: Error | null = null;
  ended = false;
  readonly publishes: Array<{ topic: string; message: string; opts: IClientPublishOptions }> = [];
  readonly subscribes: Array<{ topic: string; opts: IClientSubscribeOptions }> = [];

  publish(topic: string, message: string, opts: IClientPublishOptions, callback: (error?: Error) => void): this {
    this.publishes.push({ topic, message, opts });
    callback(this.publishError);
    return this;
  }

  subscribe(topic: string, opts: IClientSubscribeOptions, callback: (error: Error | null) => void): this {
    this.subscribes.push({ topic, opts });
    callback(this.subscribeError);
    return this;
  }

  async endAsync(): Promise<void> {
    this.ended = true;
  }
}

function setup() {
  const client = new FakeClient();
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const transport = new MqttTransport(client, logger);
  return { client, logger, transport };
}

describe("MqttTransport", () => {
  it("reports the client connection state", () => {
    const { client, transport } = setup();
    expect(transport.connected).toBe(false);
    client.connected = true;
    expect(transport.connected).toBe(true);
  });

  it("publishes with qos and retain defaults", () => {
    const { client, logger, transport } = setup();
    transport.publish("hmd/a/state", "on");
    transport.publish("hmd/a/config", "{}", { retain: true, qos: 1 });
    expect(client.publishes).toEqual([
      { topic: "hmd/a/state", message: "on", opts: { qos: 0, retain: false } },
      { topic: "hmd/a/config", message: "{}", opts: { qos: 1, retain: true } },
    ]);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("logs failed publishes", () => {
    const { client, logger, transport } = setup();
    client.publishError = new Error("client disconnecting");
    transport.publish("hmd/a/state", "on");
    expect(logger.error).toHaveBeenCalledWith(
      { tag: "mqtt", topic: "hmd/a/state", message: "client disconnecting" },
      "Publish failed",
    );
  });

  it("subscribes with the requested qos", () => {
    const { client, logger, transport } = setup();
    transport.subscribe("hmd/a/play", 1);
    expect(client.subscribes).toEqual([{ topic: "hmd/a/play", opts: { qos: 1 } }]);
    expect(logger.debug).toHaveBeenCalledWith({ tag: "mqtt", topic: "hmd/a/play", qos: 1 }, "Subscribed");
  });

  it("logs failed subscriptions", () => {
    const { client, logger, transport } = setup();
    client.subscribeError = new Error("not authorized");
    transport.subscribe("hmd/a/play", 1);
    expect(logger.error).toHaveBeenCalledWith(
      { tag: "mqtt", topic: "hmd/a/play", message: "not authorized" },
      "Error subscribing to MQTT topic",
    );
  });

  it("forwards connect events until detached", () => {
    const { client, transport } = setup();
    const listener = vi.fn();
    const detach = transport.onConnect(listener);
    client.emit("connect");
    detach();
    client.emit("connect");
    expect(listener).toHaveBeenCalledTimes(1);
    expect(client.listenerCount("connect")).toBe(0);
  });

  it("forwards messages until detached", () => {
    const { client, transport } = setup();
    const listener = vi.fn();
    const detach = transport.onMessage(listener);
    client.emit("message", "hmd/a/play", Buffer.from("PLAY"));
    detach();
    client.emit("message", "hmd/a/play", Buffer.from("PLAY"));
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith("hmd/a/play", Buffer.from("PLAY"));
    expect(client.listenerCount("message")).toBe(0);
  });

  it("logs client errors", () => {
    const { client, logger } = setup();
    client.emit("error", new Error("connection refused"));
    expect(logger.error).toHaveBeenCalledWith({ tag: "mqtt", message: "connection refused" }, "Client error");
  });

  it("ends the client", async () => {
    const { client, transport } = setup();
    await transport.end();
    expect(client.ended).toBe(true);
  });
});
