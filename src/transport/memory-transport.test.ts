import { describe, expect, it, vi } from "vitest";
import { MemoryTransport } from "./memory-transport.js";

describe("MemoryTransport", () => {
  it("records publishes and keeps retained payloads", () => {
    const transport = new MemoryTransport();
    transport.publish("a/state", "on", { retain: true, qos: 1 });
    transport.publish("a/event", "ping");
    expect(transport.published).toEqual([
      { topic: "a/state", payload: "on", qos: 1, retain: true },
      { topic: "a/event", payload: "ping", qos: 0, retain: false },
    ]);
    expect([...transport.retained.keys()]).toEqual(["a/state"]);
  });

  it("drops a retained payload on an empty retained publish", () => {
    const transport = new MemoryTransport();
    transport.publish("a/config", "{}", { retain: true });
    transport.publish("a/config", "", { retain: true });
    expect(transport.retained.has("a/config")).toBe(false);
  });

  it("delivers only to subscribed topics", () => {
    const transport = new MemoryTransport();
    const listener = vi.fn();
    transport.onMessage(listener);
    transport.subscribe("a/play", 1);
    expect(transport.deliver("a/pause", "x")).toBe(false);
    expect(transport.deliver("a/play", "x")).toBe(true);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith("a/play", Buffer.from("x"));
  });

  it("detaches listeners", () => {
    const transport = new MemoryTransport();
    const listener = vi.fn();
    const detach = transport.onConnect(listener);
    transport.connect();
    detach();
    transport.connect();
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("disconnects on end", async () => {
    const transport = new MemoryTransport();
    transport.connect();
    await transport.end();
    expect(transport.connected).toBe(false);
  });
});
