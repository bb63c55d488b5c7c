import { describe, expect, it } from "vitest";
import { entityInfoSchema } from "../config/schemas.js";
import { defineEntity, deviceConfig, entityConfig, entityTopicPath, trimSlashes } from "./entity.js";
import { ConfigurationError } from "./errors.js";

describe("defineEntity", () => {
  it("freezes the descriptor and stamps the component", () => {
    const entity = defineEntity("sensor", entityInfoSchema, { name: "Door" });
    expect(entity.component).toBe("sensor");
    expect(entity.name).toBe("Door");
    expect(Object.isFrozen(entity)).toBe(true);
  });

  it("requires a unique id when a device is set", () => {
    expect(() =>
      defineEntity("sensor", entityInfoSchema, { name: "Door", device: { name: "Hub", identifiers: "hub-1" } }),
    ).toThrow(new ConfigurationError("A unique_id is required if a device is defined"));
  });

  it("rejects a device without identifiers or connections", () => {
    expect(() =>
      defineEntity("sensor", entityInfoSchema, { name: "Door", uniqueId: "door", device: { name: "Hub" } }),
    ).toThrow("Invalid sensor entity: device: A device needs identifiers or connections");
  });

  it("rejects names with nothing left after cleaning", () => {
    expect(() => defineEntity("sensor", entityInfoSchema, { name: "!!!" })).toThrow(
      'Entity name "!!!" has no usable characters for a topic',
    );
  });

  it("rejects device names with nothing left after cleaning", () => {
    expect(() =>
      defineEntity("sensor", entityInfoSchema, {
        name: "Door",
        uniqueId: "door-1",
        device: { name: "!!!", identifiers: "hub-1" },
      }),
    ).toThrow(new ConfigurationError('Device name "!!!" has no usable characters for a topic'));
  });

  it("rejects an empty name", () => {
    expect(() => defineEntity("sensor", entityInfoSchema, { name: "" })).toThrow(ConfigurationError);
  });
});

describe("entityTopicPath", () => {
  it("joins component, cleaned device and cleaned entity", () => {
    expect(entityTopicPath("media_player", "Living Room", "Main Speaker")).toBe("media_player/living-room/main-speaker");
  });

  it("omits the device segment when there is no device", () => {
    expect(entityTopicPath("binary_sensor", undefined, "Front Door")).toBe("binary_sensor/front-door");
  });
});

describe("trimSlashes", () => {
  it("strips leading and trailing slashes only", () => {
    expect(trimSlashes("/hmd/")).toBe("hmd");
    expect(trimSlashes("//home/states//")).toBe("home/states");
  });
});

describe("entityConfig", () => {
  it("emits snake_case keys and skips undefined fields", () => {
    const entity = defineEntity("sensor", entityInfoSchema, {
      name: "Door",
      uniqueId: "door-1",
      entityCategory: "diagnostic",
      expireAfter: 60,
      device: { name: "Hub", identifiers: ["hub-1"], swVersion: "1.2.0" },
    });
    expect(entityConfig(entity)).toEqual({
      component: "sensor",
      name: "Door",
      unique_id: "door-1",
      entity_category: "diagnostic",
      expire_after: 60,
      device: { name: "Hub", identifiers: ["hub-1"], sw_version: "1.2.0" },
    });
  });

  it("converts connection pairs to nested arrays", () => {
    expect(deviceConfig({ name: "Hub", connections: [["mac", "00:11:22:33:44:55"]] })).toEqual({
      name: "Hub",
      connections: [["mac", "00:11:22:33:44:55"]],
    });
  });
});
