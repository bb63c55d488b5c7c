import { describe, expect, it } from "vitest";
import type { CommandKey } from "./commands.js";
import { commandTopicsOf, deriveTopics, isCommandRole } from "./topics.js";

const none: ReadonlySet<CommandKey> = new Set();

describe("deriveTopics", () => {
  it("derives every state role under the device path", () => {
    const topics = deriveTopics("hmd", "media_player", "Living Room", "Speaker", none);
    expect(topics).toEqual({
      state: "hmd/media_player/living-room/speaker/state",
      title: "hmd/media_player/living-room/speaker/title",
      artist: "hmd/media_player/living-room/speaker/artist",
      album: "hmd/media_player/living-room/speaker/album",
      duration: "hmd/media_player/living-room/speaker/duration",
      position: "hmd/media_player/living-room/speaker/position",
      volume: "hmd/media_player/living-room/speaker/volume",
      albumart: "hmd/media_player/living-room/speaker/albumart",
      media_image_remotely_accessible: "hmd/media_player/living-room/speaker/media_image_remotely_accessible",
      availability: "hmd/media_player/living-room/speaker/availability",
    });
  });

  it("omits the device segment without a device", () => {
    const topics = deriveTopics("hmd", "media_player", undefined, "Speaker", none);
    expect(topics.state).toBe("hmd/media_player/speaker/state");
  });

  it("ignores trailing slashes on the prefix", () => {
    const topics = deriveTopics("hmd//", "media_player", undefined, "Speaker", none);
    expect(topics.volume).toBe("hmd/media_player/speaker/volume");
  });

  it("ignores leading slashes on the prefix", () => {
    const topics = deriveTopics("/hmd", "media_player", undefined, "Speaker", none);
    expect(topics.state).toBe("hmd/media_player/speaker/state");
  });

  it("adds command roles only for enabled commands, in a fixed order", () => {
    const topics = deriveTopics("hmd", "media_player", undefined, "Speaker", new Set<CommandKey>(["seek", "play"]));
    expect(topics.play).toBe("hmd/media_player/speaker/play");
    expect(topics.seek).toBe("hmd/media_player/speaker/seek");
    expect(topics.pause).toBeUndefined();
    expect(Object.keys(topics).slice(-2)).toEqual(["play", "seek"]);
    expect(commandTopicsOf(topics)).toEqual(["hmd/media_player/speaker/play", "hmd/media_player/speaker/seek"]);
  });

  it("is deterministic and frozen", () => {
    const enabled = new Set<CommandKey>(["volume_set"]);
    const first = deriveTopics("hmd", "media_player", "Den", "Amp", enabled);
    const second = deriveTopics("hmd", "media_player", "Den", "Amp", enabled);
    expect(first).toEqual(second);
    expect(Object.keys(first)).toEqual(Object.keys(second));
    expect(Object.isFrozen(first)).toBe(true);
  });
});

describe("isCommandRole", () => {
  it("tells command roles from state roles", () => {
    expect(isCommandRole("play_media")).toBe(true);
    expect(isCommandRole("title")).toBe(false);
  });
});
