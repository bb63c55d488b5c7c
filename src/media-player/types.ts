import { z } from "zod";
import { entityInfoSchema } from "../config/schemas.js";
import type { EntityDescriptor } from "../config/types.js";
import type { RepeatMode } from "./commands.js";

export const MEDIA_PLAYER_COMPONENT = "media_player";

export const PLAYER_STATES = ["playing", "paused", "stopped", "idle", "off"] as const;
export type PlayerState = (typeof PLAYER_STATES)[number];

export const mediaPlayerInfoSchema = entityInfoSchema.extend({
  volumeStep: z.number().positive().max(1).default(0.1),
  sourceList: z.array(z.string()).optional(),
  soundModeList: z.array(z.string()).optional(),
  deviceClass: z.enum(["tv", "speaker", "receiver"]).optional(),
});

export type MediaPlayerInfoInput = z.input<typeof mediaPlayerInfoSchema>;
export type MediaPlayerInfo = z.output<typeof mediaPlayerInfoSchema>;
export type MediaPlayerDescriptor = EntityDescriptor<MediaPlayerInfo>;

export type MediaPlayerState = {
  state?: PlayerState;
  title?: string;
  artist?: string;
  album?: string;
  duration?: number;
  position?: number;
  volume?: number;
  albumartUrl?: string;
  mediaImageRemotelyAccessible?: boolean;
  muted?: boolean;
  shuffle?: boolean;
  repeat?: RepeatMode;
  available?: boolean;
};

export type MediaInfoUpdate = {
  title?: string;
  artist?: string;
  album?: string;
  duration?: number;
  position?: number;
  albumartUrl?: string;
  mediaImageRemotelyAccessible?: boolean;
};

export type PlaybackStateUpdate = {
  state?: string;
  volume?: number;
  muted?: boolean;
  shuffle?: boolean;
  repeat?: string;
};
