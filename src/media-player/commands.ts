import { z } from "zod";
import type { Transport } from "../transport/transport.js";

export const COMMAND_KEYS = [
  "play",
  "pause",
  "stop",
  "next_track",
  "previous_track",
  "volume_set",
  "seek",
  "volume_mute",
  "shuffle_set",
  "repeat_set",
  "select_source",
  "select_sound_mode",
  "turn_on",
  "turn_off",
  "play_media",
  "browse_media",
] as const;

export type CommandKey = (typeof COMMAND_KEYS)[number];

export type CommandKind = "simple" | "numeric" | "boolean" | "enumerated" | "selection" | "structured";

export const REPEAT_MODES = ["off", "all", "one"] as const;
export type RepeatMode = (typeof REPEAT_MODES)[number];

export const repeatModeSchema = z.enum(REPEAT_MODES);

export const playMediaSchema = z
  .object({
    media_type: z.string(),
    media_id: z.string(),
    enqueue: z.string().optional(),
    announce: z.boolean().optional(),
  })
  .transform((payload) => ({
    mediaType: payload.media_type,
    mediaId: payload.media_id,
    enqueue: payload.enqueue,
    announce: payload.announce,
  }));

export type PlayMediaPayload = z.output<typeof playMediaSchema>;

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export type CommandSpec<T> = {
  kind: CommandKind;
  decode: (payload: string) => DecodeResult<T>;
};

export type CommandValues = {
  play: string;
  pause: string;
  stop: string;
  next_track: string;
  previous_track: string;
  volume_set: number;
  seek: number;
  volume_mute: boolean;
  shuffle_set: boolean;
  repeat_set: RepeatMode;
  select_source: string;
  select_sound_mode: string;
  turn_on: string;
  turn_off: string;
  play_media: PlayMediaPayload;
  browse_media: string;
};

export type CommandContext = {
  topic: string;
  payload: Buffer;
  transport: Transport;
};

export type CommandHandler<T> = (value: T, context: CommandContext) => void | Promise<void>;

export type MediaPlayerHandlers = {
  [K in CommandKey]?: CommandHandler<CommandValues[K]>;
};

// Plain decimal or exponent notation only; "inf", "nan", "0x10" and "1_000" are dropped as invalid.
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function decodeRaw(payload: string): DecodeResult<string> {
  return { ok: true, value: payload };
}

export function decodeNumber(payload: string): DecodeResult<number> {
  const text = payload.trim();
  const value = DECIMAL.test(text) ? Number(text) : Number.NaN;
  if (!Number.isFinite(value)) {
    return { ok: false, reason: `Invalid numeric payload: ${payload}` };
  }
  return { ok: true, value };
}

export function decodeOnOff(payload: string): DecodeResult<boolean> {
  return { ok: true, value: payload.toUpperCase() === "ON" };
}

export function decodeRepeatMode(payload: string): DecodeResult<RepeatMode> {
  const result = repeatModeSchema.safeParse(payload);
  if (!result.success) {
    return { ok: false, reason: `Invalid repeat mode: ${payload}. Valid modes: ${REPEAT_MODES.join(", ")}` };
  }
  return { ok: true, value: result.data };
}

export function decodePlayMedia(payload: string): DecodeResult<PlayMediaPayload> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return { ok: false, reason: "Invalid JSON payload" };
  }
  const result = playMediaSchema.safeParse(parsed);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join(".") || "payload").join(", ");
    return { ok: false, reason: `Invalid play_media payload: ${fields}` };
  }
  return { ok: true, value: result.data };
}

export const MEDIA_PLAYER_COMMANDS: { readonly [K in CommandKey]: CommandSpec<CommandValues[K]> } = {
  play: { kind: "simple", decode: decodeRaw },
  pause: { kind: "simple", decode: decodeRaw },
  stop: { kind: "simple", decode: decodeRaw },
  next_track: { kind: "simple", decode: decodeRaw },
  previous_track: { kind: "simple", decode: decodeRaw },
  volume_set: { kind: "numeric", decode: decodeNumber },
  seek: { kind: "numeric", decode: decodeNumber },
  volume_mute: { kind: "boolean", decode: decodeOnOff },
  shuffle_set: { kind: "boolean", decode: decodeOnOff },
  repeat_set: { kind: "enumerated", decode: decodeRepeatMode },
  select_source: { kind: "selection", decode: decodeRaw },
  select_sound_mode: { kind: "selection", decode: decodeRaw },
  turn_on: { kind: "simple", decode: decodeRaw },
  turn_off: { kind: "simple", decode: decodeRaw },
  play_media: { kind: "structured", decode: decodePlayMedia },
  browse_media: { kind: "simple", decode: decodeRaw },
};

export function enabledCommands(handlers: MediaPlayerHandlers): ReadonlySet<CommandKey> {
  return new Set(COMMAND_KEYS.filter((key) => handlers[key] !== undefined));
}
