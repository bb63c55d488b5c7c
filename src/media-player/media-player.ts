import type { ConfigPayload } from "../config/types.js";
import { Discoverable } from "../core/discoverable.js";
import type { DiscoverableOptions } from "../core/discoverable.js";
import { defineEntity } from "../core/entity.js";
import { CapabilityError, ValidationError } from "../core/errors.js";
import { AVAILABILITY_PAYLOADS, BOOLEAN_PAYLOADS, onOffPayload } from "../core/on-off.js";
import { REPEAT_MODES, enabledCommands } from "./commands.js";
import type { CommandKey, MediaPlayerHandlers, RepeatMode } from "./commands.js";
import { generateMediaPlayerConfig } from "./config.js";
import { CommandDispatcher } from "./dispatcher.js";
import { commandTopicsOf, deriveTopics } from "./topics.js";
import type { StateRole, TopicSet } from "./topics.js";
import { MEDIA_PLAYER_COMPONENT, PLAYER_STATES, mediaPlayerInfoSchema } from "./types.js";
import type {
  MediaInfoUpdate,
  MediaPlayerDescriptor,
  MediaPlayerInfoInput,
  MediaPlayerState,
  PlaybackStateUpdate,
  PlayerState,
} from "./types.js";

export type MediaPlayerOptions = Omit<DiscoverableOptions, "manualAvailability"> & {
  info: MediaPlayerInfoInput;
  handlers?: MediaPlayerHandlers;
};

function isPlayerState(value: string): value is PlayerState {
  return PLAYER_STATES.some((state) => state === value);
}

function isRepeatMode(value: string): value is RepeatMode {
  return REPEAT_MODES.some((mode) => mode === value);
}

export class MediaPlayer extends Discoverable<MediaPlayerDescriptor> {
  readonly topics: TopicSet;
  private readonly dispatcher: CommandDispatcher;
  private current: MediaPlayerState = {};

  constructor(options: MediaPlayerOptions) {
    const entity = defineEntity(MEDIA_PLAYER_COMPONENT, mediaPlayerInfoSchema, options.info);
    super(entity, { ...options, manualAvailability: true });

    const handlers = options.handlers ?? {};
    this.topics = deriveTopics(
      this.settings.statePrefix,
      entity.component,
      entity.device?.name,
      entity.name,
      enabledCommands(handlers),
    );
    this.dispatcher = new CommandDispatcher(handlers, this.transport, this.logger);
    this.logger.debug(
      { entity: entity.name, commands: commandTopicsOf(this.topics).length },
      "Media player topics derived",
    );
  }

  generateConfig(): ConfigPayload {
    return generateMediaPlayerConfig(this.entity, this.topics, this.attributesTopic);
  }

  supportsCommand(command: CommandKey): boolean {
    return this.dispatcher.has(command);
  }

  getState(): Readonly<MediaPlayerState> {
    return { ...this.current };
  }

  protected commandTopics(): string[] {
    return commandTopicsOf(this.topics);
  }

  protected handleMessage(topic: string, payload: Buffer): void {
    this.dispatcher.dispatch(topic, payload);
  }

  setState(state: string): void {
    if (!isPlayerState(state)) {
      throw new ValidationError(`Invalid state '${state}'. Must be one of: ${PLAYER_STATES.join(", ")}`);
    }
    this.publishRole("state", state);
    this.current.state = state;
  }

  setTitle(title: string): void {
    this.publishRole("title", title);
    this.current.title = title;
  }

  setArtist(artist: string): void {
    this.publishRole("artist", artist);
    this.current.artist = artist;
  }

  setAlbum(album: string): void {
    this.publishRole("album", album);
    this.current.album = album;
  }

  setVolume(volume: number): void {
    if (!Number.isFinite(volume) || volume < 0 || volume > 1) {
      throw new ValidationError(`Volume must be between 0.0 and 1.0, got ${volume}`);
    }
    this.publishRole("volume", String(volume));
    this.current.volume = volume;
  }

  setDuration(duration: number): void {
    if (!Number.isFinite(duration) || duration < 0) {
      throw new ValidationError("Duration must be non-negative");
    }
    this.publishRole("duration", String(duration));
    this.current.duration = duration;
  }

  setPosition(position: number): void {
    if (!Number.isFinite(position) || position < 0) {
      throw new ValidationError("Position must be non-negative");
    }
    const duration = this.current.duration;
    if (duration !== undefined && position > duration) {
      throw new ValidationError(`Position ${position} exceeds duration ${duration}`);
    }
    this.publishRole("position", String(position));
    this.current.position = position;
  }

  setAlbumartUrl(url: string): void {
    this.publishRole("albumart", url);
    this.current.albumartUrl = url;
  }

  setMediaImageRemotelyAccessible(accessible: boolean): void {
    this.publishRole("media_image_remotely_accessible", onOffPayload(accessible, BOOLEAN_PAYLOADS));
    this.current.mediaImageRemotelyAccessible = accessible;
  }

  setAvailability(available: boolean): void {
    this.publishRole("availability", onOffPayload(available, AVAILABILITY_PAYLOADS));
    this.current.available = available;
  }

  // No state role carries mute, shuffle or repeat; they are only tracked locally.
  setMuted(muted: boolean): void {
    this.logger.info({ entity: this.entity.name, muted }, "Setting muted");
    this.current.muted = muted;
  }

  setShuffle(shuffle: boolean): void {
    if (!this.supportsCommand("shuffle_set")) {
      throw new CapabilityError("Player does not support shuffle control");
    }
    this.logger.info({ entity: this.entity.name, shuffle }, "Setting shuffle");
    this.current.shuffle = shuffle;
  }

  setRepeat(repeat: string): void {
    if (!this.supportsCommand("repeat_set")) {
      throw new CapabilityError("Player does not support repeat control");
    }
    if (!isRepeatMode(repeat)) {
      throw new ValidationError(`Invalid repeat mode '${repeat}'. Must be one of: ${REPEAT_MODES.join(", ")}`);
    }
    this.logger.info({ entity: this.entity.name, repeat }, "Setting repeat");
    this.current.repeat = repeat;
  }

  updateMediaInfo(update: MediaInfoUpdate): void {
    if (update.title !== undefined) this.setTitle(update.title);
    if (update.artist !== undefined) this.setArtist(update.artist);
    if (update.album !== undefined) this.setAlbum(update.album);
    if (update.duration !== undefined) this.setDuration(update.duration);
    if (update.position !== undefined) this.setPosition(update.position);
    if (update.albumartUrl !== undefined) this.setAlbumartUrl(update.albumartUrl);
    if (update.mediaImageRemotelyAccessible !== undefined) {
      this.setMediaImageRemotelyAccessible(update.mediaImageRemotelyAccessible);
    }
  }

  updatePlaybackState(update: PlaybackStateUpdate): void {
    if (update.state !== undefined) this.setState(update.state);
    if (update.volume !== undefined) this.setVolume(update.volume);
    if (update.muted !== undefined) this.setMuted(update.muted);
    if (update.shuffle !== undefined) this.setShuffle(update.shuffle);
    if (update.repeat !== undefined) this.setRepeat(update.repeat);
  }

  private publishRole(role: StateRole, value: string): void {
    this.logger.info({ entity: this.entity.name, role, value }, "Publishing state");
    this.publishState(value, this.topics[role]);
  }
}
