export { loadMqttSettings, parseMqttSettings, settingsFromEnv } from "./config/load-settings.js";
export type { LoadSettingsOptions } from "./config/load-settings.js";
export { deviceInfoSchema, entityInfoSchema, mqttSettingsSchema } from "./config/schemas.js";
export type {
  ConfigPayload,
  ConfigValue,
  DeviceInfo,
  EntityDescriptor,
  EntityInfo,
  EntityInfoInput,
  MqttSettings,
  MqttSettingsInput,
} from "./config/types.js";

export { cleanString } from "./core/clean-string.js";
export { Discoverable } from "./core/discoverable.js";
export type { DiscoverableOptions } from "./core/discoverable.js";
export { defineEntity, deviceConfig, entityConfig, entityTopicPath } from "./core/entity.js";
export { CapabilityError, ConfigurationError, DiscoveryError, ValidationError } from "./core/errors.js";
export { createLogger } from "./core/logger.js";
export type { Logger, LoggerOptions } from "./core/logger.js";
export { AVAILABILITY_PAYLOADS, BOOLEAN_PAYLOADS, onOffPayload } from "./core/on-off.js";
export type { OnOffPayloads } from "./core/on-off.js";

export { BINARY_SENSOR_COMPONENT, BinarySensor, binarySensorInfoSchema } from "./entities/binary-sensor.js";
export type { BinarySensorInfoInput, BinarySensorOptions } from "./entities/binary-sensor.js";

export { COMMAND_KEYS, MEDIA_PLAYER_COMMANDS, REPEAT_MODES, enabledCommands } from "./media-player/commands.js";
export type {
  CommandContext,
  CommandHandler,
  CommandKey,
  CommandKind,
  MediaPlayerHandlers,
  PlayMediaPayload,
  RepeatMode,
} from "./media-player/commands.js";
export { discoveryKeyFor, generateMediaPlayerConfig } from "./media-player/config.js";
export { CommandDispatcher } from "./media-player/dispatcher.js";
export { MediaPlayer } from "./media-player/media-player.js";
export type { MediaPlayerOptions } from "./media-player/media-player.js";
export { STATE_ROLES, deriveTopics } from "./media-player/topics.js";
export type { StateRole, TopicRole, TopicSet } from "./media-player/topics.js";
export { MEDIA_PLAYER_COMPONENT, PLAYER_STATES, mediaPlayerInfoSchema } from "./media-player/types.js";
export type {
  MediaInfoUpdate,
  MediaPlayerDescriptor,
  MediaPlayerInfoInput,
  MediaPlayerState,
  PlaybackStateUpdate,
  PlayerState,
} from "./media-player/types.js";

export { MemoryTransport } from "./transport/memory-transport.js";
export type { PublishedMessage } from "./transport/memory-transport.js";
export { MqttTransport, brokerUrl, connectMqttTransport } from "./transport/mqtt-transport.js";
export type { MqttClientLike } from "./transport/mqtt-transport.js";
export type { MessageListener, PublishOptions, QoS, Transport } from "./transport/transport.js";
