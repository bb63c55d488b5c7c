import type { ConfigPayload } from "../config/types.js";
import { entityConfig } from "../core/entity.js";
import { AVAILABILITY_PAYLOADS } from "../core/on-off.js";
import { TOPIC_ROLES } from "./topics.js";
import type { StateRole, TopicRole, TopicSet } from "./topics.js";
import type { MediaPlayerDescriptor } from "./types.js";

const STATE_DISCOVERY_KEYS: Record<StateRole, string> = {
  state: "state_topic",
  availability: "availability_topic",
  title: "media_title_topic",
  artist: "media_artist_topic",
  album: "media_album_name_topic",
  duration: "media_duration_topic",
  position: "media_position_topic",
  volume: "volume_level_topic",
  albumart: "media_image_url_topic",
  media_image_remotely_accessible: "media_image_remotely_accessible_topic",
};

function isStateRole(role: TopicRole): role is StateRole {
  return role in STATE_DISCOVERY_KEYS;
}

export function discoveryKeyFor(role: TopicRole): string {
  return isStateRole(role) ? STATE_DISCOVERY_KEYS[role] : `${role}_topic`;
}

export function generateMediaPlayerConfig(
  entity: MediaPlayerDescriptor,
  topics: TopicSet,
  attributesTopic?: string,
): ConfigPayload {
  const config = entityConfig(entity);
  if (attributesTopic !== undefined) config.json_attributes_topic = attributesTopic;
  if (entity.volumeStep !== undefined) config.volume_step = entity.volumeStep;
  if (entity.sourceList !== undefined) config.source_list = entity.sourceList;
  if (entity.soundModeList !== undefined) config.sound_mode_list = entity.soundModeList;
  if (entity.deviceClass !== undefined) config.device_class = entity.deviceClass;

  for (const role of TOPIC_ROLES) {
    const topic = topics[role];
    if (topic === undefined) continue;
    config[discoveryKeyFor(role)] = topic;
  }
  if (topics.availability !== undefined) {
    config.payload_available = AVAILABILITY_PAYLOADS.on;
    config.payload_not_available = AVAILABILITY_PAYLOADS.off;
  }
  return config;
}
