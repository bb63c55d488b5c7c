import { entityTopicPath, trimSlashes } from "../core/entity.js";
import { COMMAND_KEYS } from "./commands.js";
import type { CommandKey } from "./commands.js";

export const STATE_ROLES = [
  "state",
  "title",
  "artist",
  "album",
  "duration",
  "position",
  "volume",
  "albumart",
  "media_image_remotely_accessible",
  "availability",
] as const;

export type StateRole = (typeof STATE_ROLES)[number];
export type TopicRole = StateRole | CommandKey;

export const TOPIC_ROLES: readonly TopicRole[] = [...STATE_ROLES, ...COMMAND_KEYS];

export type TopicSet = Readonly<Record<StateRole, string> & Partial<Record<CommandKey, string>>>;

export function isCommandRole(role: string): role is CommandKey {
  return COMMAND_KEYS.some((key) => key === role);
}

export function deriveTopics(
  statePrefix: string,
  component: string,
  deviceName: string | undefined,
  entityName: string,
  enabledCommands: ReadonlySet<CommandKey>,
): TopicSet {
  const base = `${trimSlashes(statePrefix)}/${entityTopicPath(component, deviceName, entityName)}`;
  const topic = (role: TopicRole): string => `${base}/${role}`;

  const topics: Record<StateRole, string> & Partial<Record<CommandKey, string>> = {
    state: topic("state"),
    title: topic("title"),
    artist: topic("artist"),
    album: topic("album"),
    duration: topic("duration"),
    position: topic("position"),
    volume: topic("volume"),
    albumart: topic("albumart"),
    media_image_remotely_accessible: topic("media_image_remotely_accessible"),
    availability: topic("availability"),
  };
  for (const key of COMMAND_KEYS) {
    if (enabledCommands.has(key)) topics[key] = topic(key);
  }
  return Object.freeze(topics);
}

export function commandTopicsOf(topics: TopicSet): string[] {
  const out: string[] = [];
  for (const key of COMMAND_KEYS) {
    const value = topics[key];
    if (value !== undefined) out.push(value);
  }
  return out;
}
