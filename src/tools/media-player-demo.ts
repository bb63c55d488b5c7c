import { parseArgs } from "node:util";
import { loadMqttSettings } from "../config/load-settings.js";
import { createLogger } from "../core/logger.js";
import { MediaPlayer } from "../media-player/media-player.js";
import { connectMqttTransport } from "../transport/mqtt-transport.js";

function numberFlag(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

async function main(): Promise<void> {
  const { values: args } = parseArgs({
    options: {
      config: { type: "string" },
      name: { type: "string" },
      id: { type: "string" },
      title: { type: "string" },
      duration: { type: "string" },
      volume: { type: "string" },
    },
  });
  const logger = createLogger({ name: "media-player-demo" });
  const settings = await loadMqttSettings({ path: args.config });
  const transport = await connectMqttTransport(settings, logger);

  const player: MediaPlayer = new MediaPlayer({
    settings,
    transport,
    logger,
    info: {
      name: args.name ?? "Demo Player",
      uniqueId: args.id ?? "demo-player",
      device: { name: "Demo Device", identifiers: args.id ?? "demo-player" },
    },
    handlers: {
      play: () => player.setState("playing"),
      pause: () => player.setState("paused"),
      stop: () => player.setState("stopped"),
      volume_set: (volume) => player.setVolume(volume),
    },
  });

  player.start();
  transport.onConnect(() => {
    player.setAvailability(true);
    player.updateMediaInfo({ title: args.title ?? "Nothing playing", duration: numberFlag(args.duration, 180) });
    player.setVolume(numberFlag(args.volume, 0.5));
    player.setState("idle");
  });

  const shutdown = async (): Promise<void> => {
    logger.info({ entity: player.entity.name }, "Shutting down");
    player.setAvailability(false);
    player.stop();
    await transport.end();
  };

  process.once("SIGINT", () => {
    shutdown().catch((error: unknown) => {
      logger.error({ error }, "Shutdown failed");
      process.exitCode = 1;
    });
  });
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
