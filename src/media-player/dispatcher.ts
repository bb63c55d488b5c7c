import { asErrorMessage } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { Transport } from "../transport/transport.js";
import { COMMAND_KEYS, MEDIA_PLAYER_COMMANDS } from "./commands.js";
import type {
  CommandContext,
  CommandHandler,
  CommandKey,
  CommandKind,
  CommandSpec,
  CommandValues,
  MediaPlayerHandlers,
} from "./commands.js";

type Route = {
  kind: CommandKind;
  run: (text: string, context: CommandContext) => void;
};

const utf8 = new TextDecoder("utf-8", { fatal: true });

export class CommandDispatcher {
  private routes = new Map<string, Route>();

  constructor(
    handlers: MediaPlayerHandlers,
    private readonly transport: Transport,
    private readonly logger: Logger,
  ) {
    for (const key of COMMAND_KEYS) {
      const route = this.bind(key, handlers);
      if (route) this.routes.set(key, route);
    }
  }

  has(command: CommandKey): boolean {
    return this.routes.has(command);
  }

  dispatch(topic: string, rawPayload: Uint8Array): void {
    let text: string;
    try {
      text = utf8.decode(rawPayload);
    } catch (error) {
      this.logger.error({ topic, message: asErrorMessage(error) }, "Failed to decode payload");
      return;
    }

    const command = topic.slice(topic.lastIndexOf("/") + 1);
    const route = this.routes.get(command);
    if (!route) {
      this.logger.warn({ topic, command }, "No callback registered for command");
      return;
    }

    this.logger.debug({ topic, command, kind: route.kind, payload: text }, "Dispatching command");
    route.run(text, { topic, payload: Buffer.from(rawPayload), transport: this.transport });
  }

  private bind<K extends CommandKey>(key: K, handlers: MediaPlayerHandlers): Route | undefined {
    const handler: CommandHandler<CommandValues[K]> | undefined = handlers[key];
    if (!handler) return undefined;
    const spec: CommandSpec<CommandValues[K]> = MEDIA_PLAYER_COMMANDS[key];

    return {
      kind: spec.kind,
      run: (text, context) => {
        const decoded = spec.decode(text);
        if (!decoded.ok) {
          this.logger.error({ topic: context.topic, command: key, reason: decoded.reason }, "Dropping command");
          return;
        }
        try {
          const result = handler(decoded.value, context);
          if (result instanceof Promise) {
            result.catch((error: unknown) => {
              this.logger.error({ command: key, message: asErrorMessage(error) }, "Error executing callback");
            });
          }
        } catch (error) {
          this.logger.error({ command: key, message: asErrorMessage(error) }, "Error executing callback");
        }
      },
    };
  }
}
