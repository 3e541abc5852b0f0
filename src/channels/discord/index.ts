import type { Client } from "discord.js";
import type { ChatAdapter, ChatEvents } from "../adapter.js";
import { toError } from "../adapter.js";
import { TypedEventEmitter } from "../../utils/typed-emitter.js";
import type { ChatConfig } from "../../config/types.js";
import { createDiscordClient } from "./client.js";
import { normalizeDiscordMessage } from "./normalize.js";

export class DiscordAdapter implements ChatAdapter {
  readonly id = "discord";
  readonly label = "Discord";
  readonly events = new TypedEventEmitter<ChatEvents>();

  private client: Client | null = null;

  async start(config: ChatConfig, signal: AbortSignal): Promise<void> {
    if (!config.token) throw new Error("Discord bot token is required");
    if (!config.channel) throw new Error("Discord channel id is required");

    const watch = { channelId: config.channel, streamerId: config.streamerId };
    this.client = createDiscordClient();

    this.client.on("ready", () => {
      this.events.emit("connected");
    });

    this.client.on("messageCreate", (discordMsg) => {
      const msg = normalizeDiscordMessage(discordMsg, watch);
      if (msg) this.events.emit("message", msg);
    });

    this.client.on("error", (err) => {
      this.events.emit("error", err);
    });

    signal.addEventListener("abort", () => {
      this.client?.destroy().catch((err: unknown) => {
        this.events.emit("error", toError(err));
      });
    }, { once: true });

    await this.client.login(config.token);
  }

  async stop(): Promise<void> {
    await this.client?.destroy();
    this.client = null;
    this.events.emit("disconnected", "stopped");
  }
}
