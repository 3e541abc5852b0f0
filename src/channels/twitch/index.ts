import type { Client } from "tmi.js";
import type { ChatAdapter, ChatEvents } from "../adapter.js";
import { toError } from "../adapter.js";
import { TypedEventEmitter } from "../../utils/typed-emitter.js";
import { retry, type RetryPolicy } from "../../utils/retry.js";
import type { ChatConfig } from "../../config/types.js";
import { createTwitchClient } from "./client.js";
import { channelLogin, normalizeTwitchMessage } from "./normalize.js";

export const TWITCH_CONNECT_POLICY: RetryPolicy = {
  attempts: 5,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
};

export interface TwitchAdapterOptions {
  readonly connectPolicy?: RetryPolicy;
  readonly createClient?: (config: ChatConfig) => Client;
}

interface TwitchSession {
  readonly client: Client;
  /** Aborted by `stop()`, by the caller's signal, or by a failed start. */
  readonly controller: AbortController;
  reconnecting: Promise<void> | null;
  closing: Promise<void> | null;
}

/**
 * Read-only Twitch chat. The tmi client never reconnects by itself; the first
 * connection and every reconnect after a drop go through `retry` with the
 * connect policy, so aborting the session cancels all pending attempts.
 */
export class TwitchAdapter implements ChatAdapter {
  readonly id = "twitch";
  readonly label = "Twitch";
  readonly events = new TypedEventEmitter<ChatEvents>();

  private readonly connectPolicy: RetryPolicy;
  private readonly createClient: (config: ChatConfig) => Client;
  private session: TwitchSession | null = null;

  constructor(options: TwitchAdapterOptions = {}) {
    this.connectPolicy = options.connectPolicy ?? TWITCH_CONNECT_POLICY;
    this.createClient = options.createClient ?? createTwitchClient;
  }

  async start(config: ChatConfig, signal: AbortSignal): Promise<void> {
    if (!config.channel) throw new Error("Twitch channel is required");
    if (this.session) throw new Error("Twitch chat is already started");

    const streamer = channelLogin(config.channel);
    const client = this.createClient(config);
    const controller = new AbortController();
    const session: TwitchSession = { client, controller, reconnecting: null, closing: null };
    this.session = session;

    const forwardAbort = (): void => controller.abort(signal.reason);
    controller.signal.addEventListener("abort", () => {
      signal.removeEventListener("abort", forwardAbort);
      session.closing = this.close(client);
    }, { once: true });
    if (signal.aborted) {
      controller.abort(signal.reason);
    } else {
      signal.addEventListener("abort", forwardAbort, { once: true });
    }

    let established = false;

    client.on("message", (_channel, tags, message, self) => {
      const msg = normalizeTwitchMessage(tags, message, self, streamer);
      if (msg) this.events.emit("message", msg);
    });

    client.on("connected", () => {
      established = true;
      this.events.emit("connected");
    });

    client.on("disconnected", (reason) => {
      const dropped = established;
      established = false;
      this.events.emit("disconnected", reason);
      if (dropped && !controller.signal.aborted) this.reconnect(session);
    });

    try {
      await this.connect(session);
    } catch (err) {
      controller.abort();
      await session.closing;
      if (this.session === session) this.session = null;
      throw err;
    }
  }

  async stop(): Promise<void> {
    const session = this.session;
    if (!session) return;
    this.session = null;

    session.controller.abort();
    await session.reconnecting;
    await session.closing;
    this.events.emit("disconnected", "stopped");
  }

  private connect(session: TwitchSession): Promise<void> {
    const { client, controller } = session;
    return retry(
      async () => {
        await client.connect();
        // Aborted while the socket was still opening
        if (controller.signal.aborted) {
          await this.close(client);
          controller.signal.throwIfAborted();
        }
      },
      this.connectPolicy,
      {
        signal: controller.signal,
        onRetry: (err) => this.events.emit("error", toError(err)),
      },
    );
  }

  private reconnect(session: TwitchSession): void {
    if (session.reconnecting) return;
    session.reconnecting = this.connect(session)
      .catch((err: unknown) => {
        if (session.controller.signal.aborted) return;
        this.events.emit(
          "error",
          new Error(`Twitch chat could not reconnect: ${toError(err).message}`),
        );
      })
      .finally(() => {
        session.reconnecting = null;
      });
  }

  private async close(client: Client): Promise<void> {
    if (client.readyState() !== "OPEN") return;
    try {
      await client.disconnect();
    } catch (err) {
      this.events.emit("error", toError(err));
    }
  }
}
