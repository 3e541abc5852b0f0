import tmi from "tmi.js";
import type { Client } from "tmi.js";
import type { ChatConfig } from "../../config/types.js";
import { channelLogin, formatOAuthToken } from "./normalize.js";

/**
 * Joins one channel. Without a token the client connects anonymously,
 * read-only. Reconnecting is left to the adapter.
 */
export function createTwitchClient(config: ChatConfig): Client {
  const identity =
    config.token && config.username
      ? { username: config.username, password: formatOAuthToken(config.token) }
      : undefined;

  return tmi.client({
    options: { skipUpdatingEmotesets: true },
    connection: { reconnect: false, secure: true },
    identity,
    channels: [channelLogin(config.channel)],
  });
}
