import type { ChatUserstate } from "tmi.js";
import type { ChatMessage } from "../adapter.js";

export function channelLogin(channel: string): string {
  return channel.replace(/^#/, "").trim().toLowerCase();
}

export function formatOAuthToken(token: string): string {
  return token.startsWith("oauth:") ? token : `oauth:${token}`;
}

export function normalizeTwitchMessage(
  tags: ChatUserstate,
  content: string,
  self: boolean,
  streamerLogin: string,
): ChatMessage | null {
  if (self) return null;

  const login = tags.username ?? "";
  const author = tags["display-name"] ?? (login || "unknown");
  const isStreamer =
    tags.badges?.broadcaster === "1" || (login !== "" && login === streamerLogin);

  const sentAt = Number(tags["tmi-sent-ts"]);

  return {
    id: tags.id ?? `${login}-${Number.isFinite(sentAt) ? sentAt : Date.now()}`,
    author,
    content,
    isStreamer,
    isModerator: isStreamer || tags.mod === true,
    timestamp: Number.isFinite(sentAt) ? sentAt : Date.now(),
  };
}
