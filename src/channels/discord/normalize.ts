import type { Message } from "discord.js";
import type { ChatMessage } from "../adapter.js";

export interface DiscordWatch {
  /** Text channel whose messages count as stream chat. */
  readonly channelId: string;
  readonly streamerId?: string;
}

export function normalizeDiscordMessage(msg: Message, watch: DiscordWatch): ChatMessage | null {
  if (msg.author.bot) return null;
  if (msg.channelId !== watch.channelId) return null;

  const isStreamer = watch.streamerId !== undefined && msg.author.id === watch.streamerId;
  const isModerator = isStreamer || (msg.member?.permissions.has("ModerateMembers") ?? false);

  return {
    id: msg.id,
    author: msg.member?.displayName ?? msg.author.displayName,
    content: msg.content,
    isStreamer,
    isModerator,
    timestamp: msg.createdTimestamp,
  };
}
