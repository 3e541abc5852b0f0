import type { TypedEventEmitter } from "../utils/typed-emitter.js";
import type { ChatConfig } from "../config/types.js";

export interface ChatMessage {
  readonly id: string;
  readonly author: string;
  readonly content: string;
  readonly isStreamer: boolean;
  readonly isModerator: boolean;
  readonly timestamp: number;
}

export interface ChatEvents {
  message: [msg: ChatMessage];
  error: [err: Error];
  connected: [];
  disconnected: [reason?: string];
}

/**
 * A read-only chat source. Adapters drop their own (echo) messages before
 * emitting `message`.
 */
export interface ChatAdapter {
  readonly id: string;
  readonly label: string;
  readonly events: TypedEventEmitter<ChatEvents>;

  start(config: ChatConfig, signal: AbortSignal): Promise<void>;
  stop(): Promise<void>;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
