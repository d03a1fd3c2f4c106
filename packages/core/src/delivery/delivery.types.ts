import type { BasePayload, ReplyPayload } from '../messages/message.payload.js';

/**
 * The slice of a discord.js repliable interaction the messenger drives.
 * ChatInputCommandInteraction, ButtonInteraction and friends satisfy it.
 */
export interface ResponseTarget {
  readonly replied: boolean;
  readonly deferred: boolean;
  reply(options: ReplyPayload): Promise<unknown>;
  editReply(options: BasePayload): Promise<unknown>;
  followUp(options: ReplyPayload): Promise<unknown>;
}

/** A text-based channel. */
export interface SendTarget<T = unknown> {
  send(options: BasePayload): Promise<T>;
}

/** A message the bot has already sent. */
export interface EditTarget<T = unknown> {
  edit(options: BasePayload): Promise<T>;
}

export type ResponseOperation = 'reply' | 'editReply' | 'followUp';
