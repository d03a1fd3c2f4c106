import { MessageFlags, type ContainerBuilder } from 'discord.js';

export type ReplyFlag = MessageFlags.IsComponentsV2 | MessageFlags.Ephemeral;

/** Payload for interaction replies and follow-ups. */
export interface ReplyPayload {
  components: ContainerBuilder[];
  flags: ReplyFlag[];
  allowedMentions: { parse: [] };
}

/**
 * Payload for channel sends, editReply and message edits, none of which can
 * set visibility.
 */
export interface BasePayload {
  components: ContainerBuilder[];
  flags: MessageFlags.IsComponentsV2[];
  allowedMentions: { parse: [] };
}

export interface PayloadOptions {
  ephemeral?: boolean;
}

const NAMED_FLAGS: Record<string, number> = {
  SuppressEmbeds: MessageFlags.SuppressEmbeds,
  Ephemeral: MessageFlags.Ephemeral,
  SuppressNotifications: MessageFlags.SuppressNotifications,
  IsComponentsV2: MessageFlags.IsComponentsV2,
};

function toList(containers: ContainerBuilder | ContainerBuilder[]): ContainerBuilder[] {
  return Array.isArray(containers) ? containers : [containers];
}

export function replyPayload(
  containers: ContainerBuilder | ContainerBuilder[],
  options: PayloadOptions = {},
): ReplyPayload {
  return {
    components: toList(containers),
    flags: options.ephemeral
      ? [MessageFlags.IsComponentsV2, MessageFlags.Ephemeral]
      : [MessageFlags.IsComponentsV2],
    allowedMentions: { parse: [] },
  };
}

export function basePayload(containers: ContainerBuilder | ContainerBuilder[]): BasePayload {
  return {
    components: toList(containers),
    flags: [MessageFlags.IsComponentsV2],
    allowedMentions: { parse: [] },
  };
}

/** Drops the ephemeral bit so a reply payload can go through editReply or a channel. */
export function toBasePayload(payload: ReplyPayload | BasePayload): BasePayload {
  return basePayload(payload.components);
}

export function isEphemeral(payload: ReplyPayload | BasePayload): boolean {
  return hasFlag(payload.flags, MessageFlags.Ephemeral);
}

/**
 * Reduces any flag shape a caller may hand to discord.js (number, numeric or
 * named string, array, BitField) to its numeric value. Unknown names count as 0.
 */
export function flagBits(flags: unknown): number {
  if (typeof flags === 'number') return flags;
  if (typeof flags === 'bigint') return Number(flags);
  if (typeof flags === 'string') {
    if (/^\d+$/.test(flags)) return Number(flags);
    return NAMED_FLAGS[flags] ?? 0;
  }
  if (Array.isArray(flags)) {
    return flags.reduce<number>((bits, flag) => bits | flagBits(flag), 0);
  }
  if (typeof flags === 'object' && flags !== null && 'bitfield' in flags) {
    return flagBits(flags.bitfield);
  }
  return 0;
}

export function hasFlag(flags: unknown, flag: MessageFlags): boolean {
  return (flagBits(flags) & flag) === flag;
}
