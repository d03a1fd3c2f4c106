import { describe, it, expect } from 'vitest';
import { ContainerBuilder, MessageFlags } from 'discord.js';
import { basePayload, flagBits, hasFlag, isEphemeral, replyPayload, toBasePayload } from './message.payload.js';

describe('flagBits', () => {
  it('reads numbers, numeric strings and names', () => {
    expect(flagBits(MessageFlags.IsComponentsV2)).toBe(32768);
    expect(flagBits('32832')).toBe(32832);
    expect(flagBits('Ephemeral')).toBe(64);
    expect(flagBits(64n)).toBe(64);
  });

  it('combines arrays and bitfield objects', () => {
    expect(flagBits([MessageFlags.IsComponentsV2, 'Ephemeral'])).toBe(32832);
    expect(flagBits({ bitfield: 4 })).toBe(4);
  });

  it('treats missing or unknown input as no flags', () => {
    expect(flagBits(undefined)).toBe(0);
    expect(flagBits('NotAFlag')).toBe(0);
  });
});

describe('payload helpers', () => {
  const container = new ContainerBuilder().addTextDisplayComponents((t) => t.setContent('hi'));

  it('hasFlag checks a single bit', () => {
    expect(hasFlag([MessageFlags.IsComponentsV2, MessageFlags.Ephemeral], MessageFlags.Ephemeral)).toBe(true);
    expect(hasFlag(MessageFlags.Ephemeral, MessageFlags.IsComponentsV2)).toBe(false);
  });

  it('toBasePayload drops the ephemeral flag', () => {
    const reply = replyPayload(container, { ephemeral: true });
    expect(isEphemeral(reply)).toBe(true);
    expect(toBasePayload(reply)).toEqual(basePayload(container));
    expect(toBasePayload(reply).flags).toEqual([MessageFlags.IsComponentsV2]);
  });
});
