import type { ResponseTarget } from '../delivery/delivery.types.js';
import type { Messenger } from '../delivery/messenger.js';

/** The slice of a discord.js chat input interaction the router reads. */
export interface CommandInteraction extends ResponseTarget {
  readonly commandName: string;
  /** null outside a guild */
  readonly memberPermissions: { has(permission: bigint): boolean } | null;
}

export interface CommandContext {
  messenger: Messenger;
  commands(): CommandHandler[];
}

export interface CommandHandler {
  name: string;
  description: string;
  /** Invocation shown when the handler throws UsageError, e.g. `/remind <time> <text>` */
  usage?: string;
  /** PermissionFlagsBits value(s) the member must hold */
  requiredPermissions?: bigint;
  execute(interaction: CommandInteraction, ctx: CommandContext): Promise<void>;
}

/** Thrown by handlers when the invocation itself is wrong. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class DuplicateCommandError extends Error {
  constructor(name: string) {
    super(`Command "/${name}" is already registered`);
    this.name = 'DuplicateCommandError';
  }
}
