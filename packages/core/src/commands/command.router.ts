import { createLogger, describeError, type Logger } from '../logging/logger.js';
import type { Messenger } from '../delivery/messenger.js';
import {
  DuplicateCommandError,
  UsageError,
  type CommandContext,
  type CommandHandler,
  type CommandInteraction,
} from './command.types.js';
import { helpHandler } from './handlers/help.handler.js';

// ---------------------------------------------------------------------------
// CommandRouter
// ---------------------------------------------------------------------------

/**
 * Routes chat input interactions to registered handlers. Every outcome,
 * including unknown commands, missing permissions and handler failures,
 * is answered with a convention-styled ephemeral message.
 */
export class CommandRouter {
  private readonly handlers = new Map<string, CommandHandler>();
  private readonly ctx: CommandContext;

  constructor(
    private readonly messenger: Messenger,
    private readonly logger: Logger = createLogger('router', messenger.config.logs.level),
  ) {
    this.ctx = { messenger, commands: () => this.list() };
    this.register(helpHandler);
  }

  register(handler: CommandHandler): this {
    if (this.handlers.has(handler.name)) {
      throw new DuplicateCommandError(handler.name);
    }
    this.handlers.set(handler.name, handler);
    return this;
  }

  list(): CommandHandler[] {
    return Array.from(this.handlers.values());
  }

  async dispatch(interaction: CommandInteraction): Promise<void> {
    const { kit } = this.messenger;
    const name = interaction.commandName;
    const handler = this.handlers.get(name);

    if (!handler) {
      this.logger.warn(`unknown command /${name}`);
      await this.messenger.respond(
        interaction,
        kit.message('usage', `Unknown command \`/${name}\`. Use \`/help\` to see available commands.`, {
          ephemeral: true,
        }),
      );
      return;
    }

    if (
      handler.requiredPermissions !== undefined &&
      !interaction.memberPermissions?.has(handler.requiredPermissions)
    ) {
      this.logger.info(`permission denied for /${name}`);
      await this.messenger.respond(interaction, kit.permissionDenied(undefined, { ephemeral: true }));
      return;
    }

    try {
      this.logger.debug(`dispatching /${name}`);
      await handler.execute(interaction, this.ctx);
    } catch (err) {
      if (err instanceof UsageError) {
        this.logger.debug(`usage error in /${name}: ${describeError(err)}`);
        await this.messenger.respond(
          interaction,
          kit.usage(handler.usage ?? `/${name}`, { reason: err.message, ephemeral: true }),
        );
        return;
      }
      await this.messenger.notifyFailure(interaction, err, `Could not run /${name}`);
    }
  }
}
