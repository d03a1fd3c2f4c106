import type { CommandHandler } from '../command.types.js';

export const helpHandler: CommandHandler = {
  name: 'help',
  description: 'Show all available commands',

  async execute(interaction, ctx) {
    const lines = ctx
      .commands()
      .slice()
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((cmd) => `\`/${cmd.name}\` ${cmd.description}`);
    const { messenger } = ctx;
    await messenger.respond(
      interaction,
      messenger.kit.info(lines.join('\n'), { title: 'Commands', ephemeral: true }),
    );
  },
};
