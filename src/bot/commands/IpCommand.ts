import type { CommandContext, CommandHandler } from './CommandHandler.js';

export class IpCommand implements CommandHandler {
  readonly command = 'ip';
  readonly description = 'Get the bot public IP';

  constructor(private readonly getPublicIp: () => Promise<string>) {}

  async execute(ctx: CommandContext): Promise<void> {
    await ctx.reply(`Public IP address: ${await this.getPublicIp()}`);
  }
}
