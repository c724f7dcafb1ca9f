import type { StakedService } from '../../service/StakedService.js';
import { collectBalances } from '../actions.js';
import { MARKDOWN_REPLY, type CommandContext, type CommandHandler } from './CommandHandler.js';

export class BalanceCommand implements CommandHandler {
  readonly command = 'balance';
  readonly description = 'Check wallet balances';

  constructor(private readonly services: readonly StakedService[]) {}

  async execute(ctx: CommandContext): Promise<void> {
    const messages = await collectBalances(this.services);
    await ctx.reply(messages.length > 0 ? messages.join('\n\n') : 'No services configured', MARKDOWN_REPLY);
  }
}
