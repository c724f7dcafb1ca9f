import type { StakedService } from '../../service/StakedService.js';
import { withdrawAll } from '../actions.js';
import { MARKDOWN_REPLY, type CommandContext, type CommandHandler } from './CommandHandler.js';

export class WithdrawCommand implements CommandHandler {
  readonly command = 'withdraw';
  readonly description = 'Withdraw rewards';

  constructor(private readonly services: readonly StakedService[]) {}

  async execute(ctx: CommandContext): Promise<void> {
    const messages = await withdrawAll(this.services);
    await ctx.reply(messages.length > 0 ? messages.join('\n\n') : 'No services configured', MARKDOWN_REPLY);
  }
}
