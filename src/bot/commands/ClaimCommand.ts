import type { StakedService } from '../../service/StakedService.js';
import { claimAll } from '../actions.js';
import type { CommandContext, CommandHandler } from './CommandHandler.js';

export class ClaimCommand implements CommandHandler {
  readonly command = 'claim';
  readonly description = 'Claim rewards';

  constructor(
    private readonly services: readonly StakedService[],
    private readonly manualClaimEnabled: boolean,
  ) {}

  async execute(ctx: CommandContext): Promise<void> {
    if (!this.manualClaimEnabled) {
      await ctx.reply('Manual claim is disabled');
      return;
    }

    const messages = await claimAll(this.services);
    await ctx.reply(messages.length > 0 ? messages.join('\n\n') : 'No rewards claimed');
  }
}
