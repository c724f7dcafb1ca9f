import type { StakedService } from '../../service/StakedService.js';
import { collectStakingStatus } from '../actions.js';
import type { CommandContext, CommandHandler } from './CommandHandler.js';

export class StakingStatusCommand implements CommandHandler {
  readonly command = 'staking_status';
  readonly description = 'Staking status';

  constructor(
    private readonly services: readonly StakedService[],
    private readonly getOlasPrice: () => Promise<number | null>,
  ) {}

  async execute(ctx: CommandContext): Promise<void> {
    const messages = await collectStakingStatus(this.services, this.getOlasPrice);
    await ctx.reply(messages.join('\n\n'));
  }
}
