import type { ChainReader } from '../../chain/ChainClient.js';
import type { StakingContractEntry } from '../../config/index.js';
import { getAvailableSlots } from '../../staking/slots.js';
import { formatSlots } from '../format.js';
import type { CommandContext, CommandHandler } from './CommandHandler.js';

export class SlotsCommand implements CommandHandler {
  readonly command = 'slots';
  readonly description = 'Check available staking slots';

  constructor(
    private readonly reader: ChainReader,
    private readonly contracts?: readonly StakingContractEntry[],
  ) {}

  async execute(ctx: CommandContext): Promise<void> {
    const slots = await getAvailableSlots(this.reader, this.contracts);
    await ctx.reply(formatSlots(slots));
  }
}
