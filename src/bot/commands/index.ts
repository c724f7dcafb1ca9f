export type { CommandContext, CommandHandler, ReplyOptions } from './CommandHandler.js';
export { MARKDOWN_REPLY } from './CommandHandler.js';
export { BalanceCommand } from './BalanceCommand.js';
export { ClaimCommand } from './ClaimCommand.js';
export { IpCommand } from './IpCommand.js';
export { JobsCommand } from './JobsCommand.js';
export { SlotsCommand } from './SlotsCommand.js';
export { StakingStatusCommand } from './StakingStatusCommand.js';
export { WithdrawCommand } from './WithdrawCommand.js';
