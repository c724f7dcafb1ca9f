import { Telegraf } from 'telegraf';
import { botLogger, serializeError } from '../logging/index.js';
import { errorMessage } from '../shared/errors.js';
import type { CommandHandler, ReplyOptions } from './commands/index.js';

export const BOT_DESCRIPTION = 'A bot to manage Olas staked services';

export interface Notifier {
  notify(text: string, extra?: ReplyOptions): Promise<void>;
}

/**
 * Telegraf bot bound to one chat: command handlers reply to the sender,
 * `notify` posts to the configured chat.
 */
export class TritonBot implements Notifier {
  readonly bot: Telegraf;

  constructor(
    token: string,
    private readonly chatId: string,
    private readonly handlers: readonly CommandHandler[],
  ) {
    this.bot = new Telegraf(token);

    for (const handler of handlers) {
      this.bot.command(handler.command, async (ctx) => {
        botLogger.info({ command: handler.command, from: ctx.from?.id }, 'Command received');
        try {
          await handler.execute({ reply: (text, extra) => ctx.reply(text, extra) });
        } catch (error) {
          botLogger.error({ command: handler.command, err: serializeError(error) }, 'Command failed');
          await ctx.reply(`/${handler.command} failed: ${errorMessage(error)}`);
        }
      });
    }

    this.bot.catch((error, ctx) => {
      botLogger.error({ updateType: ctx.updateType, err: serializeError(error) }, 'Unhandled bot error');
    });
  }

  /**
   * Publishes the description and the command menu.
   */
  async configure(): Promise<void> {
    await this.bot.telegram.setMyDescription(BOT_DESCRIPTION);
    await this.bot.telegram.setMyShortDescription(BOT_DESCRIPTION);
    await this.bot.telegram.setMyCommands(
      this.handlers.map((handler) => ({ command: handler.command, description: handler.description })),
    );
  }

  async notify(text: string, extra?: ReplyOptions): Promise<void> {
    await this.bot.telegram.sendMessage(this.chatId, text, extra);
  }

  /**
   * Starts long polling. Resolves once the bot has been stopped.
   */
  async launch(): Promise<void> {
    await this.bot.launch(() => {
      botLogger.info('Bot launched');
    });
  }

  stop(reason: string): void {
    this.bot.stop(reason);
  }
}
