/**
 * Command handler contract. Handlers only need to reply, so they take the
 * narrow slice of the Telegraf context they use.
 */

export interface ReplyOptions {
  parse_mode?: 'Markdown';
  link_preview_options?: { is_disabled: boolean };
}

export interface CommandContext {
  reply(text: string, extra?: ReplyOptions): Promise<unknown>;
}

export interface CommandHandler {
  /** Command name without the leading slash */
  readonly command: string;
  /** Shown in the Telegram command menu */
  readonly description: string;
  execute(ctx: CommandContext): Promise<void>;
}

export const MARKDOWN_REPLY = {
  parse_mode: 'Markdown',
  link_preview_options: { is_disabled: true },
} satisfies ReplyOptions;
