import type { JobInfo } from '../../scheduler/JobQueue.js';
import { formatDate } from '../../shared/time.js';
import { formatJobs } from '../format.js';
import type { CommandContext, CommandHandler } from './CommandHandler.js';

export class JobsCommand implements CommandHandler {
  readonly command = 'jobs';
  readonly description = 'Check the scheduled jobs';

  constructor(
    private readonly listJobs: () => JobInfo[],
    private readonly timezone: string,
  ) {}

  async execute(ctx: CommandContext): Promise<void> {
    const jobs = this.listJobs().map((job) => ({
      name: job.name,
      nextRun: formatDate(job.nextRun, this.timezone),
    }));
    await ctx.reply(formatJobs(jobs));
  }
}
