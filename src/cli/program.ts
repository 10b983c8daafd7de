import { Argument, Command } from 'commander';
import { formatRunResult } from '../reconciler/summary.js';
import { runJob, type RunJobOptions, type RunOutcome } from '../jobs/runner.js';
import { JOB_NAMES, type JobName } from '../types/config.js';

const JOB_DESCRIPTIONS: Record<JobName, string> = {
  'slack-to-trello': 'Turn funding announcements in a Slack channel into Trello cards',
  'mirror-cards': 'Mirror priority and nearly-done cards into the master board',
  'card-maintenance': 'Archive completed cards and push overdue due dates to next Monday',
};

export function isJobName(value: string): value is JobName {
  return JOB_NAMES.some((name) => name === value);
}

export interface ProgramIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  setExitCode: (code: number) => void;
  /** Defaults to runJob */
  run?: (job: JobName, options: RunJobOptions) => Promise<RunOutcome>;
}

interface RunCommandOptions {
  config?: string;
  dryRun?: boolean;
  stateDir?: string;
}

/**
 * Build the `board-sync` command line
 */
export function createProgram(io: ProgramIo): Command {
  const run = io.run ?? runJob;
  const program = new Command();

  program
    .name('board-sync')
    .description('Scheduled reconciliation jobs that keep Trello boards in step with Slack and other boards')
    .version('0.1.0')
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr,
    });

  program
    .command('run')
    .description('Run one sync job; the exit code is 0 (clean), 1 (item errors) or 2 (aborted)')
    .addArgument(new Argument('<job>', 'job to run').choices(JOB_NAMES))
    .option('-c, --config <path>', 'configuration file (default: $SYNC_CONFIG or sync.config.yaml)')
    .option('-n, --dry-run', 'plan the changes without applying them')
    .option('-s, --state-dir <dir>', 'directory holding the sync state files')
    .action(async (job: string, options: RunCommandOptions) => {
      if (!isJobName(job)) {
        io.stderr(`Unknown job: ${job}\n`);
        io.setExitCode(2);
        return;
      }

      const outcome = await run(job, {
        configPath: options.config,
        dryRun: options.dryRun,
        stateDir: options.stateDir,
      });

      if (outcome.result) {
        io.stdout(formatRunResult(outcome.result));
      }
      if (outcome.error) {
        io.stderr(`Error: ${outcome.error.message}\n`);
      }
      io.setExitCode(outcome.exitCode);
    });

  program
    .command('jobs')
    .description('List the available jobs')
    .action(() => {
      for (const name of JOB_NAMES) {
        io.stdout(`${name.padEnd(18)}${JOB_DESCRIPTIONS[name]}\n`);
      }
    });

  return program;
}
