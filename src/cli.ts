// src/cli.ts
import { format } from 'date-fns';
import yargs from 'yargs/yargs';
import type { Auth } from 'googleapis';
import { authorize, type AuthorizeOptions } from './auth.js';
import { createCalendarSource, createEventsApi, type EventsApi } from './calendar.js';
import { loadConfig, type AppConfig } from './config.js';
import { AuthError, ConfigError, TransportError, UsageError } from './errors.js';
import { describeDecision } from './events.js';
import { runPurge } from './purge/engine.js';
import { planPurge, type PurgeFlags } from './purge/plan.js';
import { formatReport } from './purge/report.js';

export const ExitCode = {
  Ok: 0,
  Fatal: 1,
  Usage: 2,
  Interrupted: 130,
} as const;

export interface CliDeps {
  env: NodeJS.ProcessEnv;
  now: () => Date;
  authorize: (opts: AuthorizeOptions) => Promise<Auth.OAuth2Client>;
  createEventsApi: (auth: Auth.OAuth2Client) => EventsApi;
  signal?: AbortSignal;
}

export function parseFlags(args: string[]): PurgeFlags {
  const argv = yargs(args)
    .scriptName('calendar-purge')
    .usage('$0 [--confirm-delete] [--delete-all] [--calendar-id <id>]')
    .option('confirm-delete', {
      type: 'boolean',
      default: false,
      describe: 'Confirm the event deletion. By default no events are deleted.',
    })
    .option('delete-all', {
      type: 'boolean',
      default: false,
      describe: 'Also delete events in the future. By default only past events are deleted.',
    })
    .option('calendar-id', {
      type: 'string',
      describe: 'Calendar to purge (defaults to CALENDAR_ID, then "primary")',
    })
    // a bare `--calendar-id` parses as ''
    .check((argv) => argv.calendarId !== '' || '--calendar-id needs a calendar id')
    .strict()
    .fail((msg, err) => {
      throw err ?? new UsageError(msg);
    })
    .help()
    .parseSync();

  return {
    confirmDelete: argv.confirmDelete,
    deleteAll: argv.deleteAll,
    calendarId: argv.calendarId,
  };
}

function printBanner(plan: { dryRun: boolean; timeMin: Date; timeMax: Date }, calendarId: string) {
  console.log(
    `This script will delete all events between ${format(plan.timeMin, 'yyyy-MM-dd')} ` +
      `and ${format(plan.timeMax, 'yyyy-MM-dd')} in calendar "${calendarId}"\n`,
  );
  if (plan.dryRun) {
    console.log('*** Simulation mode - No event will be deleted ***\n');
  }
}

/** Run the purge end to end and return the process exit code. */
export async function runCli(args: string[], deps: Partial<CliDeps> = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const now = deps.now ?? (() => new Date());

  let flags: PurgeFlags;
  let config: AppConfig;
  try {
    flags = parseFlags(args);
    config = loadConfig(env);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`${err.message}\nRun with --help for usage.`);
      return ExitCode.Usage;
    }
    if (err instanceof ConfigError) {
      console.error(`[config] ${err.message}`);
      return ExitCode.Fatal;
    }
    throw err;
  }

  const calendarId = flags.calendarId ?? config.calendarId;
  const plan = planPurge(flags, config.timeMin, now());
  printBanner(plan, calendarId);

  let auth: Auth.OAuth2Client;
  try {
    auth = await (deps.authorize ?? authorize)({
      credentialsPath: config.credentialsPath,
      tokenPath: config.tokenPath,
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      signal: deps.signal,
    });
  } catch (err) {
    if (!(err instanceof AuthError)) throw err;
    console.error(`[auth] ${err.message}`);
    return deps.signal?.aborted ? ExitCode.Interrupted : ExitCode.Fatal;
  }

  const source = createCalendarSource((deps.createEventsApi ?? createEventsApi)(auth), {
    calendarId,
    timeMin: plan.timeMin,
    timeMax: plan.timeMax,
    pageSize: config.pageSize,
    deleteDelayMs: config.deleteDelayMs,
    sendUpdates: config.sendUpdates,
  });

  try {
    const report = await runPurge({
      ...source,
      predicate: plan.predicate,
      dryRun: plan.dryRun,
      signal: deps.signal,
      onDecision: (item, decision, error, outcome) => {
        if (decision === 'kept') return;
        console.log(describeDecision(item, decision, outcome));
        if (error) console.error(`[purge] ${item.id}: ${error.message}`);
      },
    });

    console.log(`\n${formatReport(report)}`);
    if (!plan.dryRun && report.deletedOk > 0) {
      console.log(
        "Deleted events have been moved to the trash. Don't forget to empty it:\n" +
          'https://calendar.google.com/calendar/r/trash\n' +
          'Events in trash are automatically deleted after 30 days.',
      );
    }
    return report.cancelled ? ExitCode.Interrupted : ExitCode.Ok;
  } catch (err) {
    if (!(err instanceof TransportError)) throw err;
    console.error(`[purge] ${err.message}`);
    console.log(`\n${formatReport(err.report)}`);
    return ExitCode.Fatal;
  }
}
