// src/config.ts

import { parseArgs } from 'node:util';
import { Result, err, ok } from 'neverthrow';
import { z } from 'zod';
import { toError } from './retry';

export const configSchema = z.object({
  watchRoot: z.string().min(1, 'watch root is required (--watch)'),
  archiveRoot: z.string().min(1, 'archive root is required (--target)'),
  logFile: z.string().min(1).optional(),
  workers: z.coerce.number().int().min(1).default(4),
  dryRun: z.boolean().default(false),
  checksumOnDuplicate: z.boolean().default(true),
  bufferSizeMb: z.coerce
    .number()
    .int()
    .transform((mb) => Math.max(1, mb))
    .default(8),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  quietDelayMs: z.coerce.number().int().min(0).default(5_000),
  journalPath: z.string().min(1).optional(),
});

export type IngestConfig = z.infer<typeof configSchema>;

export type CliValues = {
  watch?: string;
  target?: string;
  log?: string;
  workers?: string;
  'dry-run'?: boolean;
  'no-checksum-dups'?: boolean;
  'buffer-size-mb'?: string;
  'log-level'?: string;
  'quiet-delay-ms'?: string;
  journal?: string;
  help?: boolean;
};

export const usage = `
Usage:
  media-ingest --watch <dir> --target <dir> [options]

Options:
  -w, --watch <dir>          Staging directory to watch
  -t, --target <dir>         Archive root for sorted media
  -l, --log <file>           Also append log lines to this file
      --workers <n>          Parallel workers (default 4)
      --dry-run              Log what would happen, touch nothing
      --no-checksum-dups     Treat equal size as duplicate, skip md5
      --buffer-size-mb <n>   Copy buffer size in MB (default 8, min 1)
      --log-level <level>    debug | info | warn | error (default info)
      --quiet-delay-ms <n>   Wait after a watch event before processing (default 5000)
      --journal <file>       Move journal (default <target>/.media-ingest-journal.json)
  -h, --help                 Show this help message

Every option can also be set as MEDIA_INGEST_<NAME>, e.g. MEDIA_INGEST_WATCH.
`;

export const parseCliArgs = (argv: string[]): Result<CliValues, Error> =>
  Result.fromThrowable(
    () =>
      parseArgs({
        args: argv,
        allowPositionals: false,
        options: {
          watch: { type: 'string', short: 'w' },
          target: { type: 'string', short: 't' },
          log: { type: 'string', short: 'l' },
          workers: { type: 'string' },
          'dry-run': { type: 'boolean' },
          'no-checksum-dups': { type: 'boolean' },
          'buffer-size-mb': { type: 'string' },
          'log-level': { type: 'string' },
          'quiet-delay-ms': { type: 'string' },
          journal: { type: 'string' },
          help: { type: 'boolean', short: 'h' },
        },
      }).values,
    toError,
  )();

const present = (value: string | undefined): string | undefined =>
  value === undefined || value.trim() === '' ? undefined : value.trim();

const envFlag = (value: string | undefined): boolean | undefined => {
  const text = present(value)?.toLowerCase();
  if (text === undefined) return undefined;
  return text === '1' || text === 'true' || text === 'yes';
};

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');

// Flags win over MEDIA_INGEST_* variables; empty values count as unset.
export const loadConfig = (values: CliValues, env: NodeJS.ProcessEnv): Result<IngestConfig, Error> => {
  const pick = (flag: string | undefined, name: string): string | undefined =>
    present(flag) ?? present(env[`MEDIA_INGEST_${name}`]);

  const checksumEnv = envFlag(env.MEDIA_INGEST_CHECKSUM_DUPS);
  const parsed = configSchema.safeParse({
    watchRoot: pick(values.watch, 'WATCH') ?? '',
    archiveRoot: pick(values.target, 'TARGET') ?? '',
    logFile: pick(values.log, 'LOG'),
    workers: pick(values.workers, 'WORKERS'),
    dryRun: values['dry-run'] ?? envFlag(env.MEDIA_INGEST_DRY_RUN),
    checksumOnDuplicate: values['no-checksum-dups'] ? false : checksumEnv,
    bufferSizeMb: pick(values['buffer-size-mb'], 'BUFFER_SIZE_MB'),
    logLevel: pick(values['log-level'], 'LOG_LEVEL')?.toLowerCase(),
    quietDelayMs: pick(values['quiet-delay-ms'], 'QUIET_DELAY_MS'),
    journalPath: pick(values.journal, 'JOURNAL'),
  });

  return parsed.success
    ? ok(parsed.data)
    : err(new Error(`Invalid configuration: ${describeIssues(parsed.error)}`));
};
