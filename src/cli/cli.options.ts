import { parseArgs } from 'node:util';
import { z } from 'zod';
import { getErrorMessage, UsageError } from '../common/errors';
import { TrackerConfig } from '../config/tracker.config';
import { PlotOptions } from '../plot/plot.service';
import { DelayPolicy, TrackOptions } from '../tracker/interfaces/listing.interface';

export type CliCommand =
  | { mode: 'help' }
  | { mode: 'track'; track: TrackOptions }
  | { mode: 'watch'; track: TrackOptions; intervalMinutes: number }
  | { mode: 'plot'; plot: PlotOptions };

export const USAGE = `Usage: price-tracker [--mode track|plot|watch] [options]

Track mode (default) and watch mode:
  --input <csv>             product list with a 'keyword' or 'product' column
  --output <csv>            history file to append to
  --limit <n>               listings recorded per keyword
  --max-products <n>        only track the first n products
  --delay <seconds>         fixed pause between keywords
  --delay-min <seconds>     lower bound of the random pause
  --delay-max <seconds>     upper bound of the random pause
  --interval-minutes <n>    watch mode: minutes between runs

Plot mode:
  --keyword <text>          substring to match against keywords and titles
  --output, --history <csv> history file to read
  --chart <svg>             chart file to write
  --filtered-output <csv>   also save the matching rows

  --help                    show this message
`;

const FLAGS = {
  mode: { type: 'string' },
  input: { type: 'string' },
  output: { type: 'string' },
  history: { type: 'string' },
  limit: { type: 'string' },
  'max-products': { type: 'string' },
  delay: { type: 'string' },
  'delay-min': { type: 'string' },
  'delay-max': { type: 'string' },
  'interval-minutes': { type: 'string' },
  keyword: { type: 'string' },
  chart: { type: 'string' },
  'filtered-output': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

const path = z.string().trim().min(1);
const count = z.coerce.number().int().positive();
const seconds = z.coerce.number().nonnegative();

const FlagsSchema = z
  .object({
    mode: z.enum(['track', 'plot', 'watch']).default('track'),
    input: path.optional(),
    output: path.optional(),
    history: path.optional(),
    limit: count.optional(),
    'max-products': count.optional(),
    delay: seconds.optional(),
    'delay-min': seconds.optional(),
    'delay-max': seconds.optional(),
    'interval-minutes': z.coerce.number().positive().optional(),
    keyword: z.string().trim().min(1).optional(),
    chart: path.optional(),
    'filtered-output': path.optional(),
    help: z.boolean().optional(),
  })
  .refine(
    (flags) =>
      flags['delay-min'] === undefined ||
      flags['delay-max'] === undefined ||
      flags['delay-min'] <= flags['delay-max'],
    { message: '--delay-min must not exceed --delay-max' },
  );

type Flags = z.infer<typeof FlagsSchema>;

export function parseCliArgs(argv: string[], config: TrackerConfig): CliCommand {
  let values: unknown;
  try {
    ({ values } = parseArgs({ args: argv, options: FLAGS, strict: true, allowPositionals: false }));
  } catch (error) {
    throw new UsageError(getErrorMessage(error));
  }

  const parsed = FlagsSchema.safeParse(values);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `--${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new UsageError(issues.join('; '));
  }
  const flags = parsed.data;
  if (flags.help) return { mode: 'help' };

  switch (flags.mode) {
    case 'track':
      return { mode: 'track', track: toTrackOptions(flags, config) };
    case 'watch':
      return {
        mode: 'watch',
        track: toTrackOptions(flags, config),
        intervalMinutes: flags['interval-minutes'] ?? config.tracking.intervalMinutes,
      };
    case 'plot':
      if (!flags.keyword) {
        throw new UsageError('--keyword is required in plot mode');
      }
      return {
        mode: 'plot',
        plot: {
          historyFile: flags.history ?? flags.output ?? config.files.historyFile,
          keyword: flags.keyword,
          chartFile: flags.chart ?? config.files.chartFile,
          filteredOutput: flags['filtered-output'],
        },
      };
  }
}

function toTrackOptions(flags: Flags, config: TrackerConfig): TrackOptions {
  return {
    inputFile: flags.input ?? config.files.productsFile,
    outputFile: flags.output ?? flags.history ?? config.files.historyFile,
    resultLimit: flags.limit,
    maxProducts: flags['max-products'],
    delay: toDelayPolicy(flags, config),
  };
}

function toDelayPolicy(flags: Flags, config: TrackerConfig): DelayPolicy {
  if (flags.delay !== undefined) {
    return { kind: 'fixed', ms: flags.delay * 1000 };
  }
  const minMs = flags['delay-min'] !== undefined ? flags['delay-min'] * 1000 : config.tracking.delayMinMs;
  const maxMs = flags['delay-max'] !== undefined ? flags['delay-max'] * 1000 : config.tracking.delayMaxMs;
  if (minMs > maxMs) {
    throw new UsageError(`Random delay bounds are inverted: ${minMs}ms > ${maxMs}ms`);
  }
  return { kind: 'random', minMs, maxMs };
}
