import { parseArgs } from 'util';

export const USAGE = `Usage: pancard-extract [options] <image...>

Extracts name, father's name and PAN number from PAN card images and prints JSON.

Options:
  -t, --transcript <file>  extract from an existing OCR transcript ("-" reads stdin)
  -c, --compact            print JSON on a single line
  -h, --help               show this help
`;

export interface CliArgs {
  images: string[];
  transcript?: string;
  compact: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  let parsed: ReturnType<typeof parseOptions>;
  try {
    parsed = parseOptions(argv);
  } catch (err: unknown) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }

  const { values, positionals } = parsed;
  const args: CliArgs = {
    images: positionals,
    transcript: values.transcript,
    compact: values.compact ?? false,
    help: values.help ?? false,
  };
  if (args.help) {
    return args;
  }
  if (args.transcript !== undefined && args.images.length > 0) {
    throw new CliUsageError('Pass either --transcript or image paths, not both');
  }
  if (args.transcript === undefined && args.images.length === 0) {
    throw new CliUsageError('No input given');
  }
  return args;
}

function parseOptions(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      transcript: { type: 'string', short: 't' },
      compact: { type: 'boolean', short: 'c' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}
