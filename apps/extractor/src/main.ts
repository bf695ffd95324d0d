#!/usr/bin/env node
import 'reflect-metadata';
import { createAppContext } from './app-context';
import { CliUsageError, parseCliArgs, USAGE } from './cli/cli-args';
import { ExtractRunnerService } from './cli/extract-runner.service';

const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

async function bootstrap(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  const app = await createAppContext();
  try {
    const output = await app.get(ExtractRunnerService).run(args);
    process.stdout.write(`${output}\n`);
    return 0;
  } finally {
    await app.close();
  }
}

bootstrap()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof CliUsageError) {
      process.stderr.write(`${err.message}\n\n${USAGE}`);
      process.exitCode = EXIT_USAGE;
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`pancard-extract: ${message}\n`);
    process.exitCode = EXIT_FAILURE;
  });
