#!/usr/bin/env node
import { parseCliArgs, renderHelpText } from './cli-args';
import { EXIT_CODES } from './constants/config';
import { errorMessage, PipelineSchemaError } from './errors';
import { defineConfig } from './index';

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (parsed.help) {
    process.stdout.write(`${renderHelpText()}\n`);
    return;
  }
  if (parsed.error) {
    process.stderr.write(`avatar-batch-export: ${parsed.error}\n`);
    process.stderr.write(`${renderHelpText()}\n`);
    process.exitCode = EXIT_CODES.USAGE;
    return;
  }

  try {
    const summary = await defineConfig(parsed.config).run();
    process.exitCode = summary.exitCode;
  } catch (error) {
    process.stderr.write(`avatar-batch-export failed: ${errorMessage(error)}\n`);
    if (error instanceof PipelineSchemaError) {
      for (const line of error.getFormattedErrors()) {
        process.stderr.write(`  ${line}\n`);
      }
    }
    process.exitCode = EXIT_CODES.USAGE;
  }
}

main().catch((error: unknown) => {
  process.stderr.write(`avatar-batch-export failed: ${errorMessage(error)}\n`);
  process.exitCode = EXIT_CODES.USAGE;
});
