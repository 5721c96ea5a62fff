import { EXPORT_FORMATS } from './constants/export';
import type { PipelineConfigInput } from './schemas';

export interface ParsedCliArgs {
  config: PipelineConfigInput;
  help?: boolean;
  error?: string;
}

const POSITIONAL_KEYS = ['inputDir', 'outputDir', 'doneDir', 'failedDir'] as const;

export function renderHelpText(): string {
  return [
    'Usage: avatar-batch-export [INPUT] [OUTPUT] [DONE] [FAILED] [options]',
    '',
    'Folders default to vrm_in, export_out, vrm_done and vrm_failed in the current directory.',
    '',
    'Options:',
    '  --conversion-only, --headless   Skip rig binding; export the imported skeleton as-is',
    `  --primary-format <format>       Format that decides success (${EXPORT_FORMATS.join(', ')}; default fbx)`,
    '  --verbose                       Debug logging',
    '  --no-color                      Plain console output',
    '  -h, --help                      Show this help',
  ].join('\n');
}

export function parseCliArgs(argv: readonly string[]): ParsedCliArgs {
  const config: PipelineConfigInput = {};
  const positional: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === '--') {
      continue;
    }
    if (arg === '-h' || arg === '--help') {
      return { config, help: true };
    }
    if (arg === '--conversion-only' || arg === '--headless') {
      config.conversionOnly = true;
      continue;
    }
    if (arg === '--verbose') {
      config.logLevel = 'debug';
      continue;
    }
    if (arg === '--no-color') {
      config.color = false;
      continue;
    }
    if (arg === '--primary-format') {
      const value = argv[index + 1];
      const format = EXPORT_FORMATS.find(f => f === value?.toLowerCase());
      if (!format) {
        return { config, error: value ? `Invalid --primary-format value "${value}".` : '--primary-format requires a value.' };
      }
      config.primaryFormat = format;
      index += 1;
      continue;
    }
    if (arg.startsWith('-')) {
      return { config, error: `Unknown option "${arg}".` };
    }
    positional.push(arg);
  }

  if (positional.length > POSITIONAL_KEYS.length) {
    return { config, error: `Too many folders: expected at most ${POSITIONAL_KEYS.length}.` };
  }
  positional.forEach((value, i) => {
    config[POSITIONAL_KEYS[i]] = value;
  });

  return { config };
}
