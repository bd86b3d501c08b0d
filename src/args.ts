import { deriveConfig } from './config.js';
import type { ConfigOverrides, ConverterConfig } from './config.js';

export const USAGE = [
  'Usage: scenario-weaver <input.txt|input.docx> [options]',
  '',
  'Options:',
  '  --validate       run notation checks',
  '  --report         append the check results to the page (implies --validate)',
  '  --json-report    write <input>.validation.json (implies --validate)',
  '  --strict         stop without output when a critical problem is found',
  '  --beginner       add hints for common notation slips',
  '  --config=<path>  read options from a JSON file'
].join('\n');

/**
 * Parsed command line
 */
export interface CliArgs {
  input: string;
  validate: boolean;
  report: boolean;
  jsonReport: boolean;
  strict: boolean;
  beginner: boolean;
  configPath?: string;
}

const FLAGS = ['--validate', '--report', '--json-report', '--strict', '--beginner'] as const;

/**
 * Parse argv (without node and the script). Returns an error message for
 * anything it cannot use.
 */
export function parseCliArgs(argv: string[]): CliArgs | string {
  const positional: string[] = [];
  const seen = new Set<string>();
  let configPath: string | undefined;

  for (const arg of argv) {
    if (arg.startsWith('--config=')) {
      configPath = arg.slice('--config='.length);
      if (!configPath) return 'Missing path after --config=';
    } else if (FLAGS.some(flag => flag === arg)) {
      seen.add(arg);
    } else if (arg.startsWith('--')) {
      return `Unknown option: ${arg}`;
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    return positional.length === 0 ? 'Missing input file' : 'Only one input file can be converted at a time';
  }

  return {
    input: positional[0],
    validate: seen.has('--validate'),
    report: seen.has('--report'),
    jsonReport: seen.has('--json-report'),
    strict: seen.has('--strict'),
    beginner: seen.has('--beginner'),
    configPath
  };
}

/**
 * Apply command line switches on top of a base config
 */
export function configFromArgs(args: CliArgs, base: ConverterConfig): ConverterConfig {
  const validate = args.validate || args.report || args.jsonReport || args.strict || args.beginner;
  const overrides: ConfigOverrides = {
    ...(validate ? { enableValidation: true } : {}),
    ...(args.strict ? { strictMode: true } : {}),
    ...(args.beginner ? { beginnerMode: true } : {})
  };
  return deriveConfig(base, overrides);
}
