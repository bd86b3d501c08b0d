#!/usr/bin/env node
import { parseCliArgs, configFromArgs, USAGE } from './args.js';
import { DEFAULT_CONFIG, loadConfigFile } from './config.js';
import { convertFile } from './converter.js';
import { CriticalValidationError } from './errors.js';
import { VALIDATION_LEVELS } from './validation.js';
import type { ValidationReport } from './validation.js';

function printReport(report: ValidationReport) {
  const counts = VALIDATION_LEVELS.map(level => `${level}: ${report.summary[level]}`).join(', ');
  console.log(`Validation: ${counts}`);
  for (const result of report.results) {
    const where = result.lineNumber !== undefined ? `${result.lineNumber}行目: ` : '';
    console.log(`  [${result.level}] ${where}${result.message}`);
  }
}

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  if (typeof args === 'string') {
    console.error(args);
    console.error(USAGE);
    process.exit(1);
  }

  const base = args.configPath ? await loadConfigFile(args.configPath) : DEFAULT_CONFIG;
  const config = configFromArgs(args, base);

  console.log(`Converting ${args.input}`);
  try {
    const result = await convertFile(args.input, config, {
      includeValidationReport: args.report,
      writeReport: args.jsonReport
    });
    if (result.report) {
      printReport(result.report);
    }
  } catch (err) {
    if (err instanceof CriticalValidationError) {
      printReport(err.report);
    }
    throw err;
  }
}

main().catch(err => {
  console.error(`Conversion failed: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
