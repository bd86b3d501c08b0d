import fs from 'fs-extra';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { DEFAULT_CONFIG } from './config.js';
import { ConfigurationError, CriticalValidationError, ValidationDisabledError } from './errors.js';
import { getSupportedFormats, loadScenarioFile } from './loader.js';
import { parseScenario } from './parser.js';
import { renderHtml } from './renderer.js';
import { buildToc } from './toc.js';
import { reportToJson } from './validation.js';
import { createValidationEngine } from './validators.js';
import type { ConverterConfig } from './config.js';
import type { ScenarioDocument, TocEntry } from './types.js';
import type { ValidationReport } from './validation.js';

export { getSupportedFormats };

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Same place from src/ and from dist/
const BUNDLED_STYLESHEET = path.resolve(__dirname, '..', 'templates', 'style.css');

let bundledStylesheet: string | null = null;

/**
 * Options for a single conversion
 */
export interface ConvertOptions {
  /** Append the validation report to the page (when validation ran) */
  includeValidationReport?: boolean;
}

/**
 * Everything one conversion produced
 */
export interface ConversionResult {
  html: string;
  document: ScenarioDocument;
  toc: TocEntry[];
  /** Null when validation did not run */
  report: ValidationReport | null;
}

export interface ConvertFileOptions extends ConvertOptions {
  /** Also write `<input>.validation.json` */
  writeReport?: boolean;
}

export interface FileConversionResult {
  inputPath: string;
  outputPath: string;
  reportPath?: string;
  report: ValidationReport | null;
}

/**
 * The stylesheet inlined into every page
 */
export function readStylesheet(config: ConverterConfig): string {
  if (config.cssTemplatePath) {
    try {
      return fs.readFileSync(config.cssTemplatePath, 'utf-8');
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Cannot read stylesheet ${config.cssTemplatePath}: ${detail}`);
    }
  }
  bundledStylesheet ??= fs.readFileSync(BUNDLED_STYLESHEET, 'utf-8');
  return bundledStylesheet;
}

function runsValidation(config: ConverterConfig): boolean {
  return config.enableValidation || config.strictMode;
}

/**
 * Convert scenario text, keeping the intermediate document, TOC and report.
 * In strict mode a critical result aborts before anything is rendered.
 */
export function convertText(
  text: string,
  config: ConverterConfig = DEFAULT_CONFIG,
  options: ConvertOptions = {}
): ConversionResult {
  const report = runsValidation(config) ? createValidationEngine(config).validateDocument(text) : null;
  if (config.strictMode && report?.hasCritical()) {
    throw new CriticalValidationError(report);
  }

  const document = parseScenario(text);
  const toc = buildToc(document);
  const html = renderHtml(
    document,
    toc,
    options.includeValidationReport ? report : null,
    config,
    readStylesheet(config)
  );
  return { html, document, toc, report };
}

/**
 * Convert scenario text to a complete HTML page
 */
export function convert(text: string, config: ConverterConfig = DEFAULT_CONFIG, options: ConvertOptions = {}): string {
  return convertText(text, config, options).html;
}

/**
 * Validate without rendering
 */
export function validateOnly(text: string, config: ConverterConfig = DEFAULT_CONFIG): ValidationReport {
  if (!config.enableValidation) {
    throw new ValidationDisabledError();
  }
  return createValidationEngine(config).validateDocument(text);
}

/**
 * Write through a temp file beside the target, so readers never see a
 * half-written file
 */
export async function writeFileAtomic(target: string, content: string): Promise<void> {
  const temp = `${target}.${process.pid}.${Date.now()}.tmp`;
  await fs.outputFile(temp, content, 'utf-8');
  try {
    await fs.rename(temp, target);
  } catch (err) {
    await fs.remove(temp);
    throw err;
  }
}

export function outputPathFor(inputPath: string, config: ConverterConfig): string {
  return `${inputPath}${config.outputSuffix}`;
}

export function reportPathFor(inputPath: string): string {
  return `${inputPath}.validation.json`;
}

/**
 * Load a scenario file, convert it and write the page beside it
 */
export async function convertFile(
  inputPath: string,
  config: ConverterConfig = DEFAULT_CONFIG,
  options: ConvertFileOptions = {}
): Promise<FileConversionResult> {
  const loaded = await loadScenarioFile(inputPath, config);
  const result = convertText(loaded.text, config, options);

  const outputPath = outputPathFor(inputPath, config);
  await writeFileAtomic(outputPath, result.html);
  console.log(`Wrote ${outputPath}`);

  if (!options.writeReport || !result.report) {
    return { inputPath, outputPath, report: result.report };
  }

  const reportPath = reportPathFor(inputPath);
  const json = reportToJson(result.report, inputPath, new Date());
  await writeFileAtomic(reportPath, `${JSON.stringify(json, null, 2)}\n`);
  console.log(`Wrote ${reportPath}`);
  return { inputPath, outputPath, reportPath, report: result.report };
}
