export * from './types.js';
export * from './errors.js';
export {
  DEFAULT_CONFIG,
  CONFIG_PRESETS,
  deriveConfig,
  parseConfigOverrides,
  loadConfigFile
} from './config.js';
export type { ConverterConfig, ConfigOverrides, ConfigPreset } from './config.js';
export { classifyLine, classifyLines } from './classifier.js';
export type { ClassifiedLine, LineKind, LineContext } from './classifier.js';
export { transformInline, runsToSource } from './inline.js';
export { slugify, AnchorRegistry } from './anchors.js';
export { parseScenario, walkBlocks } from './parser.js';
export { buildToc, flattenToc } from './toc.js';
export { ValidationEngine, ValidationReport, reportToJson } from './validation.js';
export type {
  ValidationLevel,
  ValidationResult,
  ValidationUnit,
  Validator,
  ValidationReportJson
} from './validation.js';
export { createValidationEngine } from './validators.js';
export { renderHtml } from './renderer.js';
export { getSupportedFormats, loadScenarioFile } from './loader.js';
export { convert, convertText, convertFile, validateOnly } from './converter.js';
export type { ConvertOptions, ConversionResult, ConvertFileOptions, FileConversionResult } from './converter.js';
export { createApp } from './app.js';
