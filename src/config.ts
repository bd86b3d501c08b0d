/**
 * Converter configuration.
 *
 * A config is a frozen value. Changing an option means deriving a new one
 * with `deriveConfig`; nothing mutates a config in place, so overlapping
 * conversions with different options never interfere.
 *
 * Config files are JSON with the snake_case option names
 * (`enable_validation`, `custom_skills`, ...).
 */

import fs from "fs-extra";
import { ConfigurationError } from "./errors.js";

export interface ConverterConfig {
  // Validation
  readonly enableValidation: boolean;
  readonly strictMode: boolean;
  readonly trpgSystem: string;
  readonly customSkills: readonly string[];
  readonly beginnerMode: boolean;
  readonly headingMaxLength: number;
  readonly recommendedHeadingDepth: number;

  // HTML output
  readonly htmlTitle: string;
  readonly includeToc: boolean;
  readonly tocTitle: string;
  /** Stylesheet inlined into the page; the bundled one when absent */
  readonly cssTemplatePath?: string;
  readonly outputSuffix: string;

  // Loading
  readonly defaultEncoding: string;
  readonly supportedEncodings: readonly string[];
  /** Bytes */
  readonly maxFileSize: number;
  readonly encodingConfidenceThreshold: number;
}

export type ConfigOverrides = Partial<ConverterConfig>;

export const DEFAULT_CONFIG: ConverterConfig = freezeConfig({
  enableValidation: false,
  strictMode: false,
  trpgSystem: "CoC6",
  customSkills: [],
  beginnerMode: false,
  headingMaxLength: 100,
  recommendedHeadingDepth: 3,
  htmlTitle: "TRPGシナリオ",
  includeToc: true,
  tocTitle: "目次",
  outputSuffix: ".html",
  defaultEncoding: "utf-8",
  supportedEncodings: ["utf-8", "shift_jis", "euc-jp", "iso-2022-jp"],
  maxFileSize: 50 * 1024 * 1024,
  encodingConfidenceThreshold: 0.7
});

function freezeConfig(config: ConverterConfig): ConverterConfig {
  return Object.freeze({
    ...config,
    customSkills: Object.freeze([...config.customSkills]),
    supportedEncodings: Object.freeze([...config.supportedEncodings])
  });
}

/**
 * Return a new config with the overrides applied. The base is untouched.
 */
export function deriveConfig(base: ConverterConfig, overrides: ConfigOverrides = {}): ConverterConfig {
  return freezeConfig({ ...base, ...overrides });
}

export const CONFIG_PRESETS = {
  default: DEFAULT_CONFIG,
  beginner: deriveConfig(DEFAULT_CONFIG, { enableValidation: true, beginnerMode: true, strictMode: false }),
  strict: deriveConfig(DEFAULT_CONFIG, { enableValidation: true, strictMode: true, beginnerMode: false })
} as const;

export type ConfigPreset = keyof typeof CONFIG_PRESETS;

function expectBoolean(option: string, value: unknown): boolean {
  if (typeof value === "boolean") return value;
  throw new ConfigurationError(`Option "${option}" must be a boolean`);
}

function expectString(option: string, value: unknown): string {
  if (typeof value === "string") return value;
  throw new ConfigurationError(`Option "${option}" must be a string`);
}

function expectNumber(option: string, value: unknown, max = Infinity): number {
  if (typeof value === "number" && Number.isFinite(value) && value >= 0 && value <= max) return value;
  throw new ConfigurationError(`Option "${option}" must be a number between 0 and ${max}`);
}

function expectStringList(option: string, value: unknown): string[] {
  if (Array.isArray(value) && value.every((item): item is string => typeof item === "string")) {
    return [...value];
  }
  throw new ConfigurationError(`Option "${option}" must be a list of strings`);
}

type OptionReader = (option: string, value: unknown) => ConfigOverrides;

/** snake_case option name -> reader producing the camelCase override */
const OPTION_READERS: Record<string, OptionReader> = {
  enable_validation: (o, v) => ({ enableValidation: expectBoolean(o, v) }),
  strict_mode: (o, v) => ({ strictMode: expectBoolean(o, v) }),
  trpg_system: (o, v) => ({ trpgSystem: expectString(o, v) }),
  custom_skills: (o, v) => ({ customSkills: expectStringList(o, v) }),
  beginner_mode: (o, v) => ({ beginnerMode: expectBoolean(o, v) }),
  heading_max_length: (o, v) => ({ headingMaxLength: expectNumber(o, v) }),
  recommended_heading_depth: (o, v) => ({ recommendedHeadingDepth: expectNumber(o, v) }),
  html_title: (o, v) => ({ htmlTitle: expectString(o, v) }),
  include_toc: (o, v) => ({ includeToc: expectBoolean(o, v) }),
  toc_title: (o, v) => ({ tocTitle: expectString(o, v) }),
  css_template_path: (o, v) => ({ cssTemplatePath: expectString(o, v) }),
  output_suffix: (o, v) => ({ outputSuffix: expectString(o, v) }),
  default_encoding: (o, v) => ({ defaultEncoding: expectString(o, v) }),
  supported_encodings: (o, v) => ({ supportedEncodings: expectStringList(o, v) }),
  max_file_size: (o, v) => ({ maxFileSize: expectNumber(o, v) }),
  encoding_confidence_threshold: (o, v) => ({ encodingConfidenceThreshold: expectNumber(o, v, 1) })
};

/**
 * Read snake_case options from an untrusted object (config file, request
 * body). Unknown options are ignored with a warning.
 */
export function parseConfigOverrides(raw: unknown): ConfigOverrides {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigurationError("Options must be a JSON object");
  }

  let overrides: ConfigOverrides = {};
  for (const [option, value] of Object.entries(raw)) {
    const reader = OPTION_READERS[option];
    if (!reader) {
      console.warn(`Ignoring unknown option "${option}"`);
      continue;
    }
    overrides = { ...overrides, ...reader(option, value) };
  }
  return overrides;
}

/**
 * Load a JSON config file on top of a base config (defaults when omitted).
 */
export async function loadConfigFile(configPath: string, base: ConverterConfig = DEFAULT_CONFIG): Promise<ConverterConfig> {
  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Cannot read config file ${configPath}: ${detail}`);
  }
  const config = deriveConfig(base, parseConfigOverrides(raw));
  console.log(`Loaded config from ${configPath}`);
  return config;
}
