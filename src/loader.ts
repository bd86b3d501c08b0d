import fs from 'fs-extra';
import * as path from 'node:path';
import { TextDecoder } from 'node:util';
import mammoth from 'mammoth';
import { EncodingDetectionError, InputFormatError, SizeLimitExceeded } from './errors.js';
import type { ConverterConfig } from './config.js';

/**
 * File extensions the loader reads
 */
export const SUPPORTED_FORMATS = ['.txt', '.docx'] as const;

export type SupportedFormat = typeof SUPPORTED_FORMATS[number];

/**
 * Result of loading one scenario file
 */
export interface LoadedScenario {
  /** Normalized Unicode text */
  text: string;
  format: SupportedFormat;
  /** Encoding the text was decoded with; "docx" for word documents */
  encoding: string;
  /** Share of decoded characters that look like real text (0-1) */
  confidence: number;
  /** File size in bytes */
  size: number;
}

export interface DecodedText {
  text: string;
  encoding: string;
  confidence: number;
}

export function getSupportedFormats(): string[] {
  return [...SUPPORTED_FORMATS];
}

function isSupportedFormat(extension: string): extension is SupportedFormat {
  return SUPPORTED_FORMATS.some(format => format === extension);
}

// C0/C1 controls other than tab and line breaks, the replacement character,
// private use, and halfwidth katakana (a common mis-decoding symptom)
const SUSPICIOUS_CHAR = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F\uFFFD\uE000-\uF8FF\uFF61-\uFF9F]/;

/**
 * Share of characters that are not suspicious. Empty text counts as clean.
 */
export function textConfidence(text: string): number {
  const chars = [...text];
  if (chars.length === 0) return 1;
  const suspicious = chars.filter(char => SUSPICIOUS_CHAR.test(char)).length;
  return 1 - suspicious / chars.length;
}

function sniffBom(bytes: Uint8Array): string | undefined {
  if (bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) return 'utf-8';
  if (bytes[0] === 0xff && bytes[1] === 0xfe) return 'utf-16le';
  if (bytes[0] === 0xfe && bytes[1] === 0xff) return 'utf-16be';
  return undefined;
}

function candidateEncodings(bytes: Uint8Array, config: ConverterConfig): string[] {
  const bom = sniffBom(bytes);
  const ordered = [
    ...(bom ? [bom] : []),
    config.defaultEncoding,
    ...config.supportedEncodings
  ].map(label => label.trim().toLowerCase());
  return Array.from(new Set(ordered));
}

function tryDecode(bytes: Uint8Array, encoding: string): string | undefined {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
  } catch (err) {
    if (err instanceof RangeError) {
      console.warn(`Skipping unsupported encoding "${encoding}"`);
      return undefined;
    }
    throw err;
  }
  try {
    return decoder.decode(bytes);
  } catch (err) {
    // Invalid byte sequence for this encoding
    if (err instanceof TypeError) return undefined;
    throw err;
  }
}

/**
 * Decode raw bytes with the first candidate encoding whose result clears the
 * confidence threshold. A BOM, when present, picks the first candidate.
 */
export function decodeText(bytes: Uint8Array, config: ConverterConfig): DecodedText {
  let best: DecodedText | undefined;
  for (const encoding of candidateEncodings(bytes, config)) {
    const text = tryDecode(bytes, encoding);
    if (text === undefined) continue;

    const confidence = textConfidence(text);
    if (confidence >= config.encodingConfidenceThreshold) {
      return { text, encoding, confidence };
    }
    if (!best || confidence > best.confidence) {
      best = { text, encoding, confidence };
    }
  }

  const detail = best
    ? `best candidate ${best.encoding} scored ${best.confidence.toFixed(2)}`
    : 'no candidate encoding could decode the file';
  throw new EncodingDetectionError(
    `Could not detect text encoding (${detail}, threshold ${config.encodingConfidenceThreshold})`
  );
}

/**
 * Tidy text extracted from a word document: trimmed lines, no blank runs,
 * paragraphs separated by one blank line
 */
export function normalizeDocxText(raw: string): string {
  return raw
    .split(/\r\n|\r|\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .join('\n\n');
}

async function extractDocxText(buffer: Buffer, filePath: string): Promise<string> {
  const result = await mammoth.extractRawText({ buffer });
  for (const message of result.messages) {
    console.warn(`${path.basename(filePath)}: ${message.message}`);
  }
  return normalizeDocxText(result.value);
}

/**
 * Check extension and size before anything is read
 */
export async function checkScenarioFile(filePath: string, config: ConverterConfig): Promise<{ format: SupportedFormat; size: number }> {
  const extension = path.extname(filePath).toLowerCase();
  if (!isSupportedFormat(extension)) {
    throw new InputFormatError(
      `Unsupported file format "${extension || path.basename(filePath)}" (supported: ${SUPPORTED_FORMATS.join(', ')})`
    );
  }

  const stat = await fs.stat(filePath);
  if (stat.size > config.maxFileSize) {
    throw new SizeLimitExceeded(
      `${path.basename(filePath)} is ${stat.size} bytes, over the ${config.maxFileSize} byte limit`,
      stat.size,
      config.maxFileSize
    );
  }
  return { format: extension, size: stat.size };
}

/**
 * Load a scenario file as normalized text
 */
export async function loadScenarioFile(filePath: string, config: ConverterConfig): Promise<LoadedScenario> {
  const { format, size } = await checkScenarioFile(filePath, config);
  const buffer = await fs.readFile(filePath);

  if (format === '.docx') {
    const text = await extractDocxText(buffer, filePath);
    return { text, format, encoding: 'docx', confidence: 1, size };
  }

  const decoded = decodeText(buffer, config);
  if (decoded.encoding !== config.defaultEncoding.toLowerCase()) {
    console.log(`${path.basename(filePath)}: decoded as ${decoded.encoding}`);
  }
  return { ...decoded, format, size };
}
