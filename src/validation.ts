import { splitLines } from './parser.js';

export type ValidationLevel = 'critical' | 'warning' | 'info' | 'suggestion';

/** Severity order used when sorting: lower ranks first */
export const VALIDATION_LEVELS: readonly ValidationLevel[] = ['critical', 'warning', 'info', 'suggestion'];

const SEVERITY_RANK: Record<ValidationLevel, number> = {
  critical: 0,
  warning: 1,
  info: 2,
  suggestion: 3
};

export interface ValidationResult {
  readonly level: ValidationLevel;
  readonly message: string;
  readonly suggestion?: string;
  /** 1-based; absent for whole-document findings */
  readonly lineNumber?: number;
  /** 1-based column of the offending token */
  readonly column?: number;
  readonly proposedFix?: string;
  /** Stable identifier such as "SKILL_UNKNOWN" */
  readonly code?: string;
}

/**
 * What a validator is run against:
 * - line: every line, with its line number
 * - block: every run of non-blank lines, with the number of its first line
 * - document: the whole text once, without a line number
 */
export type ValidationUnit = 'line' | 'block' | 'document';

export interface Validator {
  readonly name: string;
  readonly unit: ValidationUnit;
  validate(text: string, lineNumber?: number): ValidationResult[];
}

export type ValidationSummary = Record<ValidationLevel, number>;

/**
 * Immutable, ordered set of validation results. The summary is counted from
 * the frozen result list, so the two always agree.
 */
export class ValidationReport {
  readonly results: readonly ValidationResult[];
  readonly summary: Readonly<ValidationSummary>;

  constructor(results: readonly ValidationResult[]) {
    this.results = Object.freeze(results.map(result => Object.freeze({ ...result })));
    const summary: ValidationSummary = { critical: 0, warning: 0, info: 0, suggestion: 0 };
    for (const result of this.results) {
      summary[result.level]++;
    }
    this.summary = Object.freeze(summary);
  }

  hasCritical(): boolean {
    return this.summary.critical > 0;
  }

  byLevel(level: ValidationLevel): ValidationResult[] {
    return this.results.filter(result => result.level === level);
  }
}

/**
 * Exported form of a report
 */
export interface ValidationReportJson {
  document_path: string;
  validation_time: string;
  summary: ValidationSummary;
  results: Array<{
    line: number | null;
    column?: number;
    level: ValidationLevel;
    message: string;
    suggestion?: string;
    code?: string;
  }>;
}

export function reportToJson(report: ValidationReport, documentPath: string, validationTime: Date): ValidationReportJson {
  return {
    document_path: documentPath,
    validation_time: validationTime.toISOString(),
    summary: { ...report.summary },
    results: report.results.map(result => ({
      line: result.lineNumber ?? null,
      ...(result.column !== undefined ? { column: result.column } : {}),
      level: result.level,
      message: result.message,
      ...(result.suggestion !== undefined ? { suggestion: result.suggestion } : {}),
      ...(result.code !== undefined ? { code: result.code } : {})
    }))
  };
}

interface UnitText {
  unit: ValidationUnit;
  text: string;
  lineNumber?: number;
}

/**
 * Split content into the units validators run against, in document order
 */
export function splitUnits(content: string): UnitText[] {
  const lines = splitLines(content);
  const units: UnitText[] = [{ unit: 'document', text: content }];

  let block: string[] = [];
  let blockStart = 0;
  const flushBlock = () => {
    if (block.length > 0) {
      units.push({ unit: 'block', text: block.join('\n'), lineNumber: blockStart });
      block = [];
    }
  };

  lines.forEach((line, i) => {
    units.push({ unit: 'line', text: line, lineNumber: i + 1 });
    if (line.trim()) {
      if (block.length === 0) blockStart = i + 1;
      block.push(line);
    } else {
      flushBlock();
    }
  });
  flushBlock();

  return units;
}

interface Ranked {
  result: ValidationResult;
  validatorIndex: number;
  sequence: number;
}

function compareRanked(a: Ranked, b: Ranked): number {
  const lineA = a.result.lineNumber ?? Infinity;
  const lineB = b.result.lineNumber ?? Infinity;
  if (lineA !== lineB) return lineA - lineB;
  const severity = SEVERITY_RANK[a.result.level] - SEVERITY_RANK[b.result.level];
  if (severity !== 0) return severity;
  if (a.validatorIndex !== b.validatorIndex) return a.validatorIndex - b.validatorIndex;
  return a.sequence - b.sequence;
}

/**
 * Runs an ordered list of validators over a document.
 * Registration order breaks ties between results on the same line and level.
 */
export class ValidationEngine {
  private readonly validators: Validator[] = [];

  register(validator: Validator): this {
    this.validators.push(validator);
    return this;
  }

  get registered(): readonly Validator[] {
    return this.validators;
  }

  validateDocument(content: string): ValidationReport {
    const ranked: Ranked[] = [];
    let sequence = 0;

    for (const unit of splitUnits(content)) {
      this.validators.forEach((validator, validatorIndex) => {
        if (validator.unit !== unit.unit) return;
        for (const result of runValidator(validator, unit)) {
          ranked.push({ result, validatorIndex, sequence: sequence++ });
        }
      });
    }

    ranked.sort(compareRanked);
    return new ValidationReport(ranked.map(entry => entry.result));
  }
}

/**
 * A validator that throws is reported as a critical result on its unit
 */
function runValidator(validator: Validator, unit: UnitText): ValidationResult[] {
  try {
    return validator.validate(unit.text, unit.lineNumber);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    console.error(`Validator ${validator.name} failed:`, err);
    return [{
      level: 'critical',
      message: `バリデータエラー (${validator.name}): ${detail}`,
      lineNumber: unit.lineNumber,
      code: 'VALIDATOR_ERROR'
    }];
  }
}
