import * as test from 'node:test';
import * as assert from 'node:assert';
import { ValidationEngine, ValidationReport, reportToJson, splitUnits } from '../validation.js';
import type { ValidationLevel, ValidationResult, ValidationUnit, Validator } from '../validation.js';

const { describe, it } = test;

/**
 * Validator that reports `message` at `level` for every unit containing `needle`
 */
function marker(name: string, unit: ValidationUnit, level: ValidationLevel, needle: string, message: string): Validator {
  return {
    name,
    unit,
    validate(text: string, lineNumber?: number): ValidationResult[] {
      if (!text.includes(needle)) return [];
      return lineNumber === undefined ? [{ level, message }] : [{ level, message, lineNumber }];
    }
  };
}

describe('splitUnits', () => {

  it('should split blocks at blank lines and keep their first line number', () => {
    const blocks = splitUnits('a\n\nb\nc').filter(unit => unit.unit === 'block');
    assert.deepStrictEqual(blocks, [
      { unit: 'block', text: 'a', lineNumber: 1 },
      { unit: 'block', text: 'b\nc', lineNumber: 3 }
    ]);
  });

  it('should number every line', () => {
    const lines = splitUnits('x\r\ny').filter(unit => unit.unit === 'line');
    assert.deepStrictEqual(lines, [
      { unit: 'line', text: 'x', lineNumber: 1 },
      { unit: 'line', text: 'y', lineNumber: 2 }
    ]);
  });
});

describe('ValidationEngine', () => {

  it('should order results by line, severity and registration', () => {
    const engine = new ValidationEngine()
      .register(marker('bang', 'line', 'warning', '!', 'bang'))
      .register(marker('crit', 'line', 'critical', '!', 'crit'))
      .register(marker('doc', 'document', 'info', '', 'doc'))
      .register(marker('block', 'block', 'suggestion', '', 'block'));

    const report = engine.validateDocument('a!\n\nb\nc!');
    assert.deepStrictEqual(
      report.results.map(result => `${result.lineNumber ?? '-'}:${result.message}`),
      ['1:crit', '1:bang', '1:block', '3:block', '4:crit', '4:bang', '-:doc']
    );
  });

  it('should keep registration order for equal line and level', () => {
    const engine = new ValidationEngine()
      .register(marker('second', 'line', 'warning', 'x', 'second'))
      .register(marker('first', 'line', 'warning', 'x', 'first'));
    const report = engine.validateDocument('x');
    assert.deepStrictEqual(report.results.map(result => result.message), ['second', 'first']);
  });

  it('should count results per level', () => {
    const engine = new ValidationEngine()
      .register(marker('w', 'line', 'warning', 'w', 'w'))
      .register(marker('s', 'line', 'suggestion', 's', 's'));
    const report = engine.validateDocument('w\ns\nws');
    assert.deepStrictEqual({ ...report.summary }, { critical: 0, warning: 2, info: 0, suggestion: 2 });
    for (const level of ['critical', 'warning', 'info', 'suggestion'] as const) {
      assert.strictEqual(report.summary[level], report.byLevel(level).length);
    }
  });

  it('should report a failing validator as critical', () => {
    const broken: Validator = {
      name: 'Broken',
      unit: 'line',
      validate() {
        throw new Error('boom');
      }
    };
    const report = new ValidationEngine().register(broken).validateDocument('one line');
    assert.deepStrictEqual(report.results, [{
      level: 'critical',
      message: 'バリデータエラー (Broken): boom',
      lineNumber: 1,
      code: 'VALIDATOR_ERROR'
    }]);
    assert.strictEqual(report.hasCritical(), true);
  });

  it('should return an empty report without validators', () => {
    const report = new ValidationEngine().validateDocument('text');
    assert.deepStrictEqual(report.results, []);
    assert.strictEqual(report.hasCritical(), false);
  });
});

describe('ValidationReport', () => {

  it('should freeze its results', () => {
    const report = new ValidationReport([{ level: 'info', message: 'note' }]);
    assert.strictEqual(Object.isFrozen(report.results), true);
    assert.strictEqual(Object.isFrozen(report.results[0]), true);
    assert.strictEqual(Object.isFrozen(report.summary), true);
  });

  it('should not follow changes to the array it was built from', () => {
    const results: ValidationResult[] = [{ level: 'warning', message: 'w' }];
    const report = new ValidationReport(results);
    results.push({ level: 'critical', message: 'c' });
    assert.strictEqual(report.results.length, 1);
    assert.strictEqual(report.summary.critical, 0);
  });
});

describe('reportToJson', () => {

  it('should export the report shape', () => {
    const report = new ValidationReport([
      { level: 'warning', message: 'm', suggestion: 's', lineNumber: 2, column: 3, proposedFix: 'f', code: 'C' },
      { level: 'info', message: 'n' }
    ]);
    const json = reportToJson(report, 'scenario.txt', new Date(Date.UTC(2024, 0, 2, 3, 4, 5)));
    assert.deepStrictEqual(json, {
      document_path: 'scenario.txt',
      validation_time: '2024-01-02T03:04:05.000Z',
      summary: { critical: 0, warning: 1, info: 1, suggestion: 0 },
      results: [
        { line: 2, column: 3, level: 'warning', message: 'm', suggestion: 's', code: 'C' },
        { line: null, level: 'info', message: 'n' }
      ]
    });
  });
});
