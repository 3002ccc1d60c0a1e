import { readFileSync } from 'fs';
import { join } from 'path';
import { AnalysisFailedError } from '../../domain/errors';
import { FindingParser, toSeverity } from './FindingParser';

describe('FindingParser', () => {
  const parser = new FindingParser();
  const fixturesDir = join(__dirname, '__fixtures__');

  describe('parseSarif', () => {
    it('should map results to findings relative to the working copy', () => {
      const sarif = readFileSync(join(fixturesDir, 'lint-results.sarif'), 'utf-8');

      const findings = parser.parseSarif(sarif, 'lint', '/work/job-1');

      expect(findings).toEqual([
        {
          ruleId: 'no-unused-vars',
          step: 'lint',
          severity: 'warning',
          message: "'total' is assigned a value but never used.",
          location: { path: 'src/cart.ts', line: 14, column: 9 },
        },
        {
          ruleId: 'no-eval',
          step: 'lint',
          severity: 'error',
          message: 'eval can be harmful.',
          location: { path: 'src/legacy/loader.ts', line: 3 },
        },
        {
          ruleId: 'license-header',
          step: 'lint',
          severity: 'info',
          message: 'Project has no license file.',
          location: { path: '', line: 0 },
        },
      ]);
    });

    it('should throw AnalysisFailedError for invalid JSON', () => {
      expect(() => parser.parseSarif('{not json', 'lint')).toThrow(AnalysisFailedError);
    });

    it('should throw when runs are missing', () => {
      expect(() => parser.parseSarif('{"version":"2.1.0"}', 'lint')).toThrow('Step lint produced SARIF without runs');
    });
  });

  describe('parseJsonLines', () => {
    it('should parse one finding per line and skip blank lines', () => {
      const output = readFileSync(join(fixturesDir, 'lint-results.jsonl'), 'utf-8');

      const findings = parser.parseJsonLines(output, 'style');

      expect(findings).toEqual([
        {
          ruleId: 'max-len',
          step: 'style',
          severity: 'warning',
          message: 'Line exceeds 120 characters',
          location: { path: 'src/cart.ts', line: 40, column: 121 },
        },
        {
          ruleId: 'no-debugger',
          step: 'style',
          severity: 'error',
          message: 'Unexpected debugger statement',
          location: { path: 'src/checkout.ts', line: 7 },
        },
        {
          ruleId: 'prefer-const',
          step: 'style',
          severity: 'info',
          message: 'Use const',
          location: { path: 'src/cart.ts', line: 2 },
        },
      ]);
    });

    it('should report the offending line number', () => {
      expect(() => parser.parseJsonLines('{"ruleId":"a"}\noops', 'style')).toThrow(
        'Step style produced invalid JSON on line 2',
      );
    });

    it('should reject non-object lines', () => {
      expect(() => parser.parseJsonLines('[1,2]', 'style')).toThrow('produced a non-object on line 1');
    });

    it('should fall back to the step name when a rule id is missing', () => {
      const [finding] = parser.parseJsonLines('{"message":"m","path":"a.ts","line":1}', 'style');
      expect(finding.ruleId).toBe('style');
    });
  });

  describe('parse', () => {
    it('should dispatch on the output format', () => {
      expect(parser.parse('jsonl', '', 'x')).toEqual([]);
      expect(parser.parse('sarif', '{"runs":[]}', 'x')).toEqual([]);
    });
  });

  describe('toSeverity', () => {
    it('should map common aliases', () => {
      expect(toSeverity('WARN')).toBe('warning');
      expect(toSeverity('note')).toBe('info');
      expect(toSeverity('fatal')).toBe('error');
      expect(toSeverity(undefined)).toBe('warning');
      expect(toSeverity('bogus', 'info')).toBe('info');
    });
  });
});
