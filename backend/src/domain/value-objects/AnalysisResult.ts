import { createHash } from 'crypto';
import { AnalysisStepKind } from './AnalysisStep';
import { Finding, compareFindings } from './Finding';

export interface StepSummary {
  step: string;
  kind: AnalysisStepKind;
  findingCount: number;
  exitCode: number | null;
}

/**
 * Value Object holding the complete, ordered outcome of one analysis run.
 * Immutable once created; `canonicalJson` is byte-identical for identical findings.
 */
export class AnalysisResult {
  private readonly _findings: readonly Readonly<Finding>[];
  private readonly _steps: readonly Readonly<StepSummary>[];
  private readonly _canonicalJson: string;
  private readonly _checksum: string;

  private constructor(findings: Finding[], steps: StepSummary[]) {
    const ordered = findings.map(cloneFinding).sort(compareFindings);
    this._findings = Object.freeze(ordered.map((finding) => Object.freeze(finding)));
    this._steps = Object.freeze(steps.map((step) => Object.freeze({ ...step })));
    this._canonicalJson = JSON.stringify({
      passed: this.passed,
      findings: this._findings.map(canonicalFinding),
      steps: this._steps.map((step) => ({
        step: step.step,
        kind: step.kind,
        findingCount: step.findingCount,
        exitCode: step.exitCode,
      })),
    });
    this._checksum = createHash('sha256').update(this._canonicalJson).digest('hex');
    Object.freeze(this);
  }

  static create(findings: Finding[], steps: StepSummary[] = []): AnalysisResult {
    for (const finding of findings) {
      if (!Number.isInteger(finding.location.line) || finding.location.line < 0) {
        throw new Error(`Finding line must be a non-negative integer, got ${finding.location.line}`);
      }
    }
    return new AnalysisResult(findings, steps);
  }

  /**
   * Rebuilds a result from its persisted canonical JSON.
   */
  static fromCanonicalJson(json: string): AnalysisResult {
    const parsed: unknown = JSON.parse(json);
    if (!isRecord(parsed) || !Array.isArray(parsed.findings) || !Array.isArray(parsed.steps)) {
      throw new Error('Stored analysis result is malformed');
    }
    return new AnalysisResult(parsed.findings.filter(isFinding), parsed.steps.filter(isStepSummary));
  }

  get findings(): readonly Readonly<Finding>[] {
    return this._findings;
  }

  get steps(): readonly Readonly<StepSummary>[] {
    return this._steps;
  }

  get passed(): boolean {
    return !this._findings.some((finding) => finding.severity === 'error');
  }

  get canonicalJson(): string {
    return this._canonicalJson;
  }

  get checksum(): string {
    return this._checksum;
  }

  countBySeverity(): Record<Finding['severity'], number> {
    const counts = { error: 0, warning: 0, info: 0 };
    for (const finding of this._findings) {
      counts[finding.severity] += 1;
    }
    return counts;
  }

  equals(other: AnalysisResult): boolean {
    return this._checksum === other._checksum;
  }
}

function cloneFinding(finding: Finding): Finding {
  return { ...finding, location: { ...finding.location } };
}

// Fixed key order, and column omitted when absent.
function canonicalFinding(finding: Readonly<Finding>): Record<string, unknown> {
  const location: Record<string, unknown> = { path: finding.location.path, line: finding.location.line };
  if (finding.location.column !== undefined) {
    location.column = finding.location.column;
  }
  return {
    ruleId: finding.ruleId,
    step: finding.step,
    severity: finding.severity,
    message: finding.message,
    location,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFinding(value: unknown): value is Finding {
  if (!isRecord(value) || !isRecord(value.location)) {
    return false;
  }
  return (
    typeof value.ruleId === 'string' &&
    typeof value.step === 'string' &&
    (value.severity === 'error' || value.severity === 'warning' || value.severity === 'info') &&
    typeof value.message === 'string' &&
    typeof value.location.path === 'string' &&
    typeof value.location.line === 'number'
  );
}

const STEP_KINDS: readonly AnalysisStepKind[] = ['command', 'pattern', 'required-files'];

function isStepKind(value: unknown): value is AnalysisStepKind {
  return STEP_KINDS.some((kind) => kind === value);
}

function isStepSummary(value: unknown): value is StepSummary {
  return (
    isRecord(value) &&
    typeof value.step === 'string' &&
    isStepKind(value.kind) &&
    typeof value.findingCount === 'number' &&
    (value.exitCode === null || typeof value.exitCode === 'number')
  );
}
