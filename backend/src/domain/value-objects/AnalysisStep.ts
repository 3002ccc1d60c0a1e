import { Severity } from './Finding';

export type CommandOutputFormat = 'jsonl' | 'sarif';

/**
 * Runs an external tool inside the working copy (no shell) and parses its stdout.
 */
export interface CommandStep {
  kind: 'command';
  name: string;
  command: string;
  args: string[];
  format: CommandOutputFormat;
  /** Exit codes that mean "ran fine" (tools usually exit 1 when they report findings). */
  acceptExitCodes: number[];
}

/**
 * Reports every line matching `pattern` in files with one of `extensions`.
 */
export interface PatternStep {
  kind: 'pattern';
  name: string;
  ruleId: string;
  pattern: string;
  flags?: string;
  extensions: string[];
  severity: Severity;
  message: string;
  maxFileBytes: number;
}

/**
 * Reports each listed path that is missing from the working copy.
 */
export interface RequiredFilesStep {
  kind: 'required-files';
  name: string;
  ruleId: string;
  paths: string[];
  severity: Severity;
}

export type AnalysisStep = CommandStep | PatternStep | RequiredFilesStep;

export type AnalysisStepKind = AnalysisStep['kind'];
