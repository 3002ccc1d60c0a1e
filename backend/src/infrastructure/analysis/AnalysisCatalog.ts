import { readFileSync } from 'fs';
import {
  AnalysisStep,
  CommandOutputFormat,
  CommandStep,
  PatternStep,
  RequiredFilesStep,
} from '../../domain/value-objects/AnalysisStep';
import { Severity, isSeverity } from '../../domain/value-objects/Finding';

const DEFAULT_MAX_FILE_BYTES = 1024 * 1024;
const STEP_NAME_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isOutputFormat(value: unknown): value is CommandOutputFormat {
  return value === 'jsonl' || value === 'sarif';
}

class CatalogError extends Error {
  constructor(step: string, details: string) {
    super(`Invalid analysis step "${step}": ${details}`);
    this.name = 'CatalogError';
  }
}

function requireString(raw: JsonObject, field: string, step: string): string {
  const value = raw[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new CatalogError(step, `"${field}" must be a non-empty string`);
  }
  return value;
}

function readSeverity(raw: JsonObject, step: string, fallback: Severity): Severity {
  const value = raw.severity;
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'string' || !isSeverity(value)) {
    throw new CatalogError(step, '"severity" must be error, warning or info');
  }
  return value;
}

function parseCommandStep(raw: JsonObject, name: string): CommandStep {
  const args = raw.args ?? [];
  if (!isStringArray(args)) {
    throw new CatalogError(name, '"args" must be an array of strings');
  }
  const format = raw.format ?? 'jsonl';
  if (!isOutputFormat(format)) {
    throw new CatalogError(name, '"format" must be jsonl or sarif');
  }
  const acceptExitCodes = raw.acceptExitCodes ?? [0, 1];
  if (!Array.isArray(acceptExitCodes) || !acceptExitCodes.every((code) => Number.isInteger(code))) {
    throw new CatalogError(name, '"acceptExitCodes" must be an array of integers');
  }
  return {
    kind: 'command',
    name,
    command: requireString(raw, 'command', name),
    args,
    format,
    acceptExitCodes: acceptExitCodes.filter((code): code is number => typeof code === 'number'),
  };
}

function parsePatternStep(raw: JsonObject, name: string): PatternStep {
  const pattern = requireString(raw, 'pattern', name);
  const flags = raw.flags === undefined ? undefined : requireString(raw, 'flags', name);
  try {
    new RegExp(pattern, flags);
  } catch (error) {
    throw new CatalogError(name, `"pattern" does not compile: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (flags?.includes('g') || flags?.includes('y')) {
    throw new CatalogError(name, '"flags" cannot include g or y');
  }
  const extensions = raw.extensions ?? [];
  if (!isStringArray(extensions)) {
    throw new CatalogError(name, '"extensions" must be an array of strings');
  }
  const maxFileBytes = raw.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
  if (typeof maxFileBytes !== 'number' || !Number.isInteger(maxFileBytes) || maxFileBytes <= 0) {
    throw new CatalogError(name, '"maxFileBytes" must be a positive integer');
  }
  return {
    kind: 'pattern',
    name,
    ruleId: typeof raw.ruleId === 'string' ? raw.ruleId : name,
    pattern,
    flags,
    extensions: extensions.map((ext) => (ext.startsWith('.') ? ext : `.${ext}`)),
    severity: readSeverity(raw, name, 'warning'),
    message: requireString(raw, 'message', name),
    maxFileBytes,
  };
}

function parseRequiredFilesStep(raw: JsonObject, name: string): RequiredFilesStep {
  const paths = raw.paths;
  if (!isStringArray(paths) || paths.length === 0) {
    throw new CatalogError(name, '"paths" must be a non-empty array of strings');
  }
  if (paths.some((path) => path.startsWith('/') || path.split(/[\\/]/).includes('..'))) {
    throw new CatalogError(name, '"paths" must stay inside the working copy');
  }
  return {
    kind: 'required-files',
    name,
    ruleId: typeof raw.ruleId === 'string' ? raw.ruleId : name,
    paths,
    severity: readSeverity(raw, name, 'warning'),
  };
}

export function parseAnalysisStep(raw: unknown): AnalysisStep {
  if (!isObject(raw)) {
    throw new CatalogError('?', 'step definition must be an object');
  }
  const name = typeof raw.name === 'string' ? raw.name : '?';
  if (!STEP_NAME_PATTERN.test(name)) {
    throw new CatalogError(name, '"name" must be lowercase letters, digits and dashes');
  }
  switch (raw.kind) {
    case 'command':
      return parseCommandStep(raw, name);
    case 'pattern':
      return parsePatternStep(raw, name);
    case 'required-files':
      return parseRequiredFilesStep(raw, name);
    default:
      throw new CatalogError(name, `unknown kind ${JSON.stringify(raw.kind)}`);
  }
}

/**
 * The fixed set of analysis steps jobs may ask for by name.
 * Loaded once at startup; nothing outside this list can run.
 */
export class AnalysisCatalog {
  private readonly steps: Map<string, AnalysisStep>;

  private constructor(steps: AnalysisStep[], readonly defaultSet: readonly string[]) {
    this.steps = new Map(steps.map((step): [string, AnalysisStep] => [step.name, step]));
  }

  static fromDefinition(definition: unknown): AnalysisCatalog {
    if (!isObject(definition) || !Array.isArray(definition.steps)) {
      throw new Error('Analysis catalog must be an object with a "steps" array');
    }
    const steps = definition.steps.map(parseAnalysisStep);
    const seen = new Set<string>();
    for (const step of steps) {
      if (seen.has(step.name)) {
        throw new Error(`Analysis catalog defines "${step.name}" more than once`);
      }
      seen.add(step.name);
    }

    const defaultSet = definition.defaultSet ?? steps.map((step) => step.name);
    if (!isStringArray(defaultSet)) {
      throw new Error('Analysis catalog "defaultSet" must be an array of step names');
    }
    const catalog = new AnalysisCatalog(steps, defaultSet);
    const unknown = catalog.unknownSteps(defaultSet);
    if (unknown.length > 0) {
      throw new Error(`Analysis catalog "defaultSet" names unknown steps: ${unknown.join(', ')}`);
    }
    return catalog;
  }

  static fromFile(path: string): AnalysisCatalog {
    let definition: unknown;
    try {
      definition = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new Error(`Unable to read analysis catalog ${path}: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }
    return AnalysisCatalog.fromDefinition(definition);
  }

  names(): string[] {
    return [...this.steps.keys()];
  }

  get(name: string): AnalysisStep | undefined {
    return this.steps.get(name);
  }

  unknownSteps(names: readonly string[]): string[] {
    return names.filter((name) => !this.steps.has(name));
  }

  /**
   * Steps for the requested names, in request order. Throws on an unknown name.
   */
  resolve(names: readonly string[]): AnalysisStep[] {
    return names.map((name) => {
      const step = this.steps.get(name);
      if (!step) {
        throw new Error(`Unknown analysis step: ${name}`);
      }
      return step;
    });
  }
}
