export type Severity = 'error' | 'warning' | 'info';

export const SEVERITIES: readonly Severity[] = ['error', 'warning', 'info'];

export function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

export interface FindingLocation {
  path: string;
  line: number;
  column?: number;
}

/**
 * One reported issue from an analysis step.
 */
export interface Finding {
  ruleId: string;
  step: string;
  severity: Severity;
  message: string;
  location: FindingLocation;
}

function compareStrings(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Total order over findings: path, line, column, rule id, severity, message, step.
 * Uses code-unit comparison rather than localeCompare so the order does not
 * depend on the host locale.
 */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    compareStrings(a.location.path, b.location.path) ||
    a.location.line - b.location.line ||
    (a.location.column ?? 0) - (b.location.column ?? 0) ||
    compareStrings(a.ruleId, b.ruleId) ||
    SEVERITIES.indexOf(a.severity) - SEVERITIES.indexOf(b.severity) ||
    compareStrings(a.message, b.message) ||
    compareStrings(a.step, b.step)
  );
}

/**
 * Normalises a path reported by a tool to a forward-slash path relative to the working copy.
 */
export function normalizeFindingPath(path: string, root?: string): string {
  let normalized = path.replace(/\\/g, '/');
  if (normalized.startsWith('file://')) {
    normalized = normalized.slice('file://'.length);
  }
  if (root) {
    const prefix = root.replace(/\\/g, '/').replace(/\/+$/, '') + '/';
    if (normalized.startsWith(prefix)) {
      normalized = normalized.slice(prefix.length);
    }
  }
  return normalized.replace(/^\.\//, '');
}
