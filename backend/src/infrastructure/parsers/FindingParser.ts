import { AnalysisFailedError } from '../../domain/errors';
import { CommandOutputFormat } from '../../domain/value-objects/AnalysisStep';
import { Finding, Severity, isSeverity, normalizeFindingPath } from '../../domain/value-objects/Finding';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function asNonNegativeInt(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : undefined;
}

const SEVERITY_ALIASES: Record<string, Severity> = {
  warn: 'warning',
  note: 'info',
  none: 'info',
  notice: 'info',
  fatal: 'error',
};

export function toSeverity(value: unknown, fallback: Severity = 'warning'): Severity {
  const raw = asString(value)?.toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (isSeverity(raw)) {
    return raw;
  }
  return SEVERITY_ALIASES[raw] ?? fallback;
}

/**
 * Parser for analysis tool output (JSON lines and SARIF 2.1)
 */
export class FindingParser {
  parse(format: CommandOutputFormat, output: string, step: string, root?: string): Finding[] {
    switch (format) {
      case 'jsonl':
        return this.parseJsonLines(output, step, root);
      case 'sarif':
        return this.parseSarif(output, step, root);
    }
  }

  /**
   * One JSON object per line:
   * {"ruleId","severity","message","path","line","column"}; `rule`, `level` and `file` are accepted too.
   */
  parseJsonLines(output: string, step: string, root?: string): Finding[] {
    const findings: Finding[] = [];
    const lines = output.split(/\r?\n/);

    lines.forEach((line, index) => {
      if (line.trim() === '') {
        return;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        throw new AnalysisFailedError(`Step ${step} produced invalid JSON on line ${index + 1}`, error);
      }
      if (!isObject(parsed)) {
        throw new AnalysisFailedError(`Step ${step} produced a non-object on line ${index + 1}`);
      }

      const column = asNonNegativeInt(parsed.column);
      findings.push({
        ruleId: asString(parsed.ruleId) ?? asString(parsed.rule) ?? step,
        step,
        severity: toSeverity(parsed.severity ?? parsed.level),
        message: asString(parsed.message) ?? '',
        location: {
          path: normalizeFindingPath(asString(parsed.path) ?? asString(parsed.file) ?? '', root),
          line: asNonNegativeInt(parsed.line) ?? 0,
          ...(column !== undefined ? { column } : {}),
        },
      });
    });

    return findings;
  }

  /**
   * SARIF 2.1: every `runs[].results[]` entry becomes a finding at its first physical location.
   */
  parseSarif(output: string, step: string, root?: string): Finding[] {
    let document: unknown;
    try {
      document = JSON.parse(output);
    } catch (error) {
      throw new AnalysisFailedError(`Step ${step} produced invalid SARIF`, error);
    }
    if (!isObject(document) || !Array.isArray(document.runs)) {
      throw new AnalysisFailedError(`Step ${step} produced SARIF without runs`);
    }

    const findings: Finding[] = [];
    for (const run of document.runs) {
      if (!isObject(run) || !Array.isArray(run.results)) {
        continue;
      }
      for (const result of run.results) {
        if (!isObject(result)) {
          continue;
        }
        const message = isObject(result.message) ? asString(result.message.text) : undefined;
        const physical = this.firstPhysicalLocation(result);
        const artifact = physical && isObject(physical.artifactLocation) ? physical.artifactLocation : undefined;
        const region = physical && isObject(physical.region) ? physical.region : undefined;
        const column = region ? asNonNegativeInt(region.startColumn) : undefined;

        findings.push({
          ruleId: asString(result.ruleId) ?? step,
          step,
          // SARIF's default level is "warning"
          severity: toSeverity(result.level, 'warning'),
          message: message ?? '',
          location: {
            path: normalizeFindingPath(asString(artifact?.uri) ?? '', root),
            line: (region ? asNonNegativeInt(region.startLine) : undefined) ?? 0,
            ...(column !== undefined ? { column } : {}),
          },
        });
      }
    }
    return findings;
  }

  private firstPhysicalLocation(result: JsonObject): JsonObject | undefined {
    if (!Array.isArray(result.locations)) {
      return undefined;
    }
    const [first] = result.locations;
    if (!isObject(first) || !isObject(first.physicalLocation)) {
      return undefined;
    }
    return first.physicalLocation;
  }
}
