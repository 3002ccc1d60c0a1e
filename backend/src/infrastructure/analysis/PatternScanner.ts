import { open, readdir, stat } from 'fs/promises';
import { extname, join, relative, sep } from 'path';
import { Deadline } from '../../domain/value-objects/Deadline';
import { Finding } from '../../domain/value-objects/Finding';
import { PatternStep, RequiredFilesStep } from '../../domain/value-objects/AnalysisStep';

const SKIPPED_DIRECTORIES = new Set(['.git', 'node_modules']);
const BINARY_SNIFF_BYTES = 8000;

function toRelative(root: string, path: string): string {
  return relative(root, path).split(sep).join('/');
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw Deadline.reasonOf(signal);
  }
}

/**
 * In-process checks over a working copy: line regexes and required paths.
 * Symlinks are never followed, so nothing outside the working copy is read.
 */
export class PatternScanner {
  async scan(root: string, step: PatternStep, signal?: AbortSignal): Promise<Finding[]> {
    const regex = new RegExp(step.pattern, step.flags);
    const findings: Finding[] = [];

    for await (const file of this.walk(root, signal)) {
      if (step.extensions.length > 0 && !step.extensions.includes(extname(file))) {
        continue;
      }
      const content = await this.readText(file, step.maxFileBytes);
      if (content === null) {
        continue;
      }
      const path = toRelative(root, file);
      content.split(/\r?\n/).forEach((line, index) => {
        const match = regex.exec(line);
        if (match) {
          findings.push({
            ruleId: step.ruleId,
            step: step.name,
            severity: step.severity,
            message: step.message,
            location: { path, line: index + 1, column: match.index + 1 },
          });
        }
      });
    }

    return findings;
  }

  async checkRequiredFiles(root: string, step: RequiredFilesStep): Promise<Finding[]> {
    const findings: Finding[] = [];
    for (const path of step.paths) {
      const exists = await stat(join(root, path)).then(
        () => true,
        () => false,
      );
      if (!exists) {
        findings.push({
          ruleId: step.ruleId,
          step: step.name,
          severity: step.severity,
          message: `Required file ${path} is missing`,
          location: { path, line: 0 },
        });
      }
    }
    return findings;
  }

  private async *walk(dir: string, signal?: AbortSignal): AsyncGenerator<string> {
    throwIfAborted(signal);
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(entry.name)) {
          yield* this.walk(path, signal);
        }
      } else if (entry.isFile()) {
        throwIfAborted(signal);
        yield path;
      }
    }
  }

  /**
   * Returns null for files over the size cap or that look binary (a NUL byte near the start).
   */
  private async readText(path: string, maxBytes: number): Promise<string | null> {
    const handle = await open(path, 'r');
    try {
      const { size } = await handle.stat();
      if (size > maxBytes) {
        return null;
      }
      const buffer = Buffer.alloc(size);
      await handle.read(buffer, 0, size, 0);
      if (buffer.subarray(0, BINARY_SNIFF_BYTES).includes(0)) {
        return null;
      }
      return buffer.toString('utf-8');
    } finally {
      await handle.close();
    }
  }
}
