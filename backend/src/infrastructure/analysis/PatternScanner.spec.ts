import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { CancelledError } from '../../domain/errors';
import { PatternStep, RequiredFilesStep } from '../../domain/value-objects/AnalysisStep';
import { PatternScanner } from './PatternScanner';

const todoStep: PatternStep = {
  kind: 'pattern',
  name: 'todos',
  ruleId: 'style/todo',
  pattern: 'TODO',
  extensions: ['.ts'],
  severity: 'info',
  message: 'Unresolved TODO',
  maxFileBytes: 1024,
};

describe('PatternScanner', () => {
  const scanner = new PatternScanner();
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'feedbacker-scan-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('scan', () => {
    it('should report each matching line with a 1-based position', async () => {
      mkdirSync(join(root, 'src'));
      writeFileSync(join(root, 'src', 'cart.ts'), 'const a = 1;\n  // TODO: remove\nconst b = 2; // TODO\n');

      const findings = await scanner.scan(root, todoStep);

      expect(findings).toEqual([
        {
          ruleId: 'style/todo',
          step: 'todos',
          severity: 'info',
          message: 'Unresolved TODO',
          location: { path: 'src/cart.ts', line: 2, column: 6 },
        },
        {
          ruleId: 'style/todo',
          step: 'todos',
          severity: 'info',
          message: 'Unresolved TODO',
          location: { path: 'src/cart.ts', line: 3, column: 17 },
        },
      ]);
    });

    it('should filter by extension and skip vendored directories', async () => {
      writeFileSync(join(root, 'notes.md'), 'TODO');
      mkdirSync(join(root, 'node_modules'));
      writeFileSync(join(root, 'node_modules', 'dep.ts'), 'TODO');
      mkdirSync(join(root, '.git'));
      writeFileSync(join(root, '.git', 'hook.ts'), 'TODO');

      expect(await scanner.scan(root, todoStep)).toEqual([]);
    });

    it('should skip oversized and binary files', async () => {
      writeFileSync(join(root, 'big.ts'), `// TODO\n${'x'.repeat(2048)}`);
      writeFileSync(join(root, 'blob.ts'), Buffer.from([0x54, 0x4f, 0x44, 0x4f, 0x00, 0x01]));

      expect(await scanner.scan(root, todoStep)).toEqual([]);
    });

    it('should not follow symlinks', async () => {
      const outside = mkdtempSync(join(tmpdir(), 'feedbacker-outside-'));
      try {
        writeFileSync(join(outside, 'secret.ts'), 'TODO');
        symlinkSync(join(outside, 'secret.ts'), join(root, 'link.ts'));

        expect(await scanner.scan(root, todoStep)).toEqual([]);
      } finally {
        rmSync(outside, { recursive: true, force: true });
      }
    });

    it('should stop when the signal is aborted', async () => {
      writeFileSync(join(root, 'a.ts'), 'TODO');
      const controller = new AbortController();
      controller.abort(new CancelledError('stopped'));

      await expect(scanner.scan(root, todoStep, controller.signal)).rejects.toThrow('stopped');
    });
  });

  describe('checkRequiredFiles', () => {
    const step: RequiredFilesStep = {
      kind: 'required-files',
      name: 'docs',
      ruleId: 'repo/docs',
      paths: ['README.md', 'docs/CONTRIBUTING.md'],
      severity: 'warning',
    };

    it('should report only the missing paths', async () => {
      writeFileSync(join(root, 'README.md'), '# Project');

      expect(await scanner.checkRequiredFiles(root, step)).toEqual([
        {
          ruleId: 'repo/docs',
          step: 'docs',
          severity: 'warning',
          message: 'Required file docs/CONTRIBUTING.md is missing',
          location: { path: 'docs/CONTRIBUTING.md', line: 0 },
        },
      ]);
    });
  });
});
