import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { AnalysisFailedError, CancelledError, TimeoutError } from '../../domain/errors';
import { CommandOptions, CommandResult, ICommandRunner } from '../../domain/ports/ICommandRunner';
import { WorkingCopy } from '../../domain/ports/IRepositoryFetcher';
import { Deadline } from '../../domain/value-objects/Deadline';
import { CommandRunner } from '../runner/CommandRunner';
import { AnalysisCatalog } from './AnalysisCatalog';
import { LocalAnalysisRunner } from './LocalAnalysisRunner';

class FakeCommandRunner implements ICommandRunner {
  readonly calls: { command: string; args: string[]; options: CommandOptions }[] = [];
  result: CommandResult = { stdout: '', stderr: '', exitCode: 0, signal: null, truncated: false };
  hang = false;

  execute(command: string, args: string[], options: CommandOptions): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    if (!this.hang) {
      return Promise.resolve(this.result);
    }
    return new Promise((_resolve, reject) => {
      options.signal?.addEventListener('abort', () => reject(Deadline.reasonOf(options.signal)), { once: true });
    });
  }
}

const catalog = AnalysisCatalog.fromDefinition({
  steps: [
    { name: 'readme', kind: 'required-files', ruleId: 'repo/readme', paths: ['README.md'], severity: 'error' },
    { name: 'todos', kind: 'pattern', ruleId: 'style/todo', pattern: 'TODO', severity: 'info', message: 'Unresolved TODO' },
    { name: 'lint', kind: 'command', command: 'lint-tool', args: ['--json'], acceptExitCodes: [0, 1] },
  ],
});

describe('LocalAnalysisRunner', () => {
  let root: string;
  let commands: FakeCommandRunner;
  let runner: LocalAnalysisRunner;
  let workingCopy: WorkingCopy;
  const deadlines: Deadline[] = [];

  const deadline = (timeoutMs = 10_000, parent?: AbortSignal): Deadline => {
    const created = Deadline.after(timeoutMs, 'analysis', parent);
    deadlines.push(created);
    return created;
  };

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'feedbacker-run-'));
    workingCopy = { path: root, repositoryUrl: 'file:///srv/repo.git', revision: 'main', commitSha: 'abc123' };
    commands = new FakeCommandRunner();
    runner = new LocalAnalysisRunner(catalog, commands, { killGraceMs: 100, maxOutputBytes: 4096 });
  });

  afterEach(() => {
    deadlines.splice(0).forEach((created) => created.dispose());
    rmSync(root, { recursive: true, force: true });
  });

  it('should combine findings from every step in canonical order', async () => {
    writeFileSync(join(root, 'app.ts'), '// TODO later\n');
    commands.result = {
      stdout: `{"ruleId":"no-eval","severity":"error","message":"eval","path":"${root}/app.ts","line":1,"column":1}\n`,
      stderr: '',
      exitCode: 1,
      signal: null,
      truncated: false,
    };

    const result = await runner.run({ workingCopy, analysisSet: ['lint', 'todos', 'readme'], deadline: deadline() });

    expect(result.findings.map((finding) => [finding.location.path, finding.location.line, finding.ruleId])).toEqual([
      ['README.md', 0, 'repo/readme'],
      ['app.ts', 1, 'no-eval'],
      ['app.ts', 1, 'style/todo'],
    ]);
    expect(result.passed).toBe(false);
    expect(result.steps).toEqual([
      { step: 'lint', kind: 'command', findingCount: 1, exitCode: 1 },
      { step: 'todos', kind: 'pattern', findingCount: 1, exitCode: null },
      { step: 'readme', kind: 'required-files', findingCount: 1, exitCode: null },
    ]);
  });

  it('should run commands in the working copy with step context', async () => {
    await runner.run({ workingCopy, analysisSet: ['lint'], deadline: deadline() });

    expect(commands.calls).toHaveLength(1);
    const [call] = commands.calls;
    expect(call.command).toBe('lint-tool');
    expect(call.args).toEqual(['--json']);
    expect(call.options.cwd).toBe(root);
    expect(call.options.env).toEqual({
      FEEDBACKER_STEP: 'lint',
      FEEDBACKER_REVISION: 'main',
      FEEDBACKER_COMMIT: 'abc123',
    });
    expect(call.options.killGraceMs).toBe(100);
    expect(call.options.maxOutputBytes).toBe(4096);
  });

  it('should give identical results for identical inputs', async () => {
    writeFileSync(join(root, 'README.md'), '# TODO\n');

    const first = await runner.run({ workingCopy, analysisSet: ['todos', 'readme'], deadline: deadline() });
    const second = await runner.run({ workingCopy, analysisSet: ['todos', 'readme'], deadline: deadline() });

    expect(second.canonicalJson).toBe(first.canonicalJson);
    expect(second.checksum).toBe(first.checksum);
  });

  it('should fail on an unaccepted exit code with the stderr tail', async () => {
    commands.result = { stdout: '', stderr: 'config not found\n', exitCode: 2, signal: null, truncated: false };

    await expect(runner.run({ workingCopy, analysisSet: ['lint'], deadline: deadline() })).rejects.toThrow(
      new AnalysisFailedError('Step lint exited with code 2: config not found'),
    );
  });

  it('should fail when the step was ended by a signal it did not send', async () => {
    commands.result = { stdout: '{"ruleId":"r","message":"m","path":"a.ts","line":1}\n', stderr: '', exitCode: null, signal: 'SIGKILL', truncated: false };

    await expect(runner.run({ workingCopy, analysisSet: ['lint'], deadline: deadline() })).rejects.toThrow(
      new AnalysisFailedError('Step lint was killed by SIGKILL'),
    );
  });

  it('should not return the output of a tool killed from outside', async () => {
    const killed = AnalysisCatalog.fromDefinition({
      steps: [
        {
          name: 'lint',
          kind: 'command',
          command: process.execPath,
          args: [
            '-e',
            'process.stdout.write(\'{"ruleId":"r","message":"m","path":"a.ts","line":1}\\n\'); process.kill(process.pid, \'SIGKILL\')',
          ],
          format: 'jsonl',
        },
      ],
    });
    const real = new LocalAnalysisRunner(killed, new CommandRunner(), { killGraceMs: 100, maxOutputBytes: 4096 });

    await expect(real.run({ workingCopy, analysisSet: ['lint'], deadline: deadline() })).rejects.toThrow(
      new AnalysisFailedError('Step lint was killed by SIGKILL'),
    );
  });

  it('should fail when output was truncated', async () => {
    commands.result = { stdout: '{}', stderr: '', exitCode: 0, signal: null, truncated: true };

    await expect(runner.run({ workingCopy, analysisSet: ['lint'], deadline: deadline() })).rejects.toThrow(
      'Step lint produced more than 4096 bytes of output',
    );
  });

  it('should fail on unparseable output', async () => {
    commands.result = { stdout: 'not json\n', stderr: '', exitCode: 0, signal: null, truncated: false };

    await expect(runner.run({ workingCopy, analysisSet: ['lint'], deadline: deadline() })).rejects.toThrow(
      'Step lint produced invalid JSON on line 1',
    );
  });

  it('should fail on an unknown step', async () => {
    await expect(runner.run({ workingCopy, analysisSet: ['ghost'], deadline: deadline() })).rejects.toThrow(
      AnalysisFailedError,
    );
  });

  it('should raise Timeout and return no findings when the deadline passes', async () => {
    commands.hang = true;

    await expect(runner.run({ workingCopy, analysisSet: ['readme', 'lint'], deadline: deadline(50) })).rejects.toThrow(
      TimeoutError,
    );
  });

  it('should raise Cancelled when the job is cancelled mid-step', async () => {
    commands.hang = true;
    const cancel = new AbortController();
    const run = runner.run({ workingCopy, analysisSet: ['lint'], deadline: deadline(10_000, cancel.signal) });
    setTimeout(() => cancel.abort(new CancelledError('Cancelled by request')), 20);

    await expect(run).rejects.toThrow(CancelledError);
  });

  it('should not start when the deadline already passed', async () => {
    const cancel = new AbortController();
    cancel.abort(new CancelledError());

    await expect(
      runner.run({ workingCopy, analysisSet: ['lint'], deadline: deadline(10_000, cancel.signal) }),
    ).rejects.toThrow(CancelledError);
    expect(commands.calls).toHaveLength(0);
  });
});
