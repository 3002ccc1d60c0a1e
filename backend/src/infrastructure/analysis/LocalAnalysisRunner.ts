import { Logger } from '@nestjs/common';
import { AnalysisFailedError, FeedbackError, toFeedbackError } from '../../domain/errors';
import { ICommandRunner } from '../../domain/ports/ICommandRunner';
import { IAnalysisRunner, RunRequest } from '../../domain/ports/IAnalysisRunner';
import { WorkingCopy } from '../../domain/ports/IRepositoryFetcher';
import { AnalysisResult, StepSummary } from '../../domain/value-objects/AnalysisResult';
import { AnalysisStep, CommandStep } from '../../domain/value-objects/AnalysisStep';
import { Deadline } from '../../domain/value-objects/Deadline';
import { Finding } from '../../domain/value-objects/Finding';
import { FindingParser } from '../parsers/FindingParser';
import { AnalysisCatalog } from './AnalysisCatalog';
import { PatternScanner } from './PatternScanner';

export interface LocalAnalysisRunnerOptions {
  killGraceMs: number;
  maxOutputBytes: number;
}

interface StepOutcome {
  findings: Finding[];
  exitCode: number | null;
}

const STDERR_TAIL_CHARS = 500;

/**
 * Runs the catalog steps a job asked for, one after another, against its working copy.
 * Implements IAnalysisRunner port from domain
 */
export class LocalAnalysisRunner implements IAnalysisRunner {
  private readonly logger = new Logger(LocalAnalysisRunner.name);

  constructor(
    private readonly catalog: AnalysisCatalog,
    private readonly commandRunner: ICommandRunner,
    private readonly options: LocalAnalysisRunnerOptions,
    private readonly parser: FindingParser = new FindingParser(),
    private readonly scanner: PatternScanner = new PatternScanner(),
  ) {}

  async run(request: RunRequest): Promise<AnalysisResult> {
    const { workingCopy, analysisSet, deadline } = request;
    let steps: AnalysisStep[];
    try {
      steps = this.catalog.resolve(analysisSet);
    } catch (error) {
      throw new AnalysisFailedError(error instanceof Error ? error.message : String(error), error);
    }

    const findings: Finding[] = [];
    const summaries: StepSummary[] = [];

    for (const step of steps) {
      deadline.throwIfExpired();
      const started = Date.now();
      const outcome = await this.runStepGuarded(step, workingCopy, deadline);
      findings.push(...outcome.findings);
      summaries.push({
        step: step.name,
        kind: step.kind,
        findingCount: outcome.findings.length,
        exitCode: outcome.exitCode,
      });
      this.logger.debug(
        `Step ${step.name} found ${outcome.findings.length} issue(s) in ${workingCopy.path} (${Date.now() - started}ms)`,
      );
    }

    // Findings from a run that crossed its deadline are never returned.
    deadline.throwIfExpired();
    return AnalysisResult.create(findings, summaries);
  }

  private async runStepGuarded(step: AnalysisStep, workingCopy: WorkingCopy, deadline: Deadline): Promise<StepOutcome> {
    try {
      return await this.runStep(step, workingCopy, deadline);
    } catch (error) {
      // A step torn down by the deadline reports the deadline, not its own failure.
      const reason = deadline.reason;
      if (reason) {
        throw reason;
      }
      throw toFeedbackError(error, (message, cause): FeedbackError =>
        new AnalysisFailedError(`Step ${step.name} failed: ${message}`, cause),
      );
    }
  }

  private async runStep(step: AnalysisStep, workingCopy: WorkingCopy, deadline: Deadline): Promise<StepOutcome> {
    switch (step.kind) {
      case 'command':
        return this.runCommand(step, workingCopy, deadline);
      case 'pattern':
        return { findings: await this.scanner.scan(workingCopy.path, step, deadline.signal), exitCode: null };
      case 'required-files':
        return { findings: await this.scanner.checkRequiredFiles(workingCopy.path, step), exitCode: null };
    }
  }

  private async runCommand(step: CommandStep, workingCopy: WorkingCopy, deadline: Deadline): Promise<StepOutcome> {
    const result = await this.commandRunner.execute(step.command, step.args, {
      cwd: workingCopy.path,
      signal: deadline.signal,
      env: {
        FEEDBACKER_STEP: step.name,
        FEEDBACKER_REVISION: workingCopy.revision,
        FEEDBACKER_COMMIT: workingCopy.commitSha,
      },
      killGraceMs: this.options.killGraceMs,
      maxOutputBytes: this.options.maxOutputBytes,
    });

    if (result.signal !== null || result.exitCode === null) {
      throw new AnalysisFailedError(`Step ${step.name} was killed by ${result.signal ?? 'an unknown signal'}`);
    }
    if (!step.acceptExitCodes.includes(result.exitCode)) {
      const stderr = result.stderr.trim().slice(-STDERR_TAIL_CHARS);
      throw new AnalysisFailedError(
        `Step ${step.name} exited with code ${result.exitCode}${stderr ? `: ${stderr}` : ''}`,
      );
    }
    if (result.truncated) {
      throw new AnalysisFailedError(`Step ${step.name} produced more than ${this.options.maxOutputBytes} bytes of output`);
    }

    return {
      findings: this.parser.parse(step.format, result.stdout, step.name, workingCopy.path),
      exitCode: result.exitCode,
    };
  }
}
