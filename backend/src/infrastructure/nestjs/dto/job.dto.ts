import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import type {
  JobDto,
  JobEventDto,
  JobStatsDto,
  ResultDto,
  JobState,
} from '@feedbacker/shared';
import { JobSnapshot } from '../../../domain/entities/FeedbackJob';
import { JobEvent, PersistedResult } from '../../../domain/repositories/IResultStore';
import { JOB_STATE_VALUES, JobStateValue } from '../../../domain/value-objects/JobState';

// Request DTOs with validation (stay in backend)
export class CreateJobDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(2048)
  repositoryUrl!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  revision!: string;

  @IsOptional()
  @IsArray()
  @ArrayMinSize(1)
  @IsString({ each: true })
  @Matches(/^[a-z0-9][a-z0-9-]*$/, { each: true })
  analysisSet?: string[];
}

export class ListJobsQueryDto {
  @IsOptional()
  @IsIn(JOB_STATE_VALUES)
  state?: JobStateValue;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(500)
  limit?: number;
}

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function toJobDto(snapshot: JobSnapshot): JobDto {
  return {
    id: snapshot.id,
    repositoryUrl: snapshot.repositoryUrl,
    revision: snapshot.revision,
    analysisSet: snapshot.analysisSet,
    state: snapshot.state,
    attempt: snapshot.attempt,
    maxAttempts: snapshot.maxAttempts,
    createdAt: snapshot.createdAt.toISOString(),
    startedAt: iso(snapshot.startedAt),
    finishedAt: iso(snapshot.finishedAt),
    updatedAt: snapshot.updatedAt.toISOString(),
    nextRetryAt: iso(snapshot.nextRetryAt),
    lastError: snapshot.lastError,
  };
}

export function toJobEventDto(event: JobEvent): JobEventDto {
  return {
    id: event.id,
    attempt: event.attempt,
    state: event.state,
    error: event.error,
    recordedAt: event.recordedAt.toISOString(),
  };
}

export function toResultDto(persisted: PersistedResult): ResultDto {
  const { result } = persisted;
  return {
    jobId: persisted.jobId,
    attempt: persisted.attempt,
    passed: result.passed,
    checksum: result.checksum,
    counts: result.countBySeverity(),
    findings: result.findings.map((finding) => ({
      ...finding,
      location: { ...finding.location },
    })),
    steps: result.steps.map((step) => ({ ...step })),
    createdAt: persisted.createdAt.toISOString(),
  };
}

export function toJobStatsDto(counts: Record<JobState, number>): JobStatsDto {
  return {
    counts,
    total: Object.values(counts).reduce((sum, count) => sum + count, 0),
  };
}

// Re-export response types from shared
export type {
  JobDto as JobResponseDto,
  JobListDto as JobListResponseDto,
  JobEventDto,
  JobStatsDto,
  ResultDto,
  CancelJobResponse,
  HealthDto,
} from '@feedbacker/shared';
