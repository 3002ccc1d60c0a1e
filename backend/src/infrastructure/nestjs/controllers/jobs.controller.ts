import {
  Controller,
  Get,
  Post,
  Delete,
  Param,
  Body,
  HttpCode,
  HttpStatus,
  Inject,
  NotFoundException,
  ParseUUIDPipe,
  Query,
  Res,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  CreateJobDto,
  ListJobsQueryDto,
  JobResponseDto,
  JobListResponseDto,
  JobEventDto,
  JobStatsDto,
  ResultDto,
  CancelJobResponse,
  toJobDto,
  toJobEventDto,
  toJobStatsDto,
  toResultDto,
} from '../dto';
import { IResultStore, PersistedResult, RESULT_STORE, OverloadedError } from '../../../domain';
import { SubmitJobCommand } from '../../../application/commands/SubmitJob';
import { CancelJobCommand } from '../../../application/commands/CancelJob';
import { GetJobStatusQuery } from '../../../application/queries/GetJobStatus';
import { JobScheduler } from '../../../application/services/JobScheduler';
import { AnalysisCatalog } from '../../analysis/AnalysisCatalog';
import { toHttpException } from './http-errors';

@Controller('jobs')
export class JobsController {
  constructor(
    private readonly scheduler: JobScheduler,
    private readonly catalog: AnalysisCatalog,
    @Inject(RESULT_STORE)
    private readonly store: IResultStore,
  ) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  async create(
    @Body() dto: CreateJobDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<JobResponseDto> {
    const command = new SubmitJobCommand(this.scheduler, this.catalog);

    try {
      const job = await command.execute({
        repositoryUrl: dto.repositoryUrl,
        revision: dto.revision,
        analysisSet: dto.analysisSet,
      });
      return toJobDto(job);
    } catch (error) {
      if (error instanceof OverloadedError) {
        res.setHeader('Retry-After', String(Math.ceil(error.retryAfterMs / 1000)));
      }
      throw toHttpException(error);
    }
  }

  @Get()
  async findAll(@Query() query: ListJobsQueryDto): Promise<JobListResponseDto> {
    const { jobs, total } = await this.query().list({ state: query.state, limit: query.limit });
    return { jobs: jobs.map(toJobDto), total };
  }

  @Get('stats')
  async stats(): Promise<JobStatsDto> {
    return toJobStatsDto(await this.query().countByState());
  }

  @Get(':id')
  async findOne(@Param('id', ParseUUIDPipe) id: string): Promise<JobResponseDto> {
    try {
      return toJobDto(await this.query().getById(id));
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Get(':id/result')
  async result(@Param('id', ParseUUIDPipe) id: string): Promise<ResultDto> {
    let persisted: PersistedResult | null;
    try {
      persisted = await this.query().getResult(id);
    } catch (error) {
      throw toHttpException(error);
    }
    if (!persisted) {
      throw new NotFoundException(`Job ${id} has no result`);
    }
    return toResultDto(persisted);
  }

  @Get(':id/events')
  async events(@Param('id', ParseUUIDPipe) id: string): Promise<JobEventDto[]> {
    try {
      const events = await this.query().listEvents(id);
      return events.map(toJobEventDto);
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Delete(':id')
  async cancel(@Param('id', ParseUUIDPipe) id: string): Promise<CancelJobResponse> {
    const command = new CancelJobCommand(this.scheduler);

    try {
      return await command.execute({ jobId: id });
    } catch (error) {
      throw toHttpException(error);
    }
  }

  private query(): GetJobStatusQuery {
    return new GetJobStatusQuery(this.scheduler, this.store);
  }
}
