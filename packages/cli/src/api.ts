import type {
  CancelJobResponse,
  CreateJobRequest,
  HealthDto,
  JobDto,
  JobEventDto,
  JobListDto,
  JobState,
  JobStatsDto,
  ResultDto,
} from '@feedbacker/shared';

let apiUrl = 'http://localhost:3000/api';

export function setApiUrl(url: string): void {
  apiUrl = url.replace(/\/+$/, '');
}

export function getApiUrl(): string {
  return apiUrl;
}

/**
 * Non-2xx answer from the API. `retryAfter` is in seconds, from the Retry-After header.
 */
export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly retryAfter: number | null = null,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

async function request<T>(path: string, options?: RequestInit): Promise<T> {
  const response = await send(path, options);

  if (!response.ok) {
    throw await toApiError(response);
  }

  return response.json() as Promise<T>;
}

function send(path: string, options?: RequestInit): Promise<Response> {
  return fetch(`${apiUrl}${path}`, {
    ...options,
    headers: {
      'Content-Type': 'application/json',
      ...options?.headers,
    },
  });
}

async function toApiError(response: Response): Promise<ApiError> {
  const errorData = await response.json().catch(() => ({ message: response.statusText })) as {
    message?: string | string[];
  };
  const message = Array.isArray(errorData.message) ? errorData.message.join('; ') : errorData.message;
  const retryAfter = Number(response.headers.get('retry-after'));

  return new ApiError(
    message || `HTTP ${response.status}`,
    response.status,
    Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter : null,
  );
}

// Jobs API
export async function submitJob(body: CreateJobRequest): Promise<JobDto> {
  return request<JobDto>('/jobs', {
    method: 'POST',
    body: JSON.stringify(body),
  });
}

export async function listJobs(filter: { state?: JobState; limit?: number } = {}): Promise<JobListDto> {
  const params = new URLSearchParams();
  if (filter.state) params.set('state', filter.state);
  if (filter.limit) params.set('limit', filter.limit.toString());
  const query = params.toString() ? `?${params.toString()}` : '';
  return request<JobListDto>(`/jobs${query}`);
}

export async function getJob(id: string): Promise<JobDto> {
  return request<JobDto>(`/jobs/${encodeURIComponent(id)}`);
}

export async function getResult(id: string): Promise<ResultDto> {
  return request<ResultDto>(`/jobs/${encodeURIComponent(id)}/result`);
}

export async function getEvents(id: string): Promise<JobEventDto[]> {
  return request<JobEventDto[]>(`/jobs/${encodeURIComponent(id)}/events`);
}

export async function getStats(): Promise<JobStatsDto> {
  return request<JobStatsDto>('/jobs/stats');
}

export async function cancelJob(id: string): Promise<CancelJobResponse> {
  return request<CancelJobResponse>(`/jobs/${encodeURIComponent(id)}`, { method: 'DELETE' });
}

// Health API: a degraded service answers 503 with the same body
export async function getHealth(): Promise<HealthDto> {
  const response = await send('/health');
  if (response.ok || response.status === 503) {
    return response.json() as Promise<HealthDto>;
  }
  throw await toApiError(response);
}
