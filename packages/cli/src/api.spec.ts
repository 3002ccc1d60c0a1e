import { ApiError, cancelJob, getHealth, listJobs, setApiUrl, submitJob } from './api';

describe('api client', () => {
  let fetchMock: jest.SpiedFunction<typeof fetch>;

  function respond(status: number, body: unknown, headers: Record<string, string> = {}): void {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json', ...headers } }),
    );
  }

  beforeEach(() => {
    setApiUrl('http://api.test/api/');
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  it('should post new jobs as JSON', async () => {
    respond(202, { id: 'job-1', state: 'pending' });

    const job = await submitJob({ repositoryUrl: 'git@git.example.com:team/app.git', revision: 'main', analysisSet: ['todos'] });

    expect(job).toEqual({ id: 'job-1', state: 'pending' });
    expect(fetchMock).toHaveBeenCalledWith('http://api.test/api/jobs', {
      method: 'POST',
      body: JSON.stringify({ repositoryUrl: 'git@git.example.com:team/app.git', revision: 'main', analysisSet: ['todos'] }),
      headers: { 'Content-Type': 'application/json' },
    });
  });

  it('should put list filters in the query string', async () => {
    respond(200, { jobs: [], total: 0 });

    await listJobs({ state: 'failed', limit: 5 });

    expect(fetchMock.mock.calls[0][0]).toBe('http://api.test/api/jobs?state=failed&limit=5');
  });

  it('should omit the query string without filters', async () => {
    respond(200, { jobs: [], total: 0 });

    await listJobs();

    expect(fetchMock.mock.calls[0][0]).toBe('http://api.test/api/jobs');
  });

  it('should send DELETE to cancel a job', async () => {
    respond(200, { cancelled: true });

    await expect(cancelJob('job-1')).resolves.toEqual({ cancelled: true });
    expect(fetchMock.mock.calls[0][1]).toMatchObject({ method: 'DELETE' });
  });

  it('should join validation messages into one error', async () => {
    respond(400, { statusCode: 400, message: ['revision should not be empty', 'revision must be a string'] });

    const error = await submitJob({ repositoryUrl: 'git@git.example.com:team/app.git', revision: '' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      message: 'revision should not be empty; revision must be a string',
      status: 400,
      retryAfter: null,
    });
  });

  it('should expose Retry-After on overload', async () => {
    respond(503, { statusCode: 503, message: 'Scheduler is at capacity (3 jobs)' }, { 'Retry-After': '1' });

    const error = await submitJob({ repositoryUrl: 'git@git.example.com:team/app.git', revision: 'main' }).catch(
      (e: unknown) => e,
    );

    expect(error).toMatchObject({ message: 'Scheduler is at capacity (3 jobs)', status: 503, retryAfter: 1 });
  });

  it('should fall back to the status text when the error body is not JSON', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 502, statusText: 'Bad Gateway' }));

    await expect(listJobs()).rejects.toMatchObject({ message: 'Bad Gateway', status: 502 });
  });

  it('should return the health report of a degraded service', async () => {
    respond(503, { status: 'degraded', accepting: false });

    await expect(getHealth()).resolves.toEqual({ status: 'degraded', accepting: false });
  });

  it('should reject health answers other than 200 and 503', async () => {
    respond(500, { statusCode: 500, message: 'boom' });

    await expect(getHealth()).rejects.toMatchObject({ message: 'boom', status: 500 });
  });
});
