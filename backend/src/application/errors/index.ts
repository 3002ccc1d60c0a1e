/**
 * Application-level errors; controllers map them to HTTP statuses.
 */
export class JobNotFoundError extends Error {
  constructor(readonly jobId: string) {
    super(`Job not found: ${jobId}`);
    this.name = 'JobNotFoundError';
  }
}

export class InvalidJobRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidJobRequestError';
  }
}
