import {
  BadRequestException,
  ConflictException,
  HttpException,
  InternalServerErrorException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { InvalidJobRequestError, JobNotFoundError } from '../../../application/errors';
import { isFeedbackError } from '../../../domain/errors';

/**
 * Maps application and domain errors onto HTTP responses.
 */
export function toHttpException(error: unknown): HttpException {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof JobNotFoundError) {
    return new NotFoundException(error.message);
  }
  if (error instanceof InvalidJobRequestError) {
    return new BadRequestException(error.message);
  }
  if (isFeedbackError(error)) {
    switch (error.kind) {
      case 'Overloaded':
        return new ServiceUnavailableException(error.message);
      case 'PersistenceError':
        return error.retryable ? new ServiceUnavailableException(error.message) : new ConflictException(error.message);
      default:
        return new InternalServerErrorException(error.message);
    }
  }
  return new InternalServerErrorException(error instanceof Error ? error.message : 'Unexpected error');
}
