import { Deadline } from '../value-objects/Deadline';
import { RepositoryRef } from '../value-objects/RepositoryRef';

/**
 * A repository materialized on disk at a resolved commit.
 */
export interface WorkingCopy {
  path: string;
  repositoryUrl: string;
  revision: string;
  commitSha: string;
}

export interface FetchRequest {
  repository: RepositoryRef;
  dest: string;
  deadline: Deadline;
}

/**
 * Port for materializing a repository revision.
 * Throws AuthError, NetworkError or RevisionNotFoundError; on any failure `dest` no longer exists.
 */
export interface IRepositoryFetcher {
  fetch(request: FetchRequest): Promise<WorkingCopy>;
}

export const REPOSITORY_FETCHER = Symbol('IRepositoryFetcher');
