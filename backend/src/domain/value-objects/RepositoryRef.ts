export type RepositoryTransport = 'ssh' | 'https' | 'file';

// User and host start with a word character so neither can pass for an option.
const SCP_LIKE_PATTERN = /^\w[\w.-]*@\w[\w.-]*:(?!\/\/)[\w./~-]+$/;
const SSH_URL_PATTERN = /^ssh:\/\/(?:\w[\w.-]*@)?\w[\w.-]*(?::\d+)?\/[\w./~-]+$/;
const HTTPS_URL_PATTERN = /^https:\/\/\w[\w.-]*(?::\d+)?\/[\w./~-]+$/;
const FILE_URL_PATTERN = /^file:\/\/\/[^\s]+$/;
const REVISION_PATTERN = /^[A-Za-z0-9._/-]+$/;
const MAX_REVISION_LENGTH = 255;

/**
 * Value Object representing a repository location plus the revision to analyze
 * Accepts scp-like ssh (git@host:owner/repo.git), ssh://, https:// and file:// URLs
 */
export class RepositoryRef {
  private readonly _url: string;
  private readonly _revision: string;
  private readonly _transport: RepositoryTransport;

  private constructor(url: string, revision: string, transport: RepositoryTransport) {
    this._url = url;
    this._revision = revision;
    this._transport = transport;
  }

  static create(url: string, revision: string): RepositoryRef {
    if (!url || url.trim() === '') {
      throw new Error('Repository URL cannot be empty');
    }
    const trimmedUrl = url.trim();
    const transport = trimmedUrl.startsWith('-') ? null : RepositoryRef.detectTransport(trimmedUrl);
    if (!transport) {
      throw new Error(`Unsupported repository URL: ${trimmedUrl}`);
    }

    return new RepositoryRef(trimmedUrl, RepositoryRef.validateRevision(revision), transport);
  }

  /**
   * Revisions end up on a git command line, so option-looking and
   * path-escaping values are refused.
   */
  static validateRevision(revision: string): string {
    const value = (revision ?? '').trim();
    if (value === '') {
      throw new Error('Revision cannot be empty');
    }
    if (value.length > MAX_REVISION_LENGTH) {
      throw new Error(`Revision is longer than ${MAX_REVISION_LENGTH} characters`);
    }
    if (value.startsWith('-') || value.includes('..') || !REVISION_PATTERN.test(value)) {
      throw new Error(`Invalid revision: ${value}`);
    }
    return value;
  }

  private static detectTransport(url: string): RepositoryTransport | null {
    if (SSH_URL_PATTERN.test(url) || SCP_LIKE_PATTERN.test(url)) {
      return 'ssh';
    }
    if (HTTPS_URL_PATTERN.test(url)) {
      return 'https';
    }
    if (FILE_URL_PATTERN.test(url)) {
      return 'file';
    }
    return null;
  }

  get url(): string {
    return this._url;
  }

  get revision(): string {
    return this._revision;
  }

  get transport(): RepositoryTransport {
    return this._transport;
  }

  get name(): string {
    const lastSegment = this._url.split(/[/:]/).filter(Boolean).pop() ?? this._url;
    return lastSegment.replace(/\.git$/, '');
  }

  equals(other: RepositoryRef): boolean {
    return this._url === other._url && this._revision === other._revision;
  }

  toString(): string {
    return `${this._url}@${this._revision}`;
  }
}
