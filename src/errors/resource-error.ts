import { PsGraphError } from './base.ts';

/**
 * Error thrown when a collaborator the operation depends on is missing:
 * no document to write to, no graph paper for a key, an unreadable file.
 */
export class ResourceError extends PsGraphError {
  readonly resource: string;
  readonly reason: string;

  constructor(resource: string, reason: string, options?: { hint?: string; cause?: unknown }) {
    super(`${resource} ${reason}`, options?.hint, { cause: options?.cause });
    this.name = 'ResourceError';
    this.resource = resource;
    this.reason = reason;
  }

  protected override _getExpression(): string {
    return this.resource;
  }

  protected override _getDetail(): string {
    return `${this.resource} ${this.reason}`;
  }
}
