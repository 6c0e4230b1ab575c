import { PsGraphError } from './base.ts';

/**
 * Error thrown when an option is invalid or the options contradict each other.
 * Always raised while a layout is being constructed, before any output is written.
 */
export class ConfigurationError extends PsGraphError {
  /** Dotted option path, e.g. `yAxis.high` */
  readonly field: string;
  readonly reason: string;

  constructor(field: string, reason: string, hint?: string) {
    super(`invalid ${field}: ${reason}`, hint);
    this.name = 'ConfigurationError';
    this.field = field;
    this.reason = reason;
  }

  protected override _getExpression(): string {
    return `{ ${this.field.split('.').join(': { ')}${' }'.repeat(this.field.split('.').length)}`;
  }

  protected override _getDetail(): string {
    return `'${this.field}' ${this.reason}`;
  }
}
