import { PsGraphError } from './base.ts';

/**
 * Error thrown when delimited input data does not have the shape a chart needs.
 */
export class DataShapeError extends PsGraphError {
  readonly source: string;
  /** 1-based row number, when the problem belongs to one row */
  readonly row: number | undefined;
  readonly reason: string;

  constructor(source: string, reason: string, row?: number, hint?: string) {
    super(row === undefined ? `${source}: ${reason}` : `${source} row ${row}: ${reason}`, hint);
    this.name = 'DataShapeError';
    this.source = source;
    this.row = row;
    this.reason = reason;
  }

  protected override _getExpression(): string {
    return this.row === undefined ? this.source : `${this.source}:${this.row}`;
  }

  protected override _getDetail(): string {
    return this.reason;
  }
}
