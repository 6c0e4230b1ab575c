/**
 * Base error class for all psgraph errors.
 * Provides formatted error output with location tracking and hints.
 */
export class PsGraphError extends Error {
  readonly hint?: string;
  readonly location?: { file: string; line: number; column: number };

  constructor(message: string, hint?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PsGraphError';
    this.hint = hint;
    this.location = this._extractLocation();
  }

  private _extractLocation(): { file: string; line: number; column: number } | undefined {
    const stack = this.stack;
    if (!stack) return undefined;

    for (const line of stack.split('\n').slice(1)) {
      if (line.includes('node_modules') || line.includes('/errors/')) continue;

      const match =
        line.match(/at .+? \((.+?):(\d+):(\d+)\)/) ?? line.match(/at (.+?):(\d+):(\d+)/);
      if (!match) continue;

      const [, file, row, column] = match;
      if (file === undefined || row === undefined || column === undefined) continue;
      return {
        file,
        line: Number.parseInt(row, 10),
        column: Number.parseInt(column, 10),
      };
    }
    return undefined;
  }

  format(): string {
    const lines: string[] = [];

    const loc = this.location
      ? ` at ${this.location.file.split('/').pop()}:${this.location.line}:${this.location.column}`
      : '';

    lines.push(`error: ${this.message}${loc}`);
    lines.push(`  --> ${this._getExpression()}`);
    lines.push('   |');
    lines.push(`   └── ${this._getDetail()}`);

    if (this.hint) {
      lines.push('');
      lines.push(`help: ${this.hint}`);
    }

    return lines.join('\n');
  }

  protected _getExpression(): string {
    return '(graph)';
  }

  protected _getDetail(): string {
    return this.message;
  }
}
