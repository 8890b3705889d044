/**
 * Error taxonomy.
 *
 *   NotFoundError      — input path does not exist (fatal)
 *   FieldNotFoundError — trace-header field absent from the layout (recoverable)
 *   DecodeFailure      — structural headers corrupt or unsupported (fatal)
 *   InvalidConfigError — load configuration rejected by validation
 */

export class SegyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends SegyError {
  readonly path: string;

  constructor(path: string) {
    super(`SEG-Y file not found: ${path}`);
    this.path = path;
  }
}

export class FieldNotFoundError extends SegyError {
  readonly field: number;

  constructor(field: number) {
    super(`Trace header field ${field} is not part of the SEG-Y trace header layout.`);
    this.field = field;
  }
}

export class DecodeFailure extends SegyError {
  readonly path: string;
  readonly reason: string;

  constructor(path: string, reason: string) {
    super(`Invalid SEG-Y file ${path}: ${reason}`);
    this.path = path;
    this.reason = reason;
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class InvalidConfigError extends SegyError {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(
      `Invalid load configuration: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`,
    );
    this.issues = issues;
  }
}
