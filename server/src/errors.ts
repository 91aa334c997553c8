export class ReportError extends Error {
  readonly code: string;
  readonly exitCode: number;

  constructor(code: string, exitCode: number, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class MissingInputFileError extends ReportError {
  readonly path: string;
  constructor(path: string) {
    super('MISSING_INPUT_FILE', 2, `Input file not found: ${path}`);
    this.path = path;
  }
}

export class InvalidOutputSpecificationError extends ReportError {
  constructor(message: string) {
    super('INVALID_OUTPUT_SPECIFICATION', 3, message);
  }
}

export class InvalidContributionTypeError extends ReportError {
  readonly row: number;
  readonly rawValue: string;
  constructor(row: number, rawValue: string) {
    super('INVALID_CONTRIBUTION_TYPE', 4, `Row ${row}: unrecognized contribution type '${rawValue}'`);
    this.row = row;
    this.rawValue = rawValue;
  }
}

export class EnvironmentDependencyUnavailableError extends ReportError {
  constructor(message: string) {
    super('ENVIRONMENT_DEPENDENCY_UNAVAILABLE', 5, message);
  }
}

export class InvalidInputRowError extends ReportError {
  readonly row: number;
  readonly label: string;
  constructor(row: number, label: string, detail: string) {
    super('INVALID_INPUT_ROW', 6, `Row ${row}, column '${label}': ${detail}`);
    this.row = row;
    this.label = label;
  }
}

export class InvalidParameterError extends ReportError {
  constructor(message: string) {
    super('INVALID_PARAMETER', 7, message);
  }
}

export function exitCodeFor(e: unknown): number {
  return e instanceof ReportError ? e.exitCode : 1;
}
