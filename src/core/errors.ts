// Base domain error class
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly timestamp: string;

  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date().toISOString();
  }
}

// Malformed input text (400)
export class ParseError extends DomainError {
  readonly code = 'PARSE_ERROR';
  readonly statusCode = 400;

  constructor(
    message: string,
    public readonly source: string,
    public readonly lineNumber: number,
    public readonly line: string,
    details?: Record<string, unknown>
  ) {
    super(message, { source, lineNumber, line, ...details });
  }

  static invalidItemLine(source: string, lineNumber: number, line: string): ParseError {
    return new ParseError(
      `${source}:${lineNumber}: expected "<id> <name>", got "${line}"`,
      source,
      lineNumber,
      line
    );
  }
}

// Input file could not be read (422)
export class InputFileError extends DomainError {
  readonly code = 'INPUT_FILE_ERROR';
  readonly statusCode = 422;

  constructor(
    message: string,
    public readonly filePath: string,
    public readonly reason?: string,
    details?: Record<string, unknown>
  ) {
    super(message, { filePath, reason, ...details });
  }

  static unreadable(filePath: string, reason: string): InputFileError {
    return new InputFileError(`Cannot read ${filePath}: ${reason}`, filePath, reason);
  }
}

// Bad command line invocation (400)
export class UsageError extends DomainError {
  readonly code = 'USAGE_ERROR';
  readonly statusCode = 400;

  static missingArguments(program: string): UsageError {
    return new UsageError(`Usage: ${program} items_filename inventories_filename`, { program });
  }
}

// Error factory for creating standardized error responses
export class ErrorFactory {
  static createErrorResponse(error: DomainError) {
    return {
      success: false as const,
      error: {
        name: error.name,
        message: error.message,
        code: error.code,
        statusCode: error.statusCode,
        timestamp: error.timestamp,
        details: error.details,
      },
    };
  }
}
