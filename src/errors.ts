// src/errors.ts
// What: Error classes for conditions that abort an operation.
// How: Each carries a stable `code` and an HTTP `status` picked up by the centralized error handler in app.ts.
//      Recoverable conditions (no results, unknown course) are not errors here; tools report them as text.

export class AppError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(message: string, code: string, status = 500, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/** A course document whose header cannot be read. Only that document is skipped. */
export class ParseError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'parse_error', 422, options);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'config_error', 500, options);
  }
}

/** Tool-call arguments from the model that are not a JSON object. Fatal for the turn. */
export class ToolCallParseError extends AppError {
  readonly toolName: string;

  constructor(toolName: string, message: string, options?: ErrorOptions) {
    super(message, 'tool_call_parse_error', 502, options);
    this.toolName = toolName;
  }
}
