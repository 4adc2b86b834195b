export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    const message = id
      ? `${resource} with id '${id}' not found`
      : `${resource} not found`;
    super(message, 404, 'NOT_FOUND');
  }
}

/**
 * Raised when an email body is empty or unreadable. No event is produced.
 */
export class EmptyInputError extends AppError {
  constructor(source?: string) {
    super(
      source ? `Email '${source}' is empty or unreadable` : 'Email content is empty or unreadable',
      422,
      'EMPTY_INPUT'
    );
  }
}

/**
 * Malformed workflow settings, price list or discount tiers. Fatal at load time.
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, 'CONFIGURATION_ERROR', false);
  }
}

export class AgentExecutionError extends AppError {
  constructor(agentName: string, message: string) {
    super(`Agent '${agentName}' execution failed: ${message}`, 500, 'AGENT_EXECUTION_ERROR');
  }
}

export class StorageError extends AppError {
  constructor(message: string) {
    super(message, 500, 'STORAGE_ERROR');
  }
}
