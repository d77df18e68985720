/**
 * Structured error handling with error codes, severity levels, and recovery suggestions.
 */

/**
 * Error severity levels
 */
export type ErrorSeverity = 'critical' | 'error' | 'warning' | 'transient';

/**
 * Error codes for all known error types
 */
export enum ErrorCode {
  // Configuration errors
  SERVER_NOT_CONFIGURED = 'SERVER_NOT_CONFIGURED',
  CONFIG_INVALID = 'CONFIG_INVALID',
  VALIDATION_FAILED = 'VALIDATION_FAILED',

  // Authentication errors
  TOKEN_MISSING = 'TOKEN_MISSING',
  AUTH_FAILED = 'AUTH_FAILED',

  // Server / connectivity errors
  SERVER_UNREACHABLE = 'SERVER_UNREACHABLE',
  REQUEST_TIMEOUT = 'REQUEST_TIMEOUT',
  SERVER_ERROR = 'SERVER_ERROR',
  INVALID_RESPONSE = 'INVALID_RESPONSE',

  // Filesystem errors
  SAVES_DIR_NOT_FOUND = 'SAVES_DIR_NOT_FOUND',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  FILE_OPERATION_FAILED = 'FILE_OPERATION_FAILED',

  // Local registry errors
  GAME_NOT_FOUND = 'GAME_NOT_FOUND',
  GAME_ALREADY_EXISTS = 'GAME_ALREADY_EXISTS',

  // General errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/**
 * Recovery action that can be taken for an error
 */
export interface RecoveryAction {
  description: string;
  automatic: boolean;
}

/**
 * Context information for debugging
 */
export interface ErrorContext {
  operation?: string;
  component?: string;
  gameName?: string;
  path?: string;
  host?: string;
  endpoint?: string;
  statusCode?: number;
  timestamp?: string;
  [key: string]: unknown;
}

export interface StructuredErrorOptions {
  severity?: ErrorSeverity;
  recoveryActions?: RecoveryAction[];
  context?: ErrorContext;
  cause?: unknown;
  isRetryable?: boolean;
}

const TRANSIENT_CODES: readonly ErrorCode[] = [
  ErrorCode.SERVER_UNREACHABLE,
  ErrorCode.REQUEST_TIMEOUT,
];

const CRITICAL_CODES: readonly ErrorCode[] = [
  ErrorCode.SERVER_NOT_CONFIGURED,
  ErrorCode.TOKEN_MISSING,
  ErrorCode.AUTH_FAILED,
  ErrorCode.CONFIG_INVALID,
];

/**
 * Base structured error class
 */
export class StructuredError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly recoveryActions: RecoveryAction[];
  public readonly context: ErrorContext;
  public readonly isRetryable: boolean;
  public readonly timestamp: string;

  constructor(code: ErrorCode, message: string, options: StructuredErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'StructuredError';
    this.code = code;
    this.severity = options.severity ?? inferSeverity(code);
    this.timestamp = new Date().toISOString();
    this.context = {
      ...options.context,
      timestamp: this.timestamp,
    };
    this.isRetryable = options.isRetryable ?? TRANSIENT_CODES.includes(code);
    this.recoveryActions = options.recoveryActions ?? defaultRecoveryActions(code, this.context);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      severity: this.severity,
      isRetryable: this.isRetryable,
      recoveryActions: this.recoveryActions.map((a) => ({
        description: a.description,
        automatic: a.automatic,
      })),
      context: this.context,
      timestamp: this.timestamp,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }

  getRecoverySuggestions(): string[] {
    return this.recoveryActions.map((a) => a.description);
  }
}

function inferSeverity(code: ErrorCode): ErrorSeverity {
  if (TRANSIENT_CODES.includes(code)) return 'transient';
  if (CRITICAL_CODES.includes(code)) return 'critical';
  return 'error';
}

function defaultRecoveryActions(code: ErrorCode, context: ErrorContext): RecoveryAction[] {
  const host = context.host ? ` at ${context.host}` : '';
  const where = context.path ? ` on ${context.path}` : '';

  switch (code) {
    case ErrorCode.SERVER_NOT_CONFIGURED:
      return [{ description: 'Set the server address with: mnemy server set <host>', automatic: false }];
    case ErrorCode.TOKEN_MISSING:
      return [{ description: 'Save your API token with: mnemy token set <token>', automatic: false }];
    case ErrorCode.AUTH_FAILED:
      return [{ description: 'Check that the API token is correct (mnemy token set <token>)', automatic: false }];
    case ErrorCode.SERVER_UNREACHABLE:
    case ErrorCode.REQUEST_TIMEOUT:
      return [
        { description: `Check that the server is running and reachable${host}`, automatic: false },
        { description: 'Retry the operation once the server responds', automatic: true },
      ];
    case ErrorCode.SERVER_ERROR:
    case ErrorCode.INVALID_RESPONSE:
      return [{ description: 'Check the mnemy-server logs and that client and server versions match', automatic: false }];
    case ErrorCode.PERMISSION_DENIED:
      return [{ description: `Check that Mnemy has read permission${where}`, automatic: false }];
    case ErrorCode.SAVES_DIR_NOT_FOUND:
      return [{ description: 'Point the game at an existing save directory with: mnemy games edit <name> --saves <dir>', automatic: false }];
    case ErrorCode.GAME_NOT_FOUND:
      return [{ description: 'List registered games with: mnemy games list', automatic: false }];
    default:
      return [];
  }
}

/**
 * Error raised while talking to mnemy-server.
 */
export class ApiError extends StructuredError {
  public readonly statusCode?: number;
  public readonly endpoint?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options: StructuredErrorOptions & { statusCode?: number; endpoint?: string; host?: string } = {}
  ) {
    const serverSide = options.statusCode !== undefined && options.statusCode >= 500;
    super(code, message, {
      ...options,
      severity: options.severity ?? (serverSide ? 'transient' : undefined),
      isRetryable: options.isRetryable ?? (serverSide || undefined),
      context: {
        ...options.context,
        statusCode: options.statusCode,
        endpoint: options.endpoint,
        host: options.host,
      },
    });
    this.name = 'ApiError';
    this.statusCode = options.statusCode;
    this.endpoint = options.endpoint;
  }
}

/**
 * Error raised by local file operations on save directories and archives.
 */
export class FileSystemError extends StructuredError {
  constructor(code: ErrorCode, message: string, options: StructuredErrorOptions & { path?: string } = {}) {
    super(code, message, {
      ...options,
      context: { ...options.context, path: options.path },
    });
    this.name = 'FileSystemError';
  }
}

/**
 * Error raised by the local games registry.
 */
export class RegistryError extends StructuredError {
  constructor(code: ErrorCode, message: string, options: StructuredErrorOptions = {}) {
    super(code, message, options);
    this.name = 'RegistryError';
  }
}

/**
 * Error raised for invalid settings, credentials or user input.
 */
export class ConfigError extends StructuredError {
  constructor(code: ErrorCode, message: string, options: StructuredErrorOptions = {}) {
    super(code, message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Node errors carry a string `code` (ENOENT, EACCES, ...).
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map a Node filesystem error to a FileSystemError.
 */
export function fromNodeFsError(error: unknown, path: string, operation?: string): FileSystemError {
  const nodeCode = getErrorCode(error);
  const detail = error instanceof Error ? error.message : String(error);

  if (nodeCode === 'ENOENT' || nodeCode === 'ENOTDIR') {
    return new FileSystemError(ErrorCode.SAVES_DIR_NOT_FOUND, `Directory not found: ${path}`, {
      path,
      cause: error,
      context: { operation },
    });
  }
  if (nodeCode === 'EACCES' || nodeCode === 'EPERM') {
    return new FileSystemError(ErrorCode.PERMISSION_DENIED, `Permission denied: ${path}`, {
      path,
      cause: error,
      context: { operation },
    });
  }
  return new FileSystemError(ErrorCode.FILE_OPERATION_FAILED, `File operation failed on ${path}: ${detail}`, {
    path,
    cause: error,
    context: { operation },
  });
}

/**
 * Wrap any thrown value in a StructuredError, keeping structured errors as they are.
 */
export function toStructuredError(error: unknown, fallbackCode: ErrorCode = ErrorCode.UNKNOWN_ERROR): StructuredError {
  if (error instanceof StructuredError) {
    return error;
  }
  if (error instanceof Error) {
    return new StructuredError(fallbackCode, error.message, { cause: error });
  }
  return new StructuredError(fallbackCode, String(error));
}

/**
 * One-line representation: `[CODE] message`
 */
export function formatError(error: unknown): string {
  if (error instanceof StructuredError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isStructuredError(error: unknown): error is StructuredError {
  return error instanceof StructuredError;
}
