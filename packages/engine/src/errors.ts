// Stablecore Engine Error System
//
// Provides structured error types with:
// - Error codes for programmatic handling
// - User-friendly messages for display
// - Debugging context for troubleshooting

// ============================================================================
// Error Codes
// ============================================================================

export type EngineErrorCode =
  // Input Errors
  | 'MUST_BE_MORE_THAN_ZERO'
  | 'NEGATIVE_AMOUNT'
  | 'ZERO_ADDRESS'
  | 'VALIDATION_ERROR'
  // Registry Errors
  | 'COLLATERAL_NOT_ALLOWED'
  | 'CONFIGURATION_INVALID'
  // Health Errors
  | 'HEALTH_FACTOR_TOO_LOW'
  | 'HEALTH_FACTOR_OK'
  | 'HEALTH_FACTOR_NOT_IMPROVED'
  // Token Errors
  | 'INSUFFICIENT_BALANCE'
  | 'INSUFFICIENT_ALLOWANCE'
  | 'TRANSFER_FAILED'
  | 'MINT_FAILED'
  | 'UNAUTHORIZED'
  // Execution Errors
  | 'REENTRANT_CALL'
  // Math Errors
  | 'UNDERFLOW'
  | 'DIVISION_BY_ZERO'
  // Oracle Errors
  | 'ORACLE_STALE'
  | 'ORACLE_NOT_INITIALIZED'
  // Network Errors
  | 'NETWORK_ERROR'
  | 'TIMEOUT'
  // General Errors
  | 'UNKNOWN_ERROR';

// ============================================================================
// Main Error Class
// ============================================================================

export interface EngineErrorDetails {
  /** Additional context for debugging */
  context?: Record<string, unknown>;
  /** Original error that caused this error */
  cause?: Error;
  /** Whether a corrected call can succeed */
  recoverable?: boolean;
  /** Suggested action for the caller */
  suggestion?: string;
}

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly userMessage: string;
  readonly context?: Record<string, unknown>;
  declare readonly cause?: Error;
  readonly recoverable: boolean;
  readonly suggestion?: string;
  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    details?: EngineErrorDetails
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.userMessage = getUserFriendlyMessage(code);
    this.context = details?.context;
    this.cause = details?.cause;
    this.recoverable = details?.recoverable ?? isRecoverableError(code);
    this.suggestion = details?.suggestion ?? getSuggestion(code);
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EngineError);
    }
  }

  /**
   * Create a JSON-safe representation for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      userMessage: this.userMessage,
      context: this.context === undefined ? undefined : toJsonSafe(this.context),
      recoverable: this.recoverable,
      suggestion: this.suggestion,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

export function isEngineError(error: unknown, code?: EngineErrorCode): error is EngineError {
  return error instanceof EngineError && (code === undefined || error.code === code);
}

// ============================================================================
// Error Factory Functions
// ============================================================================

export function createAmountError(
  code: 'MUST_BE_MORE_THAN_ZERO' | 'NEGATIVE_AMOUNT' | 'UNDERFLOW' | 'DIVISION_BY_ZERO',
  context?: Record<string, unknown>
): EngineError {
  const messages: Record<typeof code, string> = {
    MUST_BE_MORE_THAN_ZERO: 'Amount must be more than zero',
    NEGATIVE_AMOUNT: 'Amount must not be negative',
    UNDERFLOW: 'Arithmetic underflow: balance would become negative',
    DIVISION_BY_ZERO: 'Division by zero: price is zero or negative',
  };

  return new EngineError(code, messages[code], { context });
}

export function createHealthError(
  code: 'HEALTH_FACTOR_TOO_LOW' | 'HEALTH_FACTOR_OK' | 'HEALTH_FACTOR_NOT_IMPROVED',
  context?: Record<string, unknown>
): EngineError {
  const messages: Record<typeof code, string> = {
    HEALTH_FACTOR_TOO_LOW: 'Health factor is below the minimum',
    HEALTH_FACTOR_OK: 'Health factor is above the minimum; account cannot be liquidated',
    HEALTH_FACTOR_NOT_IMPROVED: 'Liquidation did not improve the health factor',
  };

  return new EngineError(code, messages[code], { context });
}

export function createTokenError(
  code: 'INSUFFICIENT_BALANCE' | 'INSUFFICIENT_ALLOWANCE' | 'TRANSFER_FAILED' | 'MINT_FAILED' | 'UNAUTHORIZED' | 'ZERO_ADDRESS',
  context?: Record<string, unknown>
): EngineError {
  const messages: Record<typeof code, string> = {
    INSUFFICIENT_BALANCE: 'Transfer amount exceeds balance',
    INSUFFICIENT_ALLOWANCE: 'Transfer amount exceeds allowance',
    TRANSFER_FAILED: 'Token transfer failed',
    MINT_FAILED: 'Stable token mint failed',
    UNAUTHORIZED: 'Caller is not the owner',
    ZERO_ADDRESS: 'Zero address is not allowed',
  };

  return new EngineError(code, messages[code], { context });
}

export function createOracleError(
  code: 'ORACLE_STALE' | 'ORACLE_NOT_INITIALIZED',
  context?: Record<string, unknown>
): EngineError {
  const messages: Record<typeof code, string> = {
    ORACLE_STALE: 'Price feed round is stale',
    ORACLE_NOT_INITIALIZED: 'Price feed has not reported a round yet',
  };

  return new EngineError(code, messages[code], { context });
}

export function createNetworkError(
  code: 'NETWORK_ERROR' | 'TIMEOUT',
  message: string,
  cause?: Error
): EngineError {
  return new EngineError(code, message, {
    cause,
    recoverable: true,
    suggestion: 'Check the feed endpoint and refresh again.',
  });
}

// ============================================================================
// Error Wrapping Utilities
// ============================================================================

/**
 * Wrap any error as an EngineError
 */
export function wrapError(error: unknown, fallbackCode: EngineErrorCode = 'UNKNOWN_ERROR'): EngineError {
  if (error instanceof EngineError) {
    return error;
  }

  if (error instanceof Error) {
    const code = detectErrorCode(error);
    return new EngineError(code || fallbackCode, error.message, { cause: error });
  }

  return new EngineError(fallbackCode, String(error));
}

/**
 * Detect error code from a foreign error
 */
function detectErrorCode(error: Error): EngineErrorCode | null {
  if (error instanceof RangeError && /division by zero/i.test(error.message)) {
    return 'DIVISION_BY_ZERO';
  }

  const message = error.message.toLowerCase();

  if (error.name === 'AbortError' || message.includes('timeout')) {
    return 'TIMEOUT';
  }
  if (message.includes('network') || message.includes('fetch')) {
    return 'NETWORK_ERROR';
  }

  return null;
}

// ============================================================================
// User-Friendly Message Generators
// ============================================================================

function getUserFriendlyMessage(code: EngineErrorCode): string {
  const messages: Record<EngineErrorCode, string> = {
    MUST_BE_MORE_THAN_ZERO: 'The amount must be greater than zero.',
    NEGATIVE_AMOUNT: 'The amount cannot be negative.',
    ZERO_ADDRESS: 'A valid, non-zero address is required.',
    VALIDATION_ERROR: 'Input validation failed. Please check your inputs.',

    COLLATERAL_NOT_ALLOWED: 'This asset is not accepted as collateral.',
    CONFIGURATION_INVALID: 'The engine configuration is invalid.',

    HEALTH_FACTOR_TOO_LOW: 'This action would leave your position undercollateralized.',
    HEALTH_FACTOR_OK: 'This position is healthy and cannot be liquidated.',
    HEALTH_FACTOR_NOT_IMPROVED: 'This liquidation would not improve the position.',

    INSUFFICIENT_BALANCE: 'You don\'t have enough balance for this transaction.',
    INSUFFICIENT_ALLOWANCE: 'The engine is not approved to move this amount.',
    TRANSFER_FAILED: 'Token transfer failed.',
    MINT_FAILED: 'Minting the stable token failed.',
    UNAUTHORIZED: 'You are not authorized to perform this action.',

    REENTRANT_CALL: 'Another operation is already in progress.',

    UNDERFLOW: 'Calculation underflow occurred.',
    DIVISION_BY_ZERO: 'Division by zero error.',

    ORACLE_STALE: 'The price oracle data is stale. Please wait for an update.',
    ORACLE_NOT_INITIALIZED: 'The price oracle is not yet initialized.',

    NETWORK_ERROR: 'Network error. Please check your connection.',
    TIMEOUT: 'Request timed out. Please try again.',

    UNKNOWN_ERROR: 'An unexpected error occurred. Please try again.',
  };

  return messages[code];
}

function getSuggestion(code: EngineErrorCode): string | undefined {
  const suggestions: Partial<Record<EngineErrorCode, string>> = {
    HEALTH_FACTOR_TOO_LOW: 'Deposit more collateral or mint less.',
    INSUFFICIENT_ALLOWANCE: 'Approve the engine for at least the transfer amount.',
    INSUFFICIENT_BALANCE: 'Add funds to your account.',
    ORACLE_STALE: 'Wait for the price feed to report a new round.',
    HEALTH_FACTOR_NOT_IMPROVED: 'Cover more debt in a single liquidation.',
  };
  return suggestions[code];
}

function isRecoverableError(code: EngineErrorCode): boolean {
  const nonRecoverable: EngineErrorCode[] = [
    'CONFIGURATION_INVALID',
    'UNAUTHORIZED',
    'UNKNOWN_ERROR',
  ];
  return !nonRecoverable.includes(code);
}

function toJsonSafe(value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return value.map(toJsonSafe);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, inner]) => [key, toJsonSafe(inner)])
    );
  }
  return value;
}

// ============================================================================
// Logging Utilities
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogLevel;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Level from `STABLECORE_LOG_LEVEL`, else `warn` in production and `info` elsewhere
 */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const configured = env.STABLECORE_LOG_LEVEL?.toLowerCase();
  if (isLogLevel(configured)) return configured;
  return env.NODE_ENV === 'production' ? 'warn' : 'info';
}

export function createLogger(prefix: string, options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS[options.level ?? resolveLogLevel()];
  const enabled = (level: Exclude<LogLevel, 'silent'>) => LOG_LEVELS[level] >= threshold;
  const formatMessage = (level: string, msg: string) =>
    `[${prefix}] [${level}] ${msg}`;

  return {
    debug(message, context) {
      if (enabled('debug')) {
        console.debug(formatMessage('DEBUG', message), toJsonSafe(context ?? {}));
      }
    },
    info(message, context) {
      if (enabled('info')) {
        console.log(formatMessage('INFO', message), toJsonSafe(context ?? {}));
      }
    },
    warn(message, context) {
      if (enabled('warn')) {
        console.warn(formatMessage('WARN', message), toJsonSafe(context ?? {}));
      }
    },
    error(message, error, context) {
      if (enabled('error')) {
        console.error(formatMessage('ERROR', message), {
          error: error instanceof EngineError ? error.toJSON() : error?.message,
          ...(context === undefined ? {} : { context: toJsonSafe(context) }),
        });
      }
    },
  };
}
