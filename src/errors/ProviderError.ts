/**
 * Provider Error Class Hierarchy
 *
 * Every failure raised by the registries, the fallback orchestrator or the
 * built-in providers extends ProviderError, so callers can branch on `code`
 * without string matching.
 *
 * ## Usage
 *
 * ```typescript
 * try {
 *   registry.get('polygon');
 * } catch (error) {
 *   if (error instanceof UnknownProviderKindError) {
 *     log.warn(error.message, error.details);
 *   }
 * }
 * ```
 */

import { getErrorMessage } from '../utils/errors';

/**
 * Error codes for machine-readable error identification
 */
export const ErrorCodes = {
  UNKNOWN_PROVIDER_KIND: 'UNKNOWN_PROVIDER_KIND',
  INVALID_PROVIDER_IMPLEMENTATION: 'INVALID_PROVIDER_IMPLEMENTATION',
  FALLBACK_EXHAUSTED: 'FALLBACK_EXHAUSTED',
  PROVIDER_UNAVAILABLE: 'PROVIDER_UNAVAILABLE',
  INVALID_DATE_RANGE: 'INVALID_DATE_RANGE',
  PROVIDER_CONFIGURATION: 'PROVIDER_CONFIGURATION',
  CONFIG_VALIDATION: 'CONFIG_VALIDATION',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Serialized error shape (for logs and diagnostics)
 */
export interface ProviderErrorJson {
  error: string;
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
}

/**
 * Base provider error class
 */
export class ProviderError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;
  readonly timestamp: Date;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): ProviderErrorJson {
    return {
      error: this.name.replace('Error', ''),
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
    };
  }

  static isProviderError(error: unknown): error is ProviderError {
    return error instanceof ProviderError;
  }
}

// =============================================================================
// Registry Errors
// =============================================================================

export class UnknownProviderKindError extends ProviderError {
  readonly category: string;
  readonly requested: string;
  readonly available: string[];

  constructor(category: string, requested: string, available: string[]) {
    const sorted = [...available].sort();
    super(
      `Unknown ${category} provider '${requested}'. Available providers: ${sorted.join(', ')}`,
      ErrorCodes.UNKNOWN_PROVIDER_KIND,
      { category, requested, available: sorted }
    );
    this.category = category;
    this.requested = requested;
    this.available = sorted;
  }
}

export class InvalidProviderImplementationError extends ProviderError {
  readonly typeName: string;

  constructor(category: string, contractName: string, typeName: string) {
    super(
      `Provider class ${typeName} must extend ${contractName} and implement its methods`,
      ErrorCodes.INVALID_PROVIDER_IMPLEMENTATION,
      { category, contract: contractName, typeName }
    );
    this.typeName = typeName;
  }
}

// =============================================================================
// Fallback Errors
// =============================================================================

export class FallbackExhaustedError extends ProviderError {
  readonly primaryError: unknown;
  readonly fallbackError: unknown;

  constructor(
    category: string,
    primary: string,
    fallback: string,
    primaryError: unknown,
    fallbackError: unknown
  ) {
    super(
      `No usable ${category} provider: '${primary}' failed (${getErrorMessage(primaryError)}), ` +
        `fallback '${fallback}' failed (${getErrorMessage(fallbackError)})`,
      ErrorCodes.FALLBACK_EXHAUSTED,
      { category, primary, fallback }
    );
    this.primaryError = primaryError;
    this.fallbackError = fallbackError;
  }
}

export class ProviderUnavailableError extends ProviderError {
  constructor(category: string, name: string) {
    super(`${category} provider '${name}' reports itself unavailable`, ErrorCodes.PROVIDER_UNAVAILABLE, {
      category,
      name,
    });
  }
}

// =============================================================================
// Provider Errors
// =============================================================================

export class DateRangeError extends ProviderError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_DATE_RANGE, details);
  }
}

export class ProviderConfigurationError extends ProviderError {
  constructor(provider: string, setting: string, message?: string) {
    super(
      message || `Provider '${provider}' requires setting '${setting}'`,
      ErrorCodes.PROVIDER_CONFIGURATION,
      { provider, setting }
    );
  }
}

export class ConfigValidationError extends ProviderError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed: ${issues.join('; ')}`, ErrorCodes.CONFIG_VALIDATION, {
      issues,
    });
    this.issues = issues;
  }
}
