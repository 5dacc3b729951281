/**
 * Central error classes and validation utilities for the profile engine
 * @module utils/errors
 */

/**
 * Base error class for all profile engine errors
 */
export class ProfileEngineError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'ProfileEngineError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    Error.captureStackTrace?.(this, this.constructor)
  }
}

/**
 * Error thrown when a registry lookup names an unregistered profile
 */
export class NotFoundError extends ProfileEngineError {
  public readonly profileName: string

  constructor(
    profileName: string,
    available: readonly string[],
    context?: Record<string, unknown>
  ) {
    const suffix =
      available.length > 0
        ? `Available profiles: ${available.join(', ')}`
        : 'No profiles are registered'
    super(
      `Profile '${profileName}' not found in registry. ${suffix}`,
      'NOT_FOUND',
      { profileName, available: [...available], ...context }
    )
    this.name = 'NotFoundError'
    this.profileName = profileName
  }
}

/**
 * Error thrown when a profile name is registered twice
 */
export class DuplicateNameError extends ProfileEngineError {
  public readonly profileName: string

  constructor(profileName: string, context?: Record<string, unknown>) {
    super(
      `Profile '${profileName}' is already registered`,
      'DUPLICATE_NAME',
      { profileName, ...context }
    )
    this.name = 'DuplicateNameError'
    this.profileName = profileName
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends ProfileEngineError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends ProfileEngineError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Error thrown when a builder method is called in invalid sequence
 */
export class BuilderSequenceError extends ProfileEngineError {
  public readonly method: string

  constructor(method: string, message: string, context?: Record<string, unknown>) {
    super(
      `Builder sequence error in ${method}: ${message}`,
      'BUILDER_SEQUENCE_ERROR',
      { method, ...context }
    )
    this.name = 'BuilderSequenceError'
    this.method = method
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a number is finite and strictly greater than a lower bound
 */
export function requireGreaterThan(
  value: number,
  lowerBound: number,
  parameterName: string
): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a finite number'
    )
  }
  if (value <= lowerBound) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be greater than ${lowerBound}`
    )
  }
  return value
}

/**
 * Validates that an integer is within a specific range (inclusive)
 */
export function requireIntegerInRange(
  value: number,
  min: number,
  max: number,
  parameterName: string
): number {
  if (!Number.isInteger(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be an integer'
    )
  }
  if (value < min || value > max) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be between ${min} and ${max} (inclusive)`
    )
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: string, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a string'
    )
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Validates that a value is a function
 */
export function requireFunction<F extends (...args: never[]) => unknown>(
  value: F,
  parameterName: string
): F {
  if (typeof value !== 'function') {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a function'
    )
  }
  return value
}

/**
 * Check if an error is a profile engine error
 */
export function isProfileEngineError(error: unknown): error is ProfileEngineError {
  return error instanceof ProfileEngineError
}
