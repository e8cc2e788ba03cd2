/**
 * Semantic Compressor Error Hierarchy
 * Structured error types for consistent error handling
 */

/**
 * Base error class for all compressor errors
 */
export class CompressorError extends Error {
  public readonly code: string;
  public readonly recoverable: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    recoverable: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CompressorError';
    this.code = code;
    this.recoverable = recoverable;
    this.context = context;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      recoverable: this.recoverable,
      context: this.context,
    };
  }
}

// ==================== Configuration Errors ====================

/**
 * Errors raised while building an encoding configuration or loading
 * language resources. Never recoverable: the caller has to fix its input.
 */
export class ConfigurationError extends CompressorError {
  constructor(
    message: string,
    code: string = 'CONFIGURATION_ERROR',
    context?: Record<string, unknown>
  ) {
    super(message, code, false, context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error when a language (or one of its components) has no resources
 */
export class UnsupportedLanguageError extends ConfigurationError {
  constructor(language: string, component?: string) {
    super(
      component
        ? `Language not fully supported: '${language}' has no ${component} resources`
        : `Language not fully supported: '${language}'`,
      'UNSUPPORTED_LANGUAGE',
      component ? { language, component } : { language }
    );
    this.name = 'UnsupportedLanguageError';
  }
}

/**
 * Error when a configuration object fails validation
 */
export class InvalidConfigurationError extends ConfigurationError {
  constructor(issues: string[]) {
    super(
      `Invalid encoding configuration: ${issues.join('; ')}`,
      'INVALID_CONFIGURATION',
      { issues }
    );
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * Error when a pattern rule cannot be compiled or is unsafe to run
 */
export class InvalidPatternError extends ConfigurationError {
  constructor(ruleId: string, reason: string) {
    super(`Invalid pattern rule ${ruleId}: ${reason}`, 'INVALID_PATTERN', { ruleId, reason });
    this.name = 'InvalidPatternError';
  }
}

// ==================== Validation Errors ====================

/**
 * Errors related to input validation
 */
export class ValidationError extends CompressorError {
  constructor(
    message: string,
    code: string = 'VALIDATION_ERROR',
    context?: Record<string, unknown>
  ) {
    super(message, code, true, context);
    this.name = 'ValidationError';
  }
}

/**
 * Error when input has an unusable shape or value
 */
export class InvalidInputError extends ValidationError {
  constructor(field: string, reason: string) {
    super(`Invalid input for ${field}: ${reason}`, 'INVALID_INPUT', { field, reason });
    this.name = 'InvalidInputError';
  }
}

/**
 * Error when a structured record lacks a required field
 */
export class MissingRequiredFieldError extends ValidationError {
  constructor(field: string, recordIndex: number) {
    super(
      `Record ${recordIndex} is missing required field: ${field}`,
      'MISSING_REQUIRED_FIELD',
      { field, recordIndex }
    );
    this.name = 'MissingRequiredFieldError';
  }
}

/**
 * Error when binding leaves placeholders without a value
 */
export class UnresolvedPlaceholderError extends ValidationError {
  constructor(placeholders: string[]) {
    super(
      `Unresolved placeholders: ${placeholders.join(', ')}`,
      'UNRESOLVED_PLACEHOLDER',
      { placeholders }
    );
    this.name = 'UnresolvedPlaceholderError';
  }
}

/**
 * Error when input is routed to a component the configuration disabled
 */
export class ComponentNotEnabledError extends ValidationError {
  constructor(component: string) {
    super(`Component not enabled in this configuration: ${component}`, 'COMPONENT_NOT_ENABLED', { component });
    this.name = 'ComponentNotEnabledError';
  }
}

// ==================== Type Guards ====================

export function isCompressorError(error: unknown): error is CompressorError {
  return error instanceof CompressorError;
}

export function isRecoverable(error: unknown): boolean {
  if (isCompressorError(error)) {
    return error.recoverable;
  }
  return false;
}

// ==================== Error Factory ====================

function contextString(context: Record<string, unknown> | undefined, key: string): string {
  const value = context?.[key];
  return typeof value === 'string' ? value : 'Unknown';
}

function contextNumber(context: Record<string, unknown> | undefined, key: string): number {
  const value = context?.[key];
  return typeof value === 'number' ? value : -1;
}

function contextStrings(context: Record<string, unknown> | undefined, key: string): string[] {
  const value = context?.[key];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/**
 * Create appropriate error from code
 */
export function createError(
  code: string,
  message: string,
  context?: Record<string, unknown>
): CompressorError {
  switch (code) {
    case 'UNSUPPORTED_LANGUAGE': {
      const component = context?.component;
      return new UnsupportedLanguageError(
        contextString(context, 'language'),
        typeof component === 'string' ? component : undefined
      );
    }
    case 'INVALID_CONFIGURATION':
      return new InvalidConfigurationError(contextStrings(context, 'issues'));
    case 'INVALID_PATTERN':
      return new InvalidPatternError(contextString(context, 'ruleId'), contextString(context, 'reason'));
    case 'INVALID_INPUT':
      return new InvalidInputError(contextString(context, 'field'), contextString(context, 'reason'));
    case 'MISSING_REQUIRED_FIELD':
      return new MissingRequiredFieldError(contextString(context, 'field'), contextNumber(context, 'recordIndex'));
    case 'UNRESOLVED_PLACEHOLDER':
      return new UnresolvedPlaceholderError(contextStrings(context, 'placeholders'));
    case 'COMPONENT_NOT_ENABLED':
      return new ComponentNotEnabledError(contextString(context, 'component'));
    default:
      return new CompressorError(message, code, true, context);
  }
}
