/**
 * Error definitions for settree
 * Provides a structured error hierarchy for schema declaration, config access and loading
 */

/** Base error class for all settree errors */
export class ConfigTreeError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'ConfigTreeError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigTreeError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when a key does not resolve to a declared setting or child config */
export class UndefinedSettingError extends ConfigTreeError {
  constructor(path: string) {
    super(`setting '${path}' does not exist`, 'UNDEFINED_SETTING', { path })
    this.name = 'UndefinedSettingError'
  }
}

/** Error thrown when a write targets a child configuration instead of a setting */
export class CannotModifyConfigurationError extends ConfigTreeError {
  constructor(path: string) {
    super(
      `you cannot set option ${path} as it refers to a child configuration`,
      'CANNOT_MODIFY_CONFIGURATION',
      { path }
    )
    this.name = 'CannotModifyConfigurationError'
  }
}

/** Error thrown when a schema declaration is malformed */
export class DeclarationError extends ConfigTreeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'DECLARATION_ERROR', context)
    this.name = 'DeclarationError'
  }
}

/** Error thrown when a runtime operation receives the wrong arguments */
export class ConfigArgumentError extends ConfigTreeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ARGUMENT_ERROR', context)
    this.name = 'ConfigArgumentError'
  }
}

/** Error thrown when a string setting names an assign that does not exist */
export class InterpolationError extends ConfigTreeError {
  constructor(placeholder: string, context: Record<string, unknown> = {}) {
    super(`key<${placeholder}> not found`, 'INTERPOLATION_ERROR', {
      placeholder,
      ...context,
    })
    this.name = 'InterpolationError'
  }
}

/** Error thrown when a config document cannot be read or parsed */
export class ConfigLoadError extends ConfigTreeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_LOAD_ERROR', context)
    this.name = 'ConfigLoadError'
  }
}
