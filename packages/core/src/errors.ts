/**
 * Error types for named array operations
 *
 * Every failure raised by the library is a NamedArrayError carrying a stable
 * code, a category and optional structured context. Errors are thrown at the
 * point of detection; operands are never modified by a failing operation.
 */

export type ErrorCategory = 'axis' | 'shape' | 'parameter';

/**
 * Base error class with error categories and context
 */
export class NamedArrayError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'NamedArrayError';
    this.code = code;
    this.category = category;
  }

  getFormattedMessage(): string {
    let formatted = `${this.name}: ${this.message}`;
    if (this.context && Object.keys(this.context).length > 0) {
      formatted += '\nContext:\n';
      for (const [key, value] of Object.entries(this.context)) {
        formatted += `  ${key}: ${formatContextValue(value)}\n`;
      }
    }
    return formatted;
  }
}

/**
 * Two operands share an axis name with incompatible extents (neither is 1)
 */
export class AxisMismatchError extends NamedArrayError {
  constructor(
    public readonly axis: string,
    public readonly extents: readonly [number, number],
    context?: Record<string, unknown>,
  ) {
    super(
      `Axis '${axis}' has incompatible extents ${extents[0]} and ${extents[1]}`,
      'AXIS_MISMATCH',
      'axis',
      context,
    );
    this.name = 'AxisMismatchError';
  }
}

/**
 * An operation referenced an axis name the array does not have
 */
export class AxisNotFoundError extends NamedArrayError {
  constructor(
    public readonly axis: string,
    public readonly available: readonly string[],
    operation: string,
  ) {
    super(
      `Axis '${axis}' not found in ${operation}. Available axes: [${available.map((a) => `'${a}'`).join(', ')}]`,
      'AXIS_NOT_FOUND',
      'axis',
      { operation, available },
    );
    this.name = 'AxisNotFoundError';
  }
}

/**
 * Positional extents disagree: mask length, buffer rank vs axis names, ragged data
 */
export class ShapeMismatchError extends NamedArrayError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SHAPE_MISMATCH', 'shape', context);
    this.name = 'ShapeMismatchError';
  }
}

/**
 * A constructor or operation received a value outside its domain
 */
export class InvalidParameterError extends NamedArrayError {
  constructor(
    public readonly parameter: string,
    reason: string,
    context?: Record<string, unknown>,
    code = 'INVALID_PARAMETER',
  ) {
    super(`Invalid parameter '${parameter}': ${reason}`, code, 'parameter', context);
    this.name = 'InvalidParameterError';
  }
}

function formatContextValue(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((v) => formatContextValue(v)).join(', ')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}
