/**
 * Engine errors.
 *
 * Both carry enough context (field or quantity, offending value) for a
 * presentation layer to build a user-facing message.
 */

export class InvalidParameterError extends Error {
  readonly field: string;
  readonly value: unknown;
  readonly reason: string;

  constructor(field: string, value: unknown, reason: string) {
    super(`Invalid parameter ${field}=${String(value)}: ${reason}`);
    this.name = 'InvalidParameterError';
    this.field = field;
    this.value = value;
    this.reason = reason;
  }
}

export class DegenerateDivisionError extends Error {
  readonly quantity: string;
  readonly context: string;

  constructor(quantity: string, context: string) {
    super(`Degenerate division: ${quantity} is zero (${context})`);
    this.name = 'DegenerateDivisionError';
    this.quantity = quantity;
    this.context = context;
  }
}
