const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const binary = (value: bigint): string => `0b${value.toString(2)}`;

/**
 * Span that is empty or does not fit inside its scalar.
 */
export class InvalidSpanError extends Error {
  constructor(
    public role: string,
    public scalar: string,
    public width: number,
    public span: { readonly bits: number; readonly offset: number },
    public reason: string
  ) {
    const dev = [
      `Invalid ${role} span on ${scalar} (${width} bits)`,
      '',
      `  bits:   ${span.bits}`,
      `  offset: ${span.offset}`,
      '',
      `Reason: ${reason}.`,
      '',
      'A span needs at least one bit and must satisfy offset + bits <= width.',
    ];
    super(format(`Invalid ${role} span on ${scalar}: ${reason}.`, dev));
    this.name = 'InvalidSpanError';
  }
}

/**
 * Declared fields and padding need more bits than the storage word has.
 */
export class LayoutOverflowError extends Error {
  constructor(
    public declaration: string,
    public cursor: number,
    public bits: number,
    public width: number
  ) {
    const dev = [
      'Layout overflow',
      '',
      `'${declaration}' needs ${bits} bit(s) at offset ${cursor}, but the storage word has ${width} bits.`,
      `Only ${Math.max(0, width - cursor)} bit(s) remain.`,
      '',
      'To fix this:',
      '  1. Shrink this or an earlier field',
      '  2. Remove padding declared before it',
      '  3. Pick a wider storage scalar',
    ];
    super(format(`'${declaration}' overflows the ${width}-bit storage word at offset ${cursor}.`, dev));
    this.name = 'LayoutOverflowError';
  }
}

export class DuplicateFieldError extends Error {
  constructor(
    public field: string,
    public declared: string[]
  ) {
    const dev = [
      `Field '${field}' is empty, declared twice or generates another field's accessor.`,
      '',
      ...(declared.length > 0
        ? ['Fields declared so far:', ...declared.map((f) => `  - ${f}`)]
        : ['No fields were declared before it.']),
    ];
    super(format(`Duplicate field '${field}'.`, dev));
    this.name = 'DuplicateFieldError';
  }
}

export class UnknownFieldError extends Error {
  constructor(
    public field: string,
    public layout: string,
    public declared: string[]
  ) {
    const dev = [
      `Layout '${layout}' has no field '${field}'.`,
      '',
      ...(declared.length > 0
        ? ['Declared fields:', ...declared.map((f) => `  - ${f}`)]
        : [`Layout '${layout}' declares no fields.`]),
    ];
    super(format(`Layout '${layout}' has no field '${field}'.`, dev));
    this.name = 'UnknownFieldError';
  }
}

/**
 * Override that has no meaning for the operation it was passed to: a
 * strategy on a read, or a value type on a write.
 */
export class ForbiddenOverrideError extends Error {
  constructor(
    public field: string,
    public operation: 'get' | 'set',
    public attribute: 'strategy' | 'type'
  ) {
    const why =
      operation === 'get'
        ? 'Reads never write, so a strategy would silently do nothing.'
        : 'The value type of a write is fixed by the field configuration.';
    const dev = [
      `Cannot override '${attribute}' on ${operation}() of field '${field}'.`,
      '',
      why,
      '',
      operation === 'get'
        ? "Only 'type' and 'offset' may be overridden per read."
        : "Only 'offset' and 'strategy' may be overridden per write.",
    ];
    super(format(`Cannot override '${attribute}' on ${operation}() of '${field}'.`, dev));
    this.name = 'ForbiddenOverrideError';
  }
}

export class StrategyUnavailableError extends Error {
  constructor(
    public strategy: string,
    public namespace: string
  ) {
    const dev = [
      `Strategy '${strategy}' is not available in '${namespace}'.`,
      '',
      'Error-raising writes were disabled when these settings were created.',
      '',
      'To fix this:',
      "  1. Use 'return-bool' to detect bad values without throwing",
      '  2. Or create the toolkit with errors: true',
    ];
    super(format(`Strategy '${strategy}' is not available in '${namespace}'.`, dev));
    this.name = 'StrategyUnavailableError';
  }
}

export class IncompleteLayoutError extends Error {
  constructor(
    public layout: string,
    public allocated: number,
    public width: number,
    public fields: string[]
  ) {
    const dev = [
      `Incomplete layout '${layout}'`,
      '',
      `${allocated} of ${width} bits are allocated (${width - allocated} left).`,
      `Fields: ${fields.length > 0 ? fields.join(', ') : '(none)'}`,
      '',
      'To fix this:',
      `  1. Declare padding for the remaining ${width - allocated} bit(s)`,
      "  2. Or build with completeness: 'allow'",
    ];
    super(format(`Layout '${layout}' allocates ${allocated} of ${width} bits.`, dev));
    this.name = 'IncompleteLayoutError';
  }
}

export class InvalidSettingsError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid settings', '', `Invalid settings: ${reason}`];
    super(format(`Invalid settings: ${reason}`, dev));
    this.name = 'InvalidSettingsError';
  }
}

export class ScalarDefinitionError extends Error {
  constructor(
    public scalar: string,
    public reason: string
  ) {
    const dev = ['Invalid scalar definition', '', `Scalar '${scalar}': ${reason}.`];
    super(format(`Invalid scalar '${scalar}': ${reason}.`, dev));
    this.name = 'ScalarDefinitionError';
  }
}

/**
 * A value handed to a scalar has no unsigned integer representation.
 */
export class ScalarValueError extends RangeError {
  constructor(
    public scalar: string,
    public value: number | bigint
  ) {
    const dev = [
      `Value ${String(value)} cannot be stored in ${scalar}.`,
      '',
      'Scalars hold unsigned integers: numbers must be non-negative safe integers,',
      'bigints must be non-negative.',
    ];
    super(format(`Value ${String(value)} cannot be stored in ${scalar}.`, dev));
    this.name = 'ScalarValueError';
  }
}

/**
 * Error thrown by the `raise-error` strategy when a value written to a field
 * has bits set outside the field's allocated width.
 *
 * The storage word is left untouched when this is thrown.
 */
export class FieldRangeError extends Error {
  constructor(
    public field: string,
    public bits: number,
    public offset: number,
    public value: bigint,
    public outside: bigint
  ) {
    const dev = [
      `Value ${binary(value)} does not fit field '${field}'.`,
      '',
      `The field takes ${bits} bit(s) at offset ${offset}; bits ${binary(outside)} lie outside it.`,
      'The storage word was not modified.',
    ];
    super(format(`Value ${binary(value)} has bits outside field '${field}'.`, dev));
    this.name = 'FieldRangeError';
  }
}
