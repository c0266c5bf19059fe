/**
 * Typed decode/encode failures.
 *
 * Every error carries the component that raised it and the absolute byte
 * offset where the problem was detected, so a corrupt file can be diagnosed
 * without a hex editor.
 */

export function hexOffset(offset: number): string {
  return `0x${offset.toString(16).toUpperCase().padStart(4, '0')}`;
}

export class FurnaceFormatError extends Error {
  declare cause?: unknown;
  readonly component: string;
  readonly offset: number;

  constructor(component: string, offset: number, message: string, options?: { cause?: unknown }) {
    super(`[${component}] ${message} (at ${hexOffset(offset)})`);
    this.name = 'FurnaceFormatError';
    this.component = component;
    this.offset = offset;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class BadMagicError extends FurnaceFormatError {
  readonly expected: string;
  readonly actual: string;

  constructor(component: string, offset: number, expected: string, actual: string, options?: { cause?: unknown }) {
    super(component, offset, `bad signature: expected ${JSON.stringify(expected)}, found ${JSON.stringify(actual)}`, options);
    this.name = 'BadMagicError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class TruncatedInputError extends FurnaceFormatError {
  readonly requested: number;
  readonly available: number;

  constructor(component: string, offset: number, requested: number, available: number) {
    super(component, offset, `unexpected end of input: needed ${requested} byte(s), ${available} left`);
    this.name = 'TruncatedInputError';
    this.requested = requested;
    this.available = available;
  }
}

export class UnknownEnumValueError extends FurnaceFormatError {
  readonly domain: string;
  readonly value: number | string;

  constructor(component: string, offset: number, domain: string, value: number | string) {
    super(component, offset, `unknown ${domain} value ${typeof value === 'number' ? `${value} (0x${value.toString(16)})` : JSON.stringify(value)}`);
    this.name = 'UnknownEnumValueError';
    this.domain = domain;
    this.value = value;
  }
}

export class InvalidFieldValueError extends FurnaceFormatError {
  readonly field: string;
  readonly value: unknown;

  constructor(component: string, offset: number, field: string, value: unknown, detail: string) {
    super(component, offset, `invalid ${field} ${String(value)}: ${detail}`);
    this.name = 'InvalidFieldValueError';
    this.field = field;
    this.value = value;
  }
}
