import { BadRequestException } from '@nestjs/common';

export type SupplierErrorKind =
  | 'TYPE_MISMATCH'
  | 'OUT_OF_RANGE'
  | 'MISSING_CONTACT_INFO'
  | 'MISSING_PRODUCT_ID';

/** Describes a runtime value for error messages, e.g. `number`, `null`, `Array`. */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;
  return value.constructor?.name ?? 'object';
}

export abstract class SupplierValidationException extends BadRequestException {
  abstract readonly kind: SupplierErrorKind;

  constructor(
    message: string,
    readonly field: string,
    readonly value: unknown,
  ) {
    super(message);
  }
}

export class TypeMismatchException extends SupplierValidationException {
  readonly kind = 'TYPE_MISMATCH';

  constructor(field: string, expected: string, value: unknown) {
    super(
      `${expected} expected for ${field}, got ${describeType(value)}`,
      field,
      value,
    );
  }
}

export class OutOfRangeException extends SupplierValidationException {
  readonly kind = 'OUT_OF_RANGE';

  constructor(field: string, range: string, value: number) {
    super(`${field} is not within range ${range}, got ${value}`, field, value);
  }
}

export class MissingContactInfoException extends SupplierValidationException {
  readonly kind = 'MISSING_CONTACT_INFO';

  constructor() {
    super(
      'At least one contact method (email or address) is required',
      'email',
      '',
    );
  }
}

export class MissingProductIdException extends SupplierValidationException {
  readonly kind = 'MISSING_PRODUCT_ID';

  constructor(productName: string) {
    super(`Product ${productName} has no id`, 'product.id', null);
  }
}
