import { isInt, isString } from 'class-validator';
import { Product } from '../entities/product.entity';
import {
  MissingContactInfoException,
  OutOfRangeException,
  TypeMismatchException,
} from '../common/exceptions/supplier.exceptions';

/** Exclusive upper bound for supplier ids; ids are stored as 10-digit strings. */
export const SUPPLIER_ID_UPPER_BOUND = 1e10;
export const SUPPLIER_ID_WIDTH = 10;

export type ProductCollection = readonly Product[] | ReadonlySet<Product>;

export function checkId(id: unknown): asserts id is number {
  if (typeof id !== 'number' || !isInt(id)) {
    throw new TypeMismatchException('id', 'integer', id);
  }
  if (id <= 0 || id >= SUPPLIER_ID_UPPER_BOUND) {
    throw new OutOfRangeException('id', '(0, 1e10)', id);
  }
}

export function checkString(
  field: 'name' | 'email' | 'address',
  value: unknown,
): asserts value is string {
  // email format is not validated, only its type
  if (!isString(value)) {
    throw new TypeMismatchException(field, 'string', value);
  }
}

export function checkProduct(product: unknown): asserts product is Product {
  if (!(product instanceof Product)) {
    throw new TypeMismatchException('product', 'Product', product);
  }
}

/** Only the container is checked here; each member goes through `checkProduct` when added. */
export function checkProducts(
  products: unknown,
): asserts products is ProductCollection {
  if (!Array.isArray(products) && !(products instanceof Set)) {
    throw new TypeMismatchException('products', 'Array or Set', products);
  }
}

export function checkContactInfo(email: string, address: string): void {
  if (email === '' && address === '') {
    throw new MissingContactInfoException();
  }
}

export function formatSupplierId(id: number): string {
  return String(id).padStart(SUPPLIER_ID_WIDTH, '0');
}
