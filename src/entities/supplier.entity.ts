import { Product, ProductJson } from './product.entity';
import {
  checkContactInfo,
  checkId,
  checkProduct,
  checkProducts,
  checkString,
  formatSupplierId,
  ProductCollection,
} from '../suppliers/supplier.validators';
import { MissingProductIdException } from '../common/exceptions/supplier.exceptions';

export interface SupplierInit {
  name: string;
  /** Checked when given, but never stored: ids come from persistence via `setId`. */
  id?: number | null;
  email?: string;
  address?: string;
  products?: ProductCollection;
}

export interface SupplierOptions {
  /** Re-check that email or address is non-empty on every contact update, not only at creation. */
  strictContactInfo?: boolean;
}

export interface SupplierJson {
  id: string | null;
  name: string;
  email: string;
  address: string;
  products: Record<string, ProductJson>;
}

function requireProductId(product: unknown): string {
  checkProduct(product);
  if (product.id == null) {
    throw new MissingProductIdException(product.name);
  }
  return product.id;
}

export class Supplier {
  private _id: string | null = null;
  private _name: string;
  private _email: string;
  private _address: string;
  private readonly _products = new Map<string, Product>();
  readonly strictContactInfo: boolean;

  constructor(init: SupplierInit, options: SupplierOptions = {}) {
    const { name, id, email = '', address = '', products = [] } = init;

    if (id !== undefined && id !== null) checkId(id);
    checkString('name', name);
    checkString('email', email);
    checkString('address', address);
    checkProducts(products);
    checkContactInfo(email, address);

    this._name = name;
    this._email = email;
    this._address = address;
    this.strictContactInfo = options.strictContactInfo ?? false;
    for (const product of products) this.addProduct(product);
  }

  /** Zero-padded 10-digit id, or null until persistence assigns one. */
  get id(): string | null {
    return this._id;
  }

  get name(): string {
    return this._name;
  }

  set name(name: string) {
    checkString('name', name);
    this._name = name;
  }

  get email(): string {
    return this._email;
  }

  set email(email: string) {
    checkString('email', email);
    if (this.strictContactInfo) checkContactInfo(email, this._address);
    this._email = email;
  }

  get address(): string {
    return this._address;
  }

  set address(address: string) {
    checkString('address', address);
    if (this.strictContactInfo) checkContactInfo(this._email, address);
    this._address = address;
  }

  /** Replaces both contact fields at once, so a strict supplier can swap one for the other. */
  setContactInfo(email: string, address: string): void {
    checkString('email', email);
    checkString('address', address);
    if (this.strictContactInfo) checkContactInfo(email, address);
    this._email = email;
    this._address = address;
  }

  get products(): ReadonlyMap<string, Product> {
    return this._products;
  }

  setId(id: number): void {
    checkId(id);
    this._id = formatSupplierId(id);
  }

  /**
   * Adds every product to the current map; existing entries are kept.
   * Nothing is stored unless every product passes its checks.
   */
  setProducts(products: ProductCollection): void {
    checkProducts(products);
    const entries = [...products].map(
      (product) => [requireProductId(product), product] as const,
    );
    for (const [id, product] of entries) this._products.set(id, product);
  }

  /** Stores the product under its id, replacing any product already there. */
  addProduct(product: Product): void {
    this._products.set(requireProductId(product), product);
  }

  toJSON(): SupplierJson {
    // fromEntries defines own keys, so ids such as "__proto__" survive
    const products: Record<string, ProductJson> = Object.fromEntries(
      [...this._products.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([id, product]) => [id, product.toJSON()] as const),
    );

    return {
      id: this._id,
      name: this._name,
      email: this._email,
      address: this._address,
      products,
    };
  }

  serialize(indent = 4): string {
    return JSON.stringify(this.toJSON(), null, indent);
  }
}
