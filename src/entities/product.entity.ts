export interface ProductInit {
  id?: string | null;
  name: string;
  sku?: string | null;
  price?: number | null;
  description?: string | null;
}

export interface ProductJson {
  id: string | null;
  name: string;
  sku: string | null;
  price: number | null;
  description: string | null;
}

/**
 * Catalog product offered by a supplier.
 * `id` stays null until the catalog assigns one; such products cannot be
 * attached to a supplier.
 */
export class Product {
  id: string | null;
  name: string;
  sku: string | null;
  price: number | null;
  description: string | null;

  constructor(init: ProductInit) {
    this.id = init.id ?? null;
    this.name = init.name;
    this.sku = init.sku ?? null;
    this.price = init.price ?? null;
    this.description = init.description ?? null;
  }

  toJSON(): ProductJson {
    return {
      id: this.id,
      name: this.name,
      sku: this.sku,
      price: this.price,
      description: this.description,
    };
  }
}
