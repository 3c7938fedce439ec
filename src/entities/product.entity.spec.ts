import { Product } from './product.entity';

describe('Product', () => {
  it('defaults optional fields to null', () => {
    const product = new Product({ name: 'Widget' });
    expect(product.toJSON()).toEqual({
      id: null,
      name: 'Widget',
      sku: null,
      price: null,
      description: null,
    });
  });

  it('serializes through its own representation', () => {
    const product = new Product({
      id: 'P1',
      name: 'Widget',
      sku: 'WID-01',
      price: 9.5,
    });
    expect(JSON.stringify(product)).toBe(
      '{"id":"P1","name":"Widget","sku":"WID-01","price":9.5,"description":null}',
    );
  });
});
