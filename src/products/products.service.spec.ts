import { BadRequestException, HttpException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ProductsService } from './products.service';
import { Product } from '../entities/product.entity';

function responseOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    if (err instanceof HttpException) return err.getResponse();
    throw err;
  }
  throw new Error('expected an HttpException');
}

describe('ProductsService', () => {
  let service: ProductsService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [ProductsService],
    }).compile();

    service = module.get<ProductsService>(ProductsService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  it('builds a product and coerces the price', () => {
    const product = service.create({
      id: 'P1',
      name: 'Widget',
      sku: 'WID-01',
      price: '9.99',
    });

    expect(product).toBeInstanceOf(Product);
    expect(product.toJSON()).toEqual({
      id: 'P1',
      name: 'Widget',
      sku: 'WID-01',
      price: 9.99,
      description: null,
    });
  });

  it('allows a product without an id', () => {
    expect(service.create({ name: 'Gadget' }).id).toBeNull();
  });

  it('lists constraint messages', () => {
    expect(responseOf(() => service.create({ name: 42 }))).toEqual({
      statusCode: 400,
      message: ['name must be a string'],
      error: 'Bad Request',
    });
  });

  it('rejects an empty id', () => {
    expect(responseOf(() => service.create({ id: '', name: 'Widget' }))).toMatchObject({
      message: ['id should not be empty'],
    });
  });

  it('rejects a negative price', () => {
    expect(responseOf(() => service.create({ name: 'Widget', price: -1 }))).toMatchObject({
      message: ['price must not be less than 0'],
    });
  });

  it('rejects non-object payloads', () => {
    expect(() => service.create('Widget')).toThrow(BadRequestException);
    expect(() => service.create(['Widget'])).toThrow(
      'CreateProductDto payload must be an object',
    );
  });
});
