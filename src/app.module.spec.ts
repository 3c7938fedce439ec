import { Test, TestingModule } from '@nestjs/testing';
import { AppModule } from './app.module';
import { SuppliersService } from './suppliers/suppliers.service';
import { ProductsService } from './products/products.service';

describe('AppModule', () => {
  let module: TestingModule;

  beforeEach(async () => {
    delete process.env.SUPPLIER_JSON_INDENT;
    delete process.env.SUPPLIER_STRICT_CONTACT;
    module = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();
  });

  afterEach(async () => {
    await module.close();
  });

  it('wires the supplier and product services', () => {
    expect(module.get(SuppliersService)).toBeDefined();
    expect(module.get(ProductsService)).toBeDefined();
  });

  it('serializes with the default indent', () => {
    const service = module.get(SuppliersService);
    const supplier = service.create({ name: 'Acme', email: 'a@x.com' });
    expect(service.serialize(supplier).split('\n')[1]).toBe('    "id": null,');
  });
});
