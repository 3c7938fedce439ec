import 'reflect-metadata';

export * from './common/exceptions/supplier.exceptions';
export * from './config/suppliers.config';
export * from './entities/product.entity';
export * from './entities/supplier.entity';
export * from './products/dto/create-product.dto';
export * from './products/products.module';
export * from './products/products.service';
export * from './suppliers/dto/create-supplier.dto';
export * from './suppliers/dto/update-supplier.dto';
export * from './suppliers/dto/serialized-supplier.dto';
export * from './suppliers/supplier.validators';
export * from './suppliers/suppliers.module';
export * from './suppliers/suppliers.service';
export * from './app.module';
