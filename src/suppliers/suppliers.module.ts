import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { suppliersConfig } from '../config/suppliers.config';
import { ProductsModule } from '../products/products.module';
import { SuppliersService } from './suppliers.service';

@Module({
  imports: [ConfigModule.forFeature(suppliersConfig), ProductsModule],
  providers: [SuppliersService],
  exports: [SuppliersService, ProductsModule],
})
export class SuppliersModule {}
