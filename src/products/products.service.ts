import { Injectable } from '@nestjs/common';
import { BaseService } from '../base/base.service';
import { Product } from '../entities/product.entity';
import { CreateProductDto } from './dto/create-product.dto';

@Injectable()
export class ProductsService extends BaseService<Product, CreateProductDto> {
  constructor() {
    super(CreateProductDto);
  }

  fromDto(dto: CreateProductDto): Product {
    return new Product({
      id: dto.id,
      name: dto.name,
      sku: dto.sku,
      price: dto.price,
      description: dto.description,
    });
  }
}
