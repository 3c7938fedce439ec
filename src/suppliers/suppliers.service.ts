import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isObject } from 'class-validator';
import { BaseService } from '../base/base.service';
import { Supplier } from '../entities/supplier.entity';
import { ProductsService } from '../products/products.service';
import { MissingProductIdException } from '../common/exceptions/supplier.exceptions';
import {
  loadSuppliersConfig,
  SuppliersConfig,
} from '../config/suppliers.config';
import { CreateSupplierDto } from './dto/create-supplier.dto';
import { UpdateSupplierDto } from './dto/update-supplier.dto';
import { SerializedSupplierDto } from './dto/serialized-supplier.dto';
import { checkId } from './supplier.validators';

@Injectable()
export class SuppliersService extends BaseService<Supplier, CreateSupplierDto> {
  private readonly logger = new Logger(SuppliersService.name);
  private readonly settings: SuppliersConfig;

  constructor(
    private readonly productsService: ProductsService,
    config: ConfigService,
  ) {
    super(CreateSupplierDto);
    this.settings =
      config.get<SuppliersConfig>('suppliers') ?? loadSuppliersConfig({});
  }

  fromDto(dto: CreateSupplierDto): Supplier {
    const products = (dto.products ?? []).map((p) =>
      this.productsService.fromDto(p),
    );
    const supplier = new Supplier(
      {
        name: dto.name,
        id: dto.id,
        email: dto.email,
        address: dto.address,
        products,
      },
      { strictContactInfo: this.settings.strictContactInfo },
    );
    // a supplied id means the record already exists in storage
    if (dto.id != null) supplier.setId(dto.id);

    this.logger.debug(
      `Built supplier "${supplier.name}" (${supplier.id ?? 'unsaved'}) with ${supplier.products.size} products`,
    );
    return supplier;
  }

  /**
   * Applies the given fields through the supplier's setters. Products are
   * merged into the current map. Every check runs before the first write.
   */
  update(supplier: Supplier, input: unknown): Supplier {
    const dto = this.validate(UpdateSupplierDto, input);
    const products = (dto.products ?? []).map((p) =>
      this.productsService.fromDto(p),
    );

    if (dto.id != null) checkId(dto.id);
    const unidentified = products.find((p) => p.id == null);
    if (unidentified) throw new MissingProductIdException(unidentified.name);

    if (dto.email !== undefined || dto.address !== undefined) {
      supplier.setContactInfo(
        dto.email ?? supplier.email,
        dto.address ?? supplier.address,
      );
    }
    if (dto.name !== undefined) supplier.name = dto.name;
    if (dto.id != null) supplier.setId(dto.id);
    if (products.length) supplier.setProducts(products);

    this.logger.debug(
      `Updated supplier "${supplier.name}" (${supplier.id ?? 'unsaved'})`,
    );
    return supplier;
  }

  serialize(supplier: Supplier): string {
    return supplier.serialize(this.settings.jsonIndent);
  }

  /** Rebuilds a supplier from the output of `serialize`. */
  parse(json: string): Supplier {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new BadRequestException(`Invalid supplier JSON: ${reason}`);
    }

    const serialized = this.validate(SerializedSupplierDto, raw);
    for (const [key, product] of Object.entries(serialized.products)) {
      const id: unknown = isObject(product) ? Reflect.get(product, 'id') : undefined;
      if (id !== key) {
        throw new BadRequestException(
          `products.${key} holds a product with id ${JSON.stringify(id ?? null)}`,
        );
      }
    }
    const supplier = this.create({
      name: serialized.name,
      id: serialized.id == null ? undefined : Number(serialized.id),
      email: serialized.email,
      address: serialized.address,
      products: Object.values(serialized.products),
    });

    this.logger.log(
      `Parsed supplier "${supplier.name}" (${supplier.id ?? 'unsaved'})`,
    );
    return supplier;
  }
}
