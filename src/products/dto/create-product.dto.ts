import {
  IsString,
  IsOptional,
  IsNotEmpty,
  IsNumber,
  Min,
} from 'class-validator';
import { Type } from 'class-transformer';

export class CreateProductDto {
  /** Catalog id; a product without one cannot be attached to a supplier. */
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  id?: string | null;

  @IsString()
  name!: string;

  @IsOptional()
  @IsString()
  sku?: string | null;

  @IsOptional()
  @Type(() => Number)
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  price?: number | null;

  @IsOptional()
  @IsString()
  description?: string | null;
}
