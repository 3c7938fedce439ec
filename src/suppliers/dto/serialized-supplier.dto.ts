import { IsString, IsOptional, IsObject, Matches } from 'class-validator';

/** Shape produced by `Supplier.serialize`. */
export class SerializedSupplierDto {
  @IsOptional()
  @IsString()
  @Matches(/^\d{10}$/, { message: 'id must be a 10-digit string' })
  id?: string | null;

  @IsString()
  name!: string;

  @IsString()
  email!: string;

  @IsString()
  address!: string;

  @IsObject()
  products!: Record<string, unknown>;
}
