import { BadRequestException } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { isObject, validateSync, ValidationError } from 'class-validator';

/** Flattens nested validation errors into `products.0.name must be a string` style messages. */
export function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): string[] {
  const messages: string[] = [];
  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    for (const message of Object.values(error.constraints ?? {})) {
      messages.push(
        parentPath ? message.replace(error.property, path) : message,
      );
    }
    if (error.children?.length) {
      messages.push(...flattenValidationErrors(error.children, path));
    }
  }
  return messages;
}

export abstract class BaseService<T, CreateDto extends object> {
  constructor(protected readonly createDto: ClassConstructor<CreateDto>) {}

  abstract fromDto(dto: CreateDto): T;

  create(input: unknown): T {
    return this.fromDto(this.validate(this.createDto, input));
  }

  protected validate<D extends object>(
    cls: ClassConstructor<D>,
    input: unknown,
  ): D {
    if (!isObject(input) || Array.isArray(input)) {
      throw new BadRequestException(`${cls.name} payload must be an object`);
    }
    const dto = plainToInstance(cls, input);
    const errors = validateSync(dto);
    if (errors.length) {
      throw new BadRequestException(flattenValidationErrors(errors));
    }
    return dto;
  }
}
