import { registerAs } from '@nestjs/config';

export interface SuppliersConfig {
  jsonIndent: number;
  strictContactInfo: boolean;
}

export function loadSuppliersConfig(
  env: Record<string, string | undefined> = process.env,
): SuppliersConfig {
  const indent = Number(env.SUPPLIER_JSON_INDENT ?? 4);
  return {
    jsonIndent: Number.isInteger(indent) && indent >= 0 ? indent : 4,
    strictContactInfo: env.SUPPLIER_STRICT_CONTACT === 'true',
  };
}

export const suppliersConfig = registerAs('suppliers', () =>
  loadSuppliersConfig(),
);
