import { z } from 'zod';

export interface Shoe {
  country: string;
  code: string;
  product: string;
  cost: number;
  quantity: number;
}

export const INVENTORY_HEADER = 'Country,Code,Product,Cost,Quantity';
export const FIELD_DELIMITER = ',';
export const FIELD_COUNT = 5;

/** Integer as written in the inventory file: optional sign, surrounding blanks allowed. */
export const storedIntegerSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/)
  .transform(Number)
  .refine(Number.isSafeInteger);

/** Integer as typed by a user: digits only, so never negative. */
export const nonNegativeIntegerSchema = z
  .string()
  .trim()
  .regex(/^\d+$/)
  .transform(Number)
  .refine(Number.isSafeInteger);

export type ShoeLineResult =
  | { ok: true; shoe: Shoe }
  | { ok: false; reason: 'malformed' | 'invalid-number' };

/**
 * Parse one data line of the inventory file.
 * The line is trimmed first; fields are taken as they appear between delimiters.
 */
export const parseShoeLine = (line: string): ShoeLineResult => {
  const parts = line.trim().split(FIELD_DELIMITER);
  if (parts.length !== FIELD_COUNT) {
    return { ok: false, reason: 'malformed' };
  }

  const [country, code, product, rawCost, rawQuantity] = parts;
  const cost = storedIntegerSchema.safeParse(rawCost);
  const quantity = storedIntegerSchema.safeParse(rawQuantity);
  if (!cost.success || !quantity.success) {
    return { ok: false, reason: 'invalid-number' };
  }

  return {
    ok: true,
    shoe: { country, code, product, cost: cost.data, quantity: quantity.data },
  };
};

export const serializeShoe = (shoe: Shoe): string =>
  [shoe.country, shoe.code, shoe.product, shoe.cost, shoe.quantity].join(FIELD_DELIMITER);

const UNSAFE_FIELD = /[,\r\n]/;

export const isSafeField = (value: string) => !UNSAFE_FIELD.test(value);

/**
 * Throws when the shoe could not be written and read back unchanged.
 */
export const assertWritableShoe = (shoe: Shoe) => {
  for (const field of ['country', 'code', 'product'] as const) {
    if (!isSafeField(shoe[field])) {
      throw new Error(`Shoe ${field} cannot contain commas or line breaks: ${JSON.stringify(shoe[field])}`);
    }
  }
  for (const field of ['cost', 'quantity'] as const) {
    if (!Number.isSafeInteger(shoe[field])) {
      throw new Error(`Shoe ${field} must be an integer, got ${shoe[field]}`);
    }
  }
};
