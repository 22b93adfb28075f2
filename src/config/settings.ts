import path from 'node:path';
import { z } from 'zod';

export const DEFAULT_INVENTORY_FILE = 'inventory.txt';

type EnvSource = Record<string, string | undefined>;

export interface Settings {
  inventoryPath: string;
  verbose: boolean;
}

export interface SettingsOverrides {
  file?: string;
  verbose?: boolean;
}

const envSchema = z.object({
  SHOE_STOCK_FILE: z.string().trim().min(1, 'SHOE_STOCK_FILE cannot be empty').optional(),
  SHOE_STOCK_VERBOSE: z
    .string()
    .trim()
    .toLowerCase()
    .refine((value) => ['', '0', '1', 'true', 'false', 'yes', 'no'].includes(value), {
      message: 'SHOE_STOCK_VERBOSE must be one of 1, 0, true, false, yes, no',
    })
    .transform((value) => ['1', 'true', 'yes'].includes(value))
    .optional(),
});

/**
 * Resolve settings from the environment, with command-line overrides taking
 * precedence. The inventory path is made absolute against `cwd`.
 */
export const loadSettings = (
  source: EnvSource = process.env,
  overrides: SettingsOverrides = {},
  cwd: string = process.cwd(),
): Settings => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(issue ? issue.message : 'Invalid environment');
  }

  const file = overrides.file ?? parsed.data.SHOE_STOCK_FILE ?? DEFAULT_INVENTORY_FILE;

  return {
    inventoryPath: path.resolve(cwd, file),
    verbose: overrides.verbose ?? parsed.data.SHOE_STOCK_VERBOSE ?? false,
  };
};
