import fs from 'node:fs/promises';
import { debug, error as logError, warn } from '../utils/logger.js';
import {
  INVENTORY_HEADER,
  assertWritableShoe,
  nonNegativeIntegerSchema,
  parseShoeLine,
  serializeShoe,
  type Shoe,
} from './shoe.js';

export interface LoadIssue {
  line: number;
  content: string;
  reason: 'malformed' | 'invalid-number';
}

export interface LoadReport {
  loaded: number;
  skipped: LoadIssue[];
  missing: boolean;
}

export interface ItemValue {
  code: string;
  value: number;
}

export interface RestockResult {
  shoe: Shoe;
  previousQuantity: number;
}

const isNotFound = (err: unknown) =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT';

const readIfExists = async (filePath: string): Promise<string | null> => {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
};

const splitLines = (content: string): string[] => {
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
};

/**
 * In-memory shoe inventory backed by a flat comma-delimited file.
 *
 * Records keep file order. Code uniqueness is left to callers; lookups
 * return the first match.
 */
export class InventoryStore {
  private shoes: Shoe[] = [];

  constructor(readonly filePath: string) {}

  /**
   * Replace the collection with the contents of the inventory file.
   * Bad lines are reported and skipped, a missing file leaves the store empty.
   */
  async load(): Promise<LoadReport> {
    const report: LoadReport = { loaded: 0, skipped: [], missing: false };
    this.shoes = [];

    const content = await readIfExists(this.filePath);
    if (content === null) {
      logError(`Inventory file not found: ${this.filePath}`);
      report.missing = true;
      return report;
    }

    // Line 1 is the header.
    const lines = splitLines(content).slice(1);
    lines.forEach((rawLine, index) => {
      const lineNumber = index + 2;
      const line = rawLine.trim();
      const parsed = parseShoeLine(line);

      if (!parsed.ok) {
        if (parsed.reason === 'malformed') {
          warn(`Skipped malformed line ${lineNumber}: ${line}`);
        } else {
          warn(`Invalid number format in line ${lineNumber}: ${line}`);
        }
        report.skipped.push({ line: lineNumber, content: line, reason: parsed.reason });
        return;
      }

      this.shoes.push(parsed.shoe);
    });

    report.loaded = this.shoes.length;
    debug(`Loaded ${report.loaded} shoes from ${this.filePath}`);
    return report;
  }

  list(): readonly Shoe[] {
    return this.shoes;
  }

  get size() {
    return this.shoes.length;
  }

  /** Exact, case-sensitive code check. */
  hasCode(code: string): boolean {
    return this.shoes.some((shoe) => shoe.code === code);
  }

  /**
   * Append a shoe to the inventory file, creating it with a header if needed,
   * then reload the collection from disk.
   */
  async append(shoe: Shoe): Promise<void> {
    assertWritableShoe(shoe);

    const existing = await readIfExists(this.filePath);
    const line = `${serializeShoe(shoe)}\n`;

    if (!existing) {
      await fs.writeFile(this.filePath, `${INVENTORY_HEADER}\n${line}`, 'utf8');
    } else {
      const separator = existing.endsWith('\n') ? '' : '\n';
      await fs.appendFile(this.filePath, `${separator}${line}`, 'utf8');
    }

    debug(`Appended ${shoe.code} to ${this.filePath}`);
    await this.load();
  }

  findLowest(): Shoe | undefined {
    return this.pickBy((candidate, best) => candidate.quantity < best.quantity);
  }

  findHighest(): Shoe | undefined {
    return this.pickBy((candidate, best) => candidate.quantity > best.quantity);
  }

  /**
   * Add `amount` to the lowest-stock shoe and rewrite the inventory file.
   */
  async restock(amount: number): Promise<RestockResult> {
    if (!nonNegativeIntegerSchema.safeParse(String(amount)).success) {
      throw new Error(`Restock amount must be a non-negative integer, got ${amount}`);
    }

    const shoe = this.findLowest();
    if (!shoe) {
      throw new Error('Inventory is empty');
    }

    const previousQuantity = shoe.quantity;
    const quantity = previousQuantity + amount;
    if (!Number.isSafeInteger(quantity)) {
      throw new Error(`Restocking ${shoe.code} by ${amount} exceeds the largest storable quantity`);
    }

    shoe.quantity = quantity;
    try {
      await this.save();
    } catch (err) {
      shoe.quantity = previousQuantity;
      throw err;
    }

    return { shoe, previousQuantity };
  }

  valuePerItem(): ItemValue[] {
    return this.shoes.map((shoe) => ({ code: shoe.code, value: shoe.cost * shoe.quantity }));
  }

  totalValue(): number {
    return this.valuePerItem().reduce((sum, item) => sum + item.value, 0);
  }

  findByCode(code: string): Shoe | undefined {
    const wanted = code.toLowerCase();
    return this.shoes.find((shoe) => shoe.code.toLowerCase() === wanted);
  }

  private pickBy(beats: (candidate: Shoe, best: Shoe) => boolean): Shoe | undefined {
    let best: Shoe | undefined;
    for (const shoe of this.shoes) {
      if (!best || beats(shoe, best)) best = shoe;
    }
    return best;
  }

  private async save(): Promise<void> {
    const body = this.shoes.map((shoe) => `${serializeShoe(shoe)}\n`).join('');
    await fs.writeFile(this.filePath, `${INVENTORY_HEADER}\n${body}`, 'utf8');
    debug(`Rewrote ${this.filePath} with ${this.shoes.length} shoes`);
  }
}
