import type { Shoe } from '../inventory/shoe.js';
import type { ItemValue } from '../inventory/store.js';

export const TABLE_HEADERS = ['Country', 'Code', 'Product', 'Cost', 'Quantity'] as const;

type Cell = string | number;

const COLUMN_GAP = '  ';

/**
 * Plain-text table: header row, a dashed rule, then one row per entry.
 * Numeric columns are right-aligned, text columns left-aligned.
 */
export const renderTable = (headers: readonly string[], rows: Cell[][]): string => {
  const widths = headers.map((header, col) =>
    Math.max(header.length, ...rows.map((row) => String(row[col] ?? '').length)),
  );
  const numeric = headers.map(
    (_, col) => rows.length > 0 && rows.every((row) => typeof row[col] === 'number'),
  );

  const pad = (value: string, col: number) =>
    numeric[col] ? value.padStart(widths[col]) : value.padEnd(widths[col]);

  const formatRow = (cells: readonly Cell[]) =>
    cells
      .map((cell, col) => pad(String(cell), col))
      .join(COLUMN_GAP)
      .trimEnd();

  const rule = widths.map((width) => '-'.repeat(width)).join(COLUMN_GAP);

  return [formatRow(headers), rule, ...rows.map(formatRow)].join('\n');
};

export const renderShoeTable = (shoes: readonly Shoe[]): string =>
  renderTable(
    TABLE_HEADERS,
    shoes.map((shoe) => [shoe.country, shoe.code, shoe.product, shoe.cost, shoe.quantity]),
  );

const DIVIDER = '-'.repeat(53);

export const renderShoe = (shoe: Shoe): string =>
  [
    DIVIDER,
    `Country:   ${shoe.country}`,
    `Code:      ${shoe.code}`,
    `Product:   ${shoe.product}`,
    `Cost:      ${shoe.cost}`,
    `Quantity:  ${shoe.quantity}`,
    DIVIDER,
  ].join('\n');

export const renderValues = (values: readonly ItemValue[], total: number): string[] => [
  ...values.map((item) => `The total value for shoe code ${item.code} is ${item.value}`),
  `Total inventory value: ${total}`,
];
