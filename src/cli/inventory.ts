import { Command } from 'commander';
import ora from 'ora';
import { loadSettings } from '../config/settings.js';
import { isSafeField, nonNegativeIntegerSchema } from '../inventory/shoe.js';
import { InventoryStore } from '../inventory/store.js';
import { setVerbose } from '../utils/logger.js';
import { renderShoe, renderShoeTable, renderValues } from './render.js';

export type GlobalOptions = {
  file?: string;
  verbose?: boolean;
};

interface AddOptions {
  country: string;
  code: string;
  product: string;
  cost: string;
  quantity: string;
}

/** Resolve settings from the command's global options and open a loaded store. */
export const openStore = async (command: Command): Promise<InventoryStore> => {
  const { file, verbose } = command.optsWithGlobals<GlobalOptions>();
  const settings = loadSettings(process.env, { file, verbose });
  setVerbose(settings.verbose);

  const store = new InventoryStore(settings.inventoryPath);
  await store.load();
  return store;
};

const parseCount = (raw: string, field: string): number => {
  const parsed = nonNegativeIntegerSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`The ${field} must be a non-negative integer value, got "${raw}"`);
  }
  return parsed.data;
};

const requireSafe = (raw: string, field: string): string => {
  const value = raw.trim();
  if (!isSafeField(value)) {
    throw new Error(`The ${field} cannot contain commas`);
  }
  return value;
};

export const buildInventoryCommands = (): Command[] => {
  const list = new Command('list')
    .description('Show every shoe in the inventory')
    .action(async (_options: object, command: Command) => {
      const store = await openStore(command);
      console.log(renderShoeTable(store.list()));
    });

  const add = new Command('add')
    .description('Add a new shoe')
    .requiredOption('--country <country>', 'Country of manufacture')
    .requiredOption('--code <code>', 'Unique shoe code')
    .requiredOption('--product <product>', 'Product name')
    .requiredOption('--cost <cost>', 'Unit cost')
    .requiredOption('--quantity <quantity>', 'Units in stock')
    .action(async (options: AddOptions, command: Command) => {
      const store = await openStore(command);
      const spinner = ora(`Adding shoe ${options.code}`).start();
      try {
        const code = requireSafe(options.code, 'code');
        if (store.hasCode(code)) {
          throw new Error(`Shoe code ${code} already exists`);
        }

        await store.append({
          country: requireSafe(options.country, 'country'),
          code,
          product: requireSafe(options.product, 'product'),
          cost: parseCount(options.cost, 'cost'),
          quantity: parseCount(options.quantity, 'quantity'),
        });
        spinner.succeed(`Shoe ${code} added (${store.size} in inventory)`);
      } catch (error) {
        spinner.fail(error instanceof Error ? error.message : 'Adding shoe failed');
        process.exitCode = 1;
      }
    });

  const restock = new Command('restock')
    .description('Restock the shoe with the lowest quantity')
    .argument('<amount>', 'Units to add')
    .action(async (amount: string, _options: object, command: Command) => {
      const store = await openStore(command);
      const spinner = ora('Restocking lowest quantity shoe').start();
      try {
        const result = await store.restock(parseCount(amount, 'restock amount'));
        spinner.succeed(
          `Restocked ${result.shoe.code}: ${result.previousQuantity} → ${result.shoe.quantity}`,
        );
      } catch (error) {
        spinner.fail(error instanceof Error ? error.message : 'Restock failed');
        process.exitCode = 1;
      }
    });

  const value = new Command('value')
    .description('Show the stock value of each shoe')
    .action(async (_options: object, command: Command) => {
      const store = await openStore(command);
      renderValues(store.valuePerItem(), store.totalValue()).forEach((line) => console.log(line));
    });

  const search = new Command('search')
    .description('Find a shoe by code (case-insensitive)')
    .argument('<code>', 'Shoe code')
    .action(async (code: string, _options: object, command: Command) => {
      const store = await openStore(command);
      const shoe = store.findByCode(code.trim());
      if (!shoe) {
        console.log('No shoe with the code exists.');
        return;
      }
      console.log(renderShoe(shoe));
    });

  const extreme = (name: string, description: string, heading: string, pick: 'lowest' | 'highest') =>
    new Command(name).description(description).action(async (_options: object, command: Command) => {
      const store = await openStore(command);
      const shoe = pick === 'lowest' ? store.findLowest() : store.findHighest();
      if (!shoe) {
        console.log('There are no shoes in the inventory.');
        return;
      }
      console.log(heading);
      console.log(renderShoe(shoe));
    });

  return [
    list,
    add,
    restock,
    value,
    search,
    extreme('lowest', 'Show the shoe with the lowest quantity', 'Shoe with lowest quantity:', 'lowest'),
    extreme(
      'highest',
      'Show the shoe with the highest quantity',
      'Shoe with highest quantity for sale:',
      'highest',
    ),
  ];
};
