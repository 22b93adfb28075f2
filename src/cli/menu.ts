import type { InventoryStore } from '../inventory/store.js';
import { error as logError } from '../utils/logger.js';
import {
  InputClosedError,
  askField,
  askMenuChoice,
  askNonNegativeInteger,
  askUniqueCode,
  type Terminal,
} from './prompts.js';
import { renderShoe, renderShoeTable, renderValues } from './render.js';

export const MENU_OPTIONS = [
  'View all shoes',
  'Add a new shoe',
  'Check shoe with lowest quantity and re-stock',
  'View total value for each item',
  'Search for a shoe using the shoe code',
  'Find shoe with highest quantity',
  'Exit',
] as const;

const EXIT_CHOICE = MENU_OPTIONS.length;
const EMPTY_INVENTORY = 'There are no shoes in the inventory.';

const printMenu = (terminal: Terminal) => {
  terminal.print('\nHere are the options:');
  MENU_OPTIONS.forEach((label, index) => terminal.print(`${index + 1}: ${label}`));
};

const viewAll = (store: InventoryStore, terminal: Terminal) => {
  terminal.print(renderShoeTable(store.list()));
};

const addShoe = async (store: InventoryStore, terminal: Terminal) => {
  const country = await askField(terminal, '\nPlease input the country: ', 'country');
  const code = await askUniqueCode(terminal, (candidate) => store.hasCode(candidate));
  const product = await askField(terminal, '\nPlease input the product name: ', 'product');
  const cost = await askNonNegativeInteger(terminal, '\nPlease input the cost: ', 'cost');
  const quantity = await askNonNegativeInteger(terminal, '\nPlease input the quantity: ', 'quantity');

  await store.append({ country, code, product, cost, quantity });
  terminal.print(`Shoe ${code} added.`);
};

const restockLowest = async (store: InventoryStore, terminal: Terminal) => {
  const lowest = store.findLowest();
  if (!lowest) {
    terminal.print(EMPTY_INVENTORY);
    return;
  }

  terminal.print('Shoe with lowest quantity:');
  terminal.print(renderShoe(lowest));

  const amount = await askNonNegativeInteger(
    terminal,
    'How much would you like to restock these by? ',
    'restock amount',
  );
  const { shoe } = await store.restock(amount);
  terminal.print(`The new quantity is now ${shoe.quantity}.`);
};

const showValues = (store: InventoryStore, terminal: Terminal) => {
  renderValues(store.valuePerItem(), store.totalValue()).forEach((line) => terminal.print(line));
};

const searchByCode = async (store: InventoryStore, terminal: Terminal) => {
  const code = (await terminal.ask('Enter the shoe code you want to search: ')).trim();
  const shoe = store.findByCode(code);
  terminal.print(shoe ? renderShoe(shoe) : 'No shoe with the code exists.');
};

const showHighest = (store: InventoryStore, terminal: Terminal) => {
  const highest = store.findHighest();
  if (!highest) {
    terminal.print(EMPTY_INVENTORY);
    return;
  }
  terminal.print('Shoe with highest quantity for sale:');
  terminal.print(renderShoe(highest));
};

const runAction = async (choice: number, store: InventoryStore, terminal: Terminal) => {
  switch (choice) {
    case 1:
      return viewAll(store, terminal);
    case 2:
      return addShoe(store, terminal);
    case 3:
      return restockLowest(store, terminal);
    case 4:
      return showValues(store, terminal);
    case 5:
      return searchByCode(store, terminal);
    case 6:
      return showHighest(store, terminal);
    default:
      throw new Error(`Unknown menu option: ${choice}`);
  }
};

/**
 * Interactive loop over an already loaded store. Returns when the user picks
 * Exit or the terminal input ends. Storage failures are logged and the loop
 * carries on.
 */
export const runMenu = async (store: InventoryStore, terminal: Terminal): Promise<void> => {
  try {
    while (true) {
      printMenu(terminal);
      const choice = await askMenuChoice(terminal, MENU_OPTIONS.length);
      if (choice === EXIT_CHOICE) return;

      try {
        await runAction(choice, store, terminal);
      } catch (err) {
        if (err instanceof InputClosedError) throw err;
        logError(err instanceof Error ? err.message : String(err));
      }
    }
  } catch (err) {
    if (err instanceof InputClosedError) return;
    throw err;
  }
};
