import { Command } from 'commander';
import { buildInventoryCommands, openStore } from './inventory.js';
import { runMenu } from './menu.js';
import { createConsoleTerminal, type Terminal } from './prompts.js';

export const buildMenuCommand = (createTerminal: () => Terminal = () => createConsoleTerminal()) =>
  new Command('menu')
    .description('Interactive inventory menu')
    .action(async (_options: object, command: Command) => {
      const store = await openStore(command);
      const terminal = createTerminal();
      try {
        await runMenu(store, terminal);
      } finally {
        terminal.close();
      }
    });

export const buildProgram = (createTerminal?: () => Terminal) => {
  const program = new Command('shoe-stock')
    .description('Shoe store inventory backed by a comma-delimited text file')
    .version('0.1.0')
    .option('-f, --file <path>', 'Inventory file (default: $SHOE_STOCK_FILE or ./inventory.txt)')
    .option('-v, --verbose', 'Print debug output');

  program.addCommand(buildMenuCommand(createTerminal), { isDefault: true });
  for (const command of buildInventoryCommands()) {
    program.addCommand(command);
  }

  return program;
};
