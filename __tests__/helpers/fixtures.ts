import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { InputClosedError, type Terminal } from '../../src/cli/prompts.js';

export const HEADER = 'Country,Code,Product,Cost,Quantity';

export const TWO_SHOES = `${HEADER}\nUK,SC001,Boot,50,3\nUK,SC002,Shoe,30,10\n`;

export const makeTempDir = () => fs.mkdtemp(path.join(os.tmpdir(), 'shoe-stock-'));

export const writeInventory = async (dir: string, content: string, name = 'inventory.txt') => {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, content, 'utf8');
  return filePath;
};

export const readInventory = (filePath: string) => fs.readFile(filePath, 'utf8');

/**
 * Terminal that answers prompts from a fixed script and records what was printed.
 * Running out of answers behaves like the user closing input.
 */
export const createScriptedTerminal = (answers: string[]) => {
  const queue = [...answers];
  const output: string[] = [];
  const prompts: string[] = [];
  let closed = false;

  const terminal: Terminal = {
    ask: async (query) => {
      prompts.push(query);
      const next = queue.shift();
      if (next === undefined) throw new InputClosedError();
      return next;
    },
    print: (line) => {
      output.push(line);
    },
    close: () => {
      closed = true;
    },
  };

  return { terminal, output, prompts, isClosed: () => closed, remaining: () => queue.length };
};
