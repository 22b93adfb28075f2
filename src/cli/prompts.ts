import * as readline from 'node:readline';
import { isSafeField, nonNegativeIntegerSchema } from '../inventory/shoe.js';

/** Raised by a terminal whose input has ended (Ctrl-D, closed pipe). */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

export interface Terminal {
  ask: (query: string) => Promise<string>;
  print: (line: string) => void;
  close: () => void;
}

/**
 * Terminal over stdin/stdout. Lines are queued as they arrive, so input piped
 * in a single chunk answers successive questions in order.
 */
export const createConsoleTerminal = (
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Terminal => {
  const rl = readline.createInterface({ input, output, crlfDelay: Infinity });
  const lines: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on('line', (line) => {
    const next = waiting.shift();
    if (next) next(line);
    else lines.push(line);
  });
  rl.once('close', () => {
    closed = true;
    for (const resolve of waiting.splice(0)) resolve(null);
  });

  return {
    ask: async (query) => {
      if (!closed) {
        rl.setPrompt(query);
        rl.prompt();
      }

      const queued = lines.shift();
      if (queued !== undefined) return queued;
      if (closed) throw new InputClosedError();

      const line = await new Promise<string | null>((resolve) => waiting.push(resolve));
      if (line === null) throw new InputClosedError();
      return line;
    },
    print: (line) => {
      output.write(`${line}\n`);
    },
    close: () => rl.close(),
  };
};

export const askMenuChoice = async (terminal: Terminal, optionCount: number): Promise<number> => {
  while (true) {
    const raw = await terminal.ask('\nEnter the option number you would like to perform: ');
    const parsed = nonNegativeIntegerSchema.safeParse(raw);
    if (parsed.success && parsed.data >= 1 && parsed.data <= optionCount) {
      return parsed.data;
    }
    terminal.print('You have entered an incorrect value.');
  }
};

export const askNonNegativeInteger = async (
  terminal: Terminal,
  query: string,
  field: string,
): Promise<number> => {
  while (true) {
    const parsed = nonNegativeIntegerSchema.safeParse(await terminal.ask(query));
    if (parsed.success) return parsed.data;
    terminal.print(`The ${field} must be a non-negative integer value. Try again.`);
  }
};

/** Trimmed free text that can be stored in a delimited field. */
export const askField = async (terminal: Terminal, query: string, field: string): Promise<string> => {
  while (true) {
    const value = (await terminal.ask(query)).trim();
    if (isSafeField(value)) return value;
    terminal.print(`The ${field} cannot contain commas. Try again.`);
  }
};

export const askUniqueCode = async (
  terminal: Terminal,
  isTaken: (code: string) => boolean,
): Promise<string> => {
  while (true) {
    const code = await askField(terminal, '\nPlease input the unique shoe code: ', 'code');
    if (!isTaken(code)) return code;
    terminal.print('This is not a unique code, please try again.');
  }
};
