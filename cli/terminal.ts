/**
 * Line-based console I/O. Menus only talk to the Terminal interface, so tests
 * drive them with a scripted stand-in.
 */

import * as readline from 'readline';

export interface Terminal {
  ask(question: string): Promise<string>;
  print(text?: string): void;
  clear(): void;
  close(): void;
}

/** Raised by ask() once input is gone (EOF or Ctrl-C). Ends the menu loop. */
export class TerminalClosedError extends Error {
  constructor(public readonly interrupted: boolean) {
    super(interrupted ? 'Interrupted by the user' : 'Input closed');
    this.name = 'TerminalClosedError';
  }
}

export function createConsoleTerminal(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WriteStream = process.stdout
): Terminal {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  let interrupted = false;

  rl.on('SIGINT', () => {
    interrupted = true;
    rl.close();
  });
  rl.on('close', () => {
    closed = true;
  });

  return {
    ask(question) {
      if (closed) return Promise.reject(new TerminalClosedError(interrupted));
      return new Promise((resolve, reject) => {
        const onClose = () => reject(new TerminalClosedError(interrupted));
        rl.once('close', onClose);
        rl.question(question, (answer) => {
          rl.off('close', onClose);
          resolve(answer);
        });
      });
    },
    print(text = '') {
      output.write(`${text}\n`);
    },
    clear() {
      if (output.isTTY) output.write('\x1b[2J\x1b[3J\x1b[H');
    },
    close() {
      if (!closed) rl.close();
    },
  };
}
