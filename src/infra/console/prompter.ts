import { createInterface, type Interface } from 'readline/promises';

/**
 * Line-based terminal I/O used by the console application.
 */
export interface Prompter {
  ask(question: string): Promise<string>;
  print(line?: string): void;
  close(): void;
}

/**
 * Raised by `ask` once input has ended (Ctrl-D or a closed pipe).
 */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly closed: Promise<never>;
  private isClosed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, output });
    this.closed = new Promise<never>((_resolve, reject) => {
      this.rl.once('close', () => {
        this.isClosed = true;
        reject(new InputClosedError());
      });
    });
    // Only observed through ask(); keep an early close from surfacing as unhandled.
    this.closed.catch(() => undefined);
  }

  async ask(question: string): Promise<string> {
    if (this.isClosed) {
      throw new InputClosedError();
    }
    return await Promise.race([this.rl.question(question), this.closed]);
  }

  print(line = ''): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    if (!this.isClosed) {
      this.rl.close();
    }
  }
}
