import * as readline from 'readline/promises';

/**
 * Question-and-answer interface used by the interactive wizard
 */
export interface Prompter {
  /** Returns the 0-based index of the chosen item */
  select(message: string, choices: readonly string[], defaultIndex?: number): Promise<number>;
  integer(message: string, defaultValue: number, minimum?: number): Promise<number>;
  /** Non-negative unless `positive` is set */
  number(message: string, defaultValue: number, positive?: boolean): Promise<number>;
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
  close(): void;
}

/**
 * Line-based prompter over stdin/stdout. An empty answer takes the default;
 * answers that do not parse are asked again.
 */
export class ReadlinePrompter implements Prompter {
  private rl: readline.Interface;
  private output: NodeJS.WritableStream;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.rl = readline.createInterface({ input, output });
    this.output = output;
  }

  async select(message: string, choices: readonly string[], defaultIndex: number = 0): Promise<number> {
    while (true) {
      choices.forEach((choice, index) => {
        this.output.write(`  ${index + 1}) ${choice}\n`);
      });

      const answer = (await this.rl.question(`? ${message} [${defaultIndex + 1}]: `)).trim();
      if (answer === '') {
        return defaultIndex;
      }

      const choice = Number(answer);
      if (Number.isInteger(choice) && choice >= 1 && choice <= choices.length) {
        return choice - 1;
      }
      this.output.write(`Please enter a number between 1 and ${choices.length}\n`);
    }
  }

  async integer(message: string, defaultValue: number, minimum: number = 0): Promise<number> {
    while (true) {
      const value = await this.ask(message, defaultValue);
      if (Number.isSafeInteger(value) && value >= minimum) {
        return value;
      }
      this.output.write(minimum > 0
        ? `Please enter a whole number of at least ${minimum}\n`
        : 'Please enter a whole number\n');
    }
  }

  async number(message: string, defaultValue: number, positive: boolean = false): Promise<number> {
    while (true) {
      const value = await this.ask(message, defaultValue);
      if (Number.isFinite(value) && (positive ? value > 0 : value >= 0)) {
        return value;
      }
      this.output.write(positive ? 'Please enter a number greater than zero\n' : 'Please enter a number\n');
    }
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    const hint = defaultValue ? 'Y/n' : 'y/N';
    const answer = (await this.rl.question(`? ${message} (${hint}): `)).trim().toLowerCase();
    if (answer === '') {
      return defaultValue;
    }
    return answer === 'y' || answer === 'yes';
  }

  close(): void {
    this.rl.close();
  }

  private async ask(message: string, defaultValue: number): Promise<number> {
    const answer = (await this.rl.question(`? ${message} (${defaultValue}): `)).trim();
    return answer === '' ? defaultValue : Number(answer);
  }
}
