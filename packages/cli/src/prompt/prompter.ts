import { createInterface, type Interface } from 'readline';
import { PromptAbortedError } from '../errors.js';

export interface Prompter {
  print(line: string): void;
  ask(question: string): Promise<string>;
  close(): void;
}

/** Terminal prompter. End of input answers with an empty string; Ctrl-C rejects. */
export class ReadlinePrompter implements Prompter {
  protected readonly rl: Interface;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = createInterface({ input, output });
  }

  print(line: string): void {
    this.output.write(`${line}\n`);
  }

  ask(question: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const onClose = () => resolve('');
      const onSigint = () => {
        this.rl.off('close', onClose);
        this.rl.close();
        reject(new PromptAbortedError());
      };
      this.rl.once('close', onClose);
      this.rl.once('SIGINT', onSigint);
      this.rl.question(question, (answer) => {
        this.rl.off('close', onClose);
        this.rl.off('SIGINT', onSigint);
        resolve(answer);
      });
    });
  }

  close(): void {
    this.rl.close();
  }
}
