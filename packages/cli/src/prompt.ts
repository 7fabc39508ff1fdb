/**
 * Terminal prompts on top of readline. Prompts go to stderr so stdout stays
 * clean for --json output.
 */

import { createInterface } from 'node:readline';
import { Writable } from 'node:stream';
import { UserCancelledError } from '@dshop/core';
import type { Prompter } from '@dshop/core';

export class TerminalPrompter implements Prompter {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stderr,
  ) {}

  private question(prompt: string, hidden = false): Promise<string> {
    let muted = false;
    const output = this.output;
    // Echo is dropped while a hidden answer is typed.
    const sink = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        if (!muted) output.write(chunk);
        callback();
      },
    });

    const rl = createInterface({ input: this.input, output: sink, terminal: true });
    return new Promise((resolve, reject) => {
      let answered = false;
      rl.on('close', () => {
        if (!answered) reject(new UserCancelledError());
      });
      rl.question(prompt, (answer) => {
        answered = true;
        rl.close();
        if (hidden) output.write('\n');
        resolve(answer);
      });
      muted = hidden;
    });
  }

  async ask(question: string, defaultValue?: string): Promise<string> {
    const suffix = defaultValue ? ` [${defaultValue}]` : '';
    const answer = (await this.question(`${question}${suffix}: `)).trim();
    return answer || defaultValue || '';
  }

  askSecret(question: string): Promise<string> {
    return this.question(`${question} (hidden): `, true);
  }

  async confirm(question: string, defaultYes = false): Promise<boolean> {
    const answer = (await this.question(`${question} ${defaultYes ? '[Y/n]' : '[y/N]'} `))
      .trim()
      .toLowerCase();
    if (!answer) return defaultYes;
    return answer === 'y' || answer === 'yes';
  }

  async choose(question: string, options: string[]): Promise<string> {
    this.output.write(`${question}:\n`);
    options.forEach((option, i) => {
      this.output.write(`  ${i + 1}. ${option}\n`);
    });

    for (;;) {
      const answer = (await this.question(`Choice [1-${options.length}]: `)).trim();
      if (!answer) throw new UserCancelledError('no choice made');
      const choice = options[parseInt(answer, 10) - 1];
      if (choice !== undefined) return choice;
      this.output.write(`Enter a number between 1 and ${options.length}.\n`);
    }
  }
}
