/**
 * treesync Prompt — Terminal prompter for `prompt` conflict mode.
 *
 * Questions go to stderr so stdout stays clean for command output.
 */

import { createInterface } from 'node:readline';
import type { ConflictChoice, Prompter } from '../types/index.js';

interface ChoiceOption {
  key: string;
  label: string;
  choice: ConflictChoice;
}

const OPTIONS: ChoiceOption[] = [
  { key: 'b', label: '(b)ackup',  choice: 'backup' },
  { key: 'd', label: '(d)elete',  choice: 'delete' },
  { key: 'a', label: '(a)bort',   choice: 'abort' },
  { key: 's', label: '(s)kip',    choice: 'skip' },
];

/** Map an answer to a choice; null when it is not one of the offered keys */
export function parseConflictAnswer(answer: string, allowSkip: boolean): ConflictChoice | null {
  const key = answer.trim().toLowerCase().charAt(0);
  const option = OPTIONS.find(o => o.key === key && (allowSkip || o.choice !== 'skip'));
  return option ? option.choice : null;
}

export interface TerminalPrompterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export function createTerminalPrompter(options: TerminalPrompterOptions = {}): Prompter {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stderr;

  const ask = async (question: string): Promise<string> => {
    const rl = createInterface({ input, output });
    try {
      return await new Promise<string>(resolve => rl.question(question, resolve));
    } finally {
      rl.close();
    }
  };

  return {
    async chooseConflictResolution(message, allowSkip) {
      const labels = OPTIONS.filter(o => allowSkip || o.choice !== 'skip').map(o => o.label).join(', ');
      output.write(`\n  ${message}\n`);
      for (;;) {
        const choice = parseConflictAnswer(await ask(`  Change type of this tree? ${labels}: `), allowSkip);
        if (choice) return choice;
        output.write('  Invalid input.\n');
      }
    },

    async askBackupPath() {
      for (;;) {
        const answer = (await ask('  Please enter backup path: ')).trim();
        if (answer) return answer;
      }
    },
  };
}
