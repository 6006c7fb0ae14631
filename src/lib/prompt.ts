/**
 * Interactive confirmation
 */

import { createInterface } from 'node:readline/promises';
import { stdin, stderr } from 'node:process';

export interface Prompter {
  /** Ordinary yes/no question; `y` or `yes` confirms */
  confirm(question: string): Promise<boolean>;
  /**
   * Destructive-action gate: only the literal `token` typed in full confirms.
   */
  confirmDangerous(warning: string, token: string): Promise<boolean>;
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

export function createTerminalPrompter(): Prompter {
  async function ask(question: string): Promise<string> {
    const rl = createInterface({ input: stdin, output: stderr });
    try {
      return await rl.question(question);
    } finally {
      rl.close();
    }
  }

  return {
    async confirm(question) {
      return isAffirmative(await ask(`${question} [y/N]: `));
    },
    async confirmDangerous(warning, token) {
      const answer = await ask(`\n!!! ${warning}\nType "${token}" to continue: `);
      return answer.trim() === token;
    },
  };
}

/**
 * Prompter for non-interactive runs: ordinary questions are answered with
 * `autoAnswer`; dangerous ones are always declined.
 */
export function createNonInteractivePrompter(autoAnswer: boolean): Prompter {
  return {
    confirm: async () => autoAnswer,
    confirmDangerous: async () => false,
  };
}
