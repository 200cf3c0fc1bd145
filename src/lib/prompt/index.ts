import inquirer from 'inquirer';

export const AFFIRMATIVE_ANSWERS: ReadonlySet<string> = new Set(['y', 'Y', 'yes', 'Yes', 'YES']);

/**
 * True only for an exact affirmative token. Anything else, the empty string included, is "no".
 */
export function parseBoolean(answer: string): boolean {
  return AFFIRMATIVE_ANSWERS.has(answer);
}

/**
 * Where free-form answers to setup questions come from.
 */
export interface AnswerSource {
  ask(question: string): Promise<string>;
}

export class InteractiveAnswerSource implements AnswerSource {
  async ask(question: string): Promise<string> {
    const { answer } = await inquirer.prompt<{ answer: string }>([
      { type: 'input', name: 'answer', message: question },
    ]);
    return answer;
  }
}

/**
 * Answers every question with the same preset value, for unattended runs.
 */
export class FixedAnswerSource implements AnswerSource {
  constructor(private answer: string) {}

  async ask(_question: string): Promise<string> {
    return this.answer;
  }
}
