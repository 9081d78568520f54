import { checkbox, confirm, input, select } from '@inquirer/prompts';

import type { YesNo } from './form_fields.js';

export interface SuggestionChange {
  field: string;
  current: string;
  suggested: string;
}

export interface FieldProblem {
  field: string;
  current: string;
  message: string;
}

/** Questions the review flow asks; the terminal implementation uses inquirer. */
export interface ReviewPrompts {
  chooseSuggestions(changes: SuggestionChange[]): Promise<string[]>;
  askDtaaApplicable(current: YesNo): Promise<YesNo>;
  askFieldValue(problem: FieldProblem): Promise<string>;
  confirmGenerate(): Promise<boolean>;
}

function describeChange(change: SuggestionChange): string {
  const current = change.current.trim() ? change.current : '(blank)';
  return `${change.field}: ${current} -> ${change.suggested}`;
}

export const terminalReviewPrompts: ReviewPrompts = {
  async chooseSuggestions(changes) {
    return checkbox({
      message: 'Apply master data suggestions:',
      choices: changes.map((change) => ({
        name: describeChange(change),
        value: change.field,
        checked: true
      })),
      pageSize: 15
    });
  },

  async askDtaaApplicable(current) {
    return select<YesNo>({
      message: 'DTAA applicable?',
      choices: [
        { name: 'NO', value: 'NO' },
        { name: 'YES', value: 'YES' }
      ],
      default: current
    });
  },

  async askFieldValue(problem) {
    return input({
      message: `${problem.field} (${problem.message}):`,
      default: problem.current || undefined
    });
  },

  async confirmGenerate() {
    return confirm({ message: 'Generate XML now?', default: true });
  }
};
