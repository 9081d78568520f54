import assert from 'node:assert/strict';
import test from 'node:test';

import type { YesNo } from '../lib/form_fields.js';
import { reviewFields } from '../lib/review.js';
import type { FieldProblem, ReviewPrompts, SuggestionChange } from '../lib/review_prompts.js';
import { buildSampleIndex } from './master_fixture.js';

class ScriptedReviewPrompts implements ReviewPrompts {
  private readonly acceptQueue: string[][];
  private readonly dtaaQueue: YesNo[];
  private readonly answerQueue: string[];

  readonly offered: SuggestionChange[][] = [];
  readonly dtaaDefaults: YesNo[] = [];
  readonly problems: FieldProblem[] = [];

  constructor(options: { accept?: string[][]; dtaa?: YesNo[]; answers?: string[] }) {
    this.acceptQueue = options.accept ?? [];
    this.dtaaQueue = options.dtaa ?? [];
    this.answerQueue = options.answers ?? [];
  }

  async chooseSuggestions(changes: SuggestionChange[]): Promise<string[]> {
    this.offered.push(changes);
    return this.takeStep(this.acceptQueue, 'chooseSuggestions');
  }

  async askDtaaApplicable(current: YesNo): Promise<YesNo> {
    this.dtaaDefaults.push(current);
    return this.takeStep(this.dtaaQueue, 'askDtaaApplicable');
  }

  async askFieldValue(problem: FieldProblem): Promise<string> {
    this.problems.push(problem);
    return this.takeStep(this.answerQueue, 'askFieldValue');
  }

  async confirmGenerate(): Promise<boolean> {
    return false;
  }

  private takeStep<T>(queue: T[], method: string): T {
    const step = queue.shift();
    if (step === undefined) {
      throw new Error(`No scripted response left for ${method}`);
    }
    return step;
  }
}

const context = {
  index: buildSampleIndex(),
  bankCodeLookup: {},
  now: new Date(2026, 1, 18)
};

test('reviewFields applies chosen suggestions, resets DTAA and asks until fields are valid', async () => {
  const prompts = new ScriptedReviewPrompts({
    accept: [['NameRemitter', 'BsrCode']],
    dtaa: ['NO'],
    answers: ['abc', ' aaecs1234k ']
  });

  const result = await reviewFields(
    prompts,
    { NameRemitter: 'Sundaram Precision', RemitterPAN: '', TaxIndDtaaFlg: 'Y', RateTdsADtaa: '10' },
    context
  );

  assert.deepEqual(
    prompts.offered[0].map((change) => change.field),
    ['NameRemitter', 'RemitterPAN', 'NameBankCode', 'BranchName', 'BsrCode']
  );
  assert.deepEqual(prompts.offered[0][0], {
    field: 'NameRemitter',
    current: 'Sundaram Precision',
    suggested: 'Sundaram Precision Tools Pvt Ltd'
  });
  assert.deepEqual(prompts.dtaaDefaults, ['YES']);
  assert.deepEqual(prompts.problems, [
    { field: 'RemitterPAN', current: '', message: 'required' },
    { field: 'RemitterPAN', current: 'ABC', message: 'expected 5 letters, 4 digits, 1 letter' }
  ]);

  assert.deepEqual(result.applied, ['NameRemitter', 'BsrCode']);
  assert.equal(result.fields.NameRemitter, 'Sundaram Precision Tools Pvt Ltd');
  assert.equal(result.fields.RemitterPAN, 'AAECS1234K');
  assert.equal(result.fields.BsrCode, '0002345');
  assert.equal(result.fields.NameBankCode, undefined);
  assert.equal(result.fields.TaxIndDtaaFlg, 'N');
  assert.equal(result.fields.RateTdsADtaa, '');
  assert.equal(result.fields.XMLCreationDate, '2026-02-18');
  assert.deepEqual(
    result.events.map((event) => event.match_type),
    ['alias_matched', 'matched']
  );
});

test('reviewFields skips the suggestion step when master data has nothing to add', async () => {
  const prompts = new ScriptedReviewPrompts({
    dtaa: ['YES'],
    answers: ['AADCK5678M']
  });

  const result = await reviewFields(prompts, { NameRemitter: 'Unknown Widgets Ltd', RateTdsADtaa: '10' }, context);

  assert.equal(prompts.offered.length, 0);
  assert.deepEqual(prompts.dtaaDefaults, ['NO']);
  assert.deepEqual(result.applied, []);
  assert.equal(result.fields.TaxIndDtaaFlg, 'Y');
  assert.equal(result.fields.RateTdsADtaa, '10');
  assert.equal(result.fields.RemitterPAN, 'AADCK5678M');
});

test('reviewFields gives up on a field after repeated invalid answers', async () => {
  const prompts = new ScriptedReviewPrompts({
    dtaa: ['NO'],
    answers: Array.from({ length: 6 }, () => 'bad')
  });

  await assert.rejects(
    reviewFields(prompts, { NameRemitter: 'Unknown Widgets Ltd' }, context),
    /RemitterPAN is still invalid after 5 attempts/
  );
  assert.equal(prompts.problems.length, 5);
});
