import {
  applyFixedDefaults,
  deriveFormFields,
  resetDtaaFields,
  yesNoToYn,
  ynToYesNo
} from './form_fields.js';
import type { MasterIndex } from './master_data.js';
import type { FieldProblem, ReviewPrompts, SuggestionChange } from './review_prompts.js';
import {
  mergeSuggestions,
  suggestFromMaster,
  type FieldDictionary,
  type ReconciliationEvent
} from './suggestions.js';
import { findFormatIssues } from './validators.js';
import { findMissingMandatoryFields } from './xml_generator.js';

export interface ReviewResult {
  fields: FieldDictionary;
  events: ReconciliationEvent[];
  applied: string[];
}

export interface ReviewContext {
  index: MasterIndex;
  bankCodeLookup: Readonly<Record<string, string>>;
  now?: Date;
}

const MAX_FIELD_ATTEMPTS = 5;

function pendingChanges(
  fields: Readonly<FieldDictionary>,
  suggestions: Readonly<FieldDictionary>
): SuggestionChange[] {
  return Object.entries(suggestions)
    .filter(([field, suggested]) => (fields[field] ?? '') !== suggested)
    .map(([field, suggested]) => ({ field, current: fields[field] ?? '', suggested }));
}

function nextProblem(fields: Readonly<FieldDictionary>): FieldProblem | undefined {
  const missing = findMissingMandatoryFields(fields)[0];
  if (missing) {
    return { field: missing, current: '', message: 'required' };
  }

  const issue = findFormatIssues(fields)[0];
  return issue ? { field: issue.field, current: issue.value, message: issue.message } : undefined;
}

/**
 * Walks one submission through reconciliation: offer master-data suggestions,
 * settle the DTAA section, then ask for every mandatory or malformed field
 * until the dictionary would pass generation checks.
 */
export async function reviewFields(
  prompts: ReviewPrompts,
  extracted: Readonly<FieldDictionary>,
  context: ReviewContext
): Promise<ReviewResult> {
  let fields = applyFixedDefaults(extracted, context.now);

  const { suggestions, events } = suggestFromMaster(context.index, fields, context.bankCodeLookup);
  const changes = pendingChanges(fields, suggestions);
  const applied = changes.length > 0 ? await prompts.chooseSuggestions(changes) : [];
  const accepted: FieldDictionary = {};
  for (const field of applied) {
    accepted[field] = suggestions[field];
  }
  fields = mergeSuggestions(fields, accepted);

  const dtaa = await prompts.askDtaaApplicable(ynToYesNo(fields.TaxIndDtaaFlg));
  if (dtaa === 'NO') {
    fields = resetDtaaFields(fields);
  }
  fields.TaxIndDtaaFlg = yesNoToYn(dtaa);
  fields = deriveFormFields(fields, context.now);

  const attempts = new Map<string, number>();
  for (let problem = nextProblem(fields); problem; problem = nextProblem(fields)) {
    const count = (attempts.get(problem.field) ?? 0) + 1;
    if (count > MAX_FIELD_ATTEMPTS) {
      throw new Error(`${problem.field} is still invalid after ${MAX_FIELD_ATTEMPTS} attempts`);
    }
    attempts.set(problem.field, count);

    const answer = (await prompts.askFieldValue(problem)).trim();
    fields[problem.field] = problem.field === 'RemitterPAN' ? answer.toUpperCase() : answer;
  }

  return { fields, events, applied };
}
