import type { BankRow, LookupDomain, MasterIndex } from './master_data.js';
import { normalize } from './normalize.js';
import {
  findDtaa,
  findForeignCompany,
  findIndianCompany,
  findNatureRow,
  findPartyBankByName,
  findPartyBanks,
  resolveName
} from './resolver.js';
import { digitsOnly } from './validators.js';

export type FieldDictionary = Record<string, string>;

export type MatchType = 'matched' | 'alias_matched' | 'not_found';

export interface ReconciliationEvent {
  readonly lookup_domain: LookupDomain;
  readonly input: string;
  readonly resolved: string;
  readonly match_type: MatchType;
  readonly source: string;
}

export interface SuggestionResult {
  suggestions: FieldDictionary;
  events: ReconciliationEvent[];
}

const SOURCES: Record<LookupDomain, string> = {
  indian: 'master.indian_companies',
  foreign: 'master.foreign_companies',
  party: 'master.banks_by_party',
  nature: 'master.nature_map',
  country: 'master.dtaa_rates'
};

function classifyMatch(index: MasterIndex, raw: string, domain: LookupDomain): MatchType {
  return resolveName(index, raw, domain) !== normalize(raw) ? 'alias_matched' : 'matched';
}

function recordEvent(
  events: ReconciliationEvent[],
  index: MasterIndex,
  domain: LookupDomain,
  input: string,
  resolved: string | null
): void {
  if (!input.trim()) {
    return;
  }

  const event: ReconciliationEvent = {
    lookup_domain: domain,
    input,
    resolved: resolved ?? '',
    match_type: resolved === null ? 'not_found' : classifyMatch(index, input, domain),
    source: SOURCES[domain]
  };
  events.push(Object.freeze(event));
}

function assign(target: FieldDictionary, key: string, value: string): void {
  if (value) {
    target[key] = value;
  }
}

/** Fraction to percentage text: 0.1 -> "10", 0.125 -> "12.5". */
export function formatRatePercent(rate: number | null): string | null {
  if (rate === null || !Number.isFinite(rate)) {
    return null;
  }
  return String(Number((rate * 100).toFixed(2)));
}

/** Only banks registered for the seed party are suggested. */
function pickBankRow(
  index: MasterIndex,
  partySeed: string,
  bankHint: string
): BankRow | undefined {
  return findPartyBankByName(index, bankHint, partySeed) ?? findPartyBanks(index, partySeed)[0];
}

/**
 * Suggested overrides for `extracted`, looked up in a fixed order because the
 * bank step is seeded by the remitter step. `extracted` is left untouched.
 */
export function suggestFromMaster(
  index: MasterIndex,
  extracted: Readonly<FieldDictionary>,
  bankCodeLookup: Readonly<Record<string, string>>
): SuggestionResult {
  const suggestions: FieldDictionary = {};
  const events: ReconciliationEvent[] = [];

  const remitterInput = extracted.NameRemitter ?? '';
  const remitter = findIndianCompany(index, remitterInput);
  if (remitter) {
    assign(suggestions, 'NameRemitter', remitter.name);
    assign(suggestions, 'RemitterPAN', remitter.pan.toUpperCase());
  }
  recordEvent(events, index, 'indian', remitterInput, remitter ? remitter.name || remitterInput : null);

  const remitteeInput = extracted.NameRemittee ?? '';
  const remittee = findForeignCompany(index, remitteeInput);
  if (remittee) {
    assign(suggestions, 'NameRemittee', remittee.name);
  }
  recordEvent(events, index, 'foreign', remitteeInput, remittee ? remittee.name || remitteeInput : null);

  const partySeed = suggestions.NameRemitter || remitterInput;
  const bank = partySeed ? pickBankRow(index, partySeed, extracted.NameBankCode ?? '') : undefined;
  if (bank) {
    assign(suggestions, 'NameBankCode', bankCodeLookup[normalize(bank.bank_name)] ?? bank.bank_name);
    assign(suggestions, 'BranchName', bank.branch);
    assign(suggestions, 'BsrCode', digitsOnly(bank.bsr_code));
  }
  recordEvent(events, index, 'party', partySeed, bank ? bank.bank_name : null);

  const natureInput = extracted.NatureRemCategory ?? '';
  const nature = findNatureRow(index, natureInput);
  if (nature) {
    assign(suggestions, 'NatureRemCategory', nature.agreement_nature);
    assign(suggestions, 'RevPurCategory', nature.service_category);
    assign(suggestions, 'RevPurCode', nature.purpose_code);
  }
  recordEvent(events, index, 'nature', natureInput, nature ? nature.agreement_nature || natureInput : null);

  const countryInput = extracted.CountryRemMadeSecb || extracted.RemitteeTownCityDistrict || '';
  const dtaa = findDtaa(index, countryInput);
  if (dtaa) {
    assign(suggestions, 'RelevantDtaa', dtaa.country);
    assign(suggestions, 'RelevantArtDtaa', dtaa.article);
    assign(suggestions, 'RateTdsADtaa', formatRatePercent(dtaa.rate) ?? '');
  }
  recordEvent(events, index, 'country', countryInput, dtaa ? dtaa.country || countryInput : null);

  return { suggestions, events };
}

export function formatEvent(event: ReconciliationEvent): string {
  const target = event.match_type === 'not_found' ? 'no match' : event.resolved;
  return `[${event.lookup_domain}] ${event.match_type}: '${event.input}' -> ${target} (${event.source})`;
}

export function mergeSuggestions(
  fields: Readonly<FieldDictionary>,
  suggestions: Readonly<FieldDictionary>
): FieldDictionary {
  return { ...fields, ...suggestions };
}
