import type {
  BankRow,
  DtaaRate,
  ForeignCompany,
  IndianCompany,
  LookupDomain,
  MasterIndex,
  NatureMapping
} from './master_data.js';
import { normalize, tokenize } from './normalize.js';

/**
 * Canonical key for `raw` in `domain`. An alias hit is applied once; its
 * target is normalized but never looked up in the alias table again.
 */
export function resolveName(index: MasterIndex, raw: string, domain: LookupDomain): string {
  const canonical = normalize(raw);
  if (!canonical) {
    return '';
  }

  const target = index.aliases[domain].get(canonical);
  return target === undefined ? canonical : normalize(target);
}

export function findIndianCompany(index: MasterIndex, name: string): IndianCompany | undefined {
  return index.indian.get(resolveName(index, name, 'indian'));
}

export function findForeignCompany(index: MasterIndex, name: string): ForeignCompany | undefined {
  return index.foreign.get(resolveName(index, name, 'foreign'));
}

export function findPartyBanks(index: MasterIndex, partyName: string): BankRow[] {
  const entry = index.party.get(resolveName(index, partyName, 'party'));
  return entry ? [...entry.rows] : [];
}

export function findNatureRow(index: MasterIndex, natureText: string): NatureMapping | undefined {
  return index.nature.get(resolveName(index, natureText, 'nature'));
}

export function findDtaa(index: MasterIndex, countryText: string): DtaaRate | undefined {
  return index.country.get(resolveName(index, countryText, 'country'));
}

interface FallbackCandidate {
  row: BankRow;
  partyKey: string;
  position: number;
  bankKey: string;
  overlap: number;
}

function tokenOverlap(queryTokens: Set<string>, bankKey: string): number {
  const bankTokens = new Set(bankKey.split(' '));
  let shared = 0;
  for (const token of queryTokens) {
    if (bankTokens.has(token)) {
      shared += 1;
    }
  }
  return shared;
}

function compareCandidates(a: FallbackCandidate, b: FallbackCandidate): number {
  if (a.overlap !== b.overlap) {
    return b.overlap - a.overlap;
  }
  if (a.bankKey.length !== b.bankKey.length) {
    return a.bankKey.length - b.bankKey.length;
  }
  if (a.partyKey !== b.partyKey) {
    return a.partyKey < b.partyKey ? -1 : 1;
  }
  return a.position - b.position;
}

/**
 * Bank row for `bankName` among the rows registered for `partyName` only: the
 * first exact normalized name, else the first name containing the query.
 */
export function findPartyBankByName(
  index: MasterIndex,
  bankName: string,
  partyName: string
): BankRow | undefined {
  const query = normalize(bankName);
  if (!query) {
    return undefined;
  }

  const rows = findPartyBanks(index, partyName);
  return (
    rows.find((row) => normalize(row.bank_name) === query) ??
    rows.find((row) => normalize(row.bank_name).includes(query))
  );
}

/**
 * Bank row for `bankName`, preferring the rows registered for `partyName`.
 *
 * The fallback scans every party. An exact normalized name wins; otherwise
 * rows whose name contains the query are ranked by shared tokens, then the
 * shorter bank name, then party key order, then row order.
 */
export function findBankByName(
  index: MasterIndex,
  bankName: string,
  partyName: string
): BankRow | undefined {
  const query = normalize(bankName);
  if (!query) {
    return undefined;
  }

  const partyMatch = findPartyBankByName(index, bankName, partyName);
  if (partyMatch) {
    return partyMatch;
  }

  const partyKeys = [...index.party.keys()].sort();
  const queryTokens = new Set(tokenize(query));
  const candidates: FallbackCandidate[] = [];

  for (const partyKey of partyKeys) {
    const rows = index.party.get(partyKey)?.rows ?? [];
    for (const [position, row] of rows.entries()) {
      const bankKey = normalize(row.bank_name);
      if (bankKey === query) {
        return row;
      }
      if (bankKey.includes(query)) {
        candidates.push({
          row,
          partyKey,
          position,
          bankKey,
          overlap: tokenOverlap(queryTokens, bankKey)
        });
      }
    }
  }

  candidates.sort(compareCandidates);
  return candidates[0]?.row;
}
