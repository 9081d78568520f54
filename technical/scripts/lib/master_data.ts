import fs from 'fs-extra';

import { ReferenceDataError } from './errors.js';
import { normalize } from './normalize.js';
import { aliasesPath, bankCodesPath, masterDataPath } from './paths.js';

export const LOOKUP_DOMAINS = ['indian', 'foreign', 'party', 'nature', 'country'] as const;

export type LookupDomain = (typeof LOOKUP_DOMAINS)[number];

export interface IndianCompany {
  kind: 'indian_company';
  name: string;
  pan: string;
}

export interface ForeignCompany {
  kind: 'foreign_company';
  name: string;
}

export interface BankRow {
  kind: 'bank_row';
  bank_name: string;
  bsr_code: string;
  branch: string;
}

export interface NatureMapping {
  kind: 'nature_mapping';
  invoice_nature: string;
  agreement_nature: string;
  service_category: string;
  purpose_code: string;
}

export interface DtaaRate {
  kind: 'dtaa_rate';
  country: string;
  article: string;
  /** Fraction in 0..1; `null` when the dataset value is not numeric. */
  rate: number | null;
}

export type MasterRecord = IndianCompany | ForeignCompany | BankRow | NatureMapping | DtaaRate;

export interface PartyBanks {
  party_name: string;
  rows: BankRow[];
}

export interface MasterDataset {
  indian_companies: IndianCompany[];
  foreign_companies: ForeignCompany[];
  banks_by_party: Array<[string, BankRow[]]>;
  nature_map: NatureMapping[];
  dtaa_rates: DtaaRate[];
}

export type AliasTables = Record<LookupDomain, ReadonlyMap<string, string>>;

export const ALIAS_FILE_KEYS: Record<LookupDomain, string> = {
  indian: 'indian_company_aliases',
  foreign: 'foreign_party_aliases',
  party: 'party_bank_aliases',
  nature: 'nature_aliases',
  country: 'country_aliases'
};

export interface DuplicateKey {
  domain: LookupDomain;
  key: string;
}

export interface MasterIndex {
  readonly indian: ReadonlyMap<string, IndianCompany>;
  readonly foreign: ReadonlyMap<string, ForeignCompany>;
  readonly party: ReadonlyMap<string, PartyBanks>;
  readonly nature: ReadonlyMap<string, NatureMapping>;
  readonly country: ReadonlyMap<string, DtaaRate>;
  readonly aliases: AliasTables;
  /** Keys skipped because an earlier record already claimed them. */
  readonly duplicates: readonly DuplicateKey[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> | null {
  return isRecord(value) ? value : null;
}

function text(value: unknown): string {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return '';
}

function numeric(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function recordList(value: unknown): Record<string, unknown>[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .map((entry) => asRecord(entry))
    .filter((entry): entry is Record<string, unknown> => entry !== null);
}

function toBankRow(record: Record<string, unknown>): BankRow {
  return {
    kind: 'bank_row',
    bank_name: text(record.bank_name),
    bsr_code: text(record.bsr_code),
    branch: text(record.branch)
  };
}

export function parseMasterDataset(raw: unknown, filePath: string): MasterDataset {
  const root = asRecord(raw);
  if (!root) {
    throw new ReferenceDataError(filePath, 'master data must contain a JSON object');
  }

  const banksByParty = asRecord(root.banks_by_party) ?? {};

  return {
    indian_companies: recordList(root.indian_companies).map((record): IndianCompany => ({
      kind: 'indian_company',
      name: text(record.name),
      pan: text(record.pan).toUpperCase()
    })),
    foreign_companies: recordList(root.foreign_companies).map((record): ForeignCompany => ({
      kind: 'foreign_company',
      name: text(record.name)
    })),
    banks_by_party: Object.entries(banksByParty).map(([partyName, rows]): [string, BankRow[]] => [
      partyName,
      recordList(rows).map(toBankRow)
    ]),
    nature_map: recordList(root.nature_map).map((record): NatureMapping => ({
      kind: 'nature_mapping',
      invoice_nature: text(record.invoice_nature),
      agreement_nature: text(record.agreement_nature),
      service_category: text(record.service_category),
      purpose_code: text(record.purpose_code)
    })),
    dtaa_rates: recordList(root.dtaa_rates).map((record): DtaaRate => ({
      kind: 'dtaa_rate',
      country: text(record.country),
      article: text(record.article),
      rate: numeric(record.rate)
    }))
  };
}

export function emptyAliasTables(): AliasTables {
  return {
    indian: new Map(),
    foreign: new Map(),
    party: new Map(),
    nature: new Map(),
    country: new Map()
  };
}

/** Alias keys are stored normalized so lookups line up with `normalize`. */
export function parseAliasTables(raw: unknown, filePath: string): AliasTables {
  const root = asRecord(raw);
  if (!root) {
    throw new ReferenceDataError(filePath, 'aliases must contain a JSON object');
  }

  const tables = emptyAliasTables();
  for (const domain of LOOKUP_DOMAINS) {
    const section = asRecord(root[ALIAS_FILE_KEYS[domain]]) ?? {};
    const table = new Map<string, string>();
    for (const [rawKey, target] of Object.entries(section)) {
      const key = normalize(rawKey);
      if (key && typeof target === 'string' && !table.has(key)) {
        table.set(key, target);
      }
    }
    tables[domain] = table;
  }
  return tables;
}

class IndexBuilder<T> {
  readonly entries = new Map<string, T>();

  constructor(
    private readonly domain: LookupDomain,
    private readonly duplicates: DuplicateKey[]
  ) {}

  add(rawKey: string, value: T): void {
    const key = normalize(rawKey);
    if (!key) {
      return;
    }
    if (this.entries.has(key)) {
      this.duplicates.push({ domain: this.domain, key });
      return;
    }
    this.entries.set(key, value);
  }
}

export function buildMasterIndex(
  dataset: MasterDataset,
  aliases: AliasTables = emptyAliasTables()
): MasterIndex {
  const duplicates: DuplicateKey[] = [];
  const indian = new IndexBuilder<IndianCompany>('indian', duplicates);
  const foreign = new IndexBuilder<ForeignCompany>('foreign', duplicates);
  const party = new IndexBuilder<PartyBanks>('party', duplicates);
  const nature = new IndexBuilder<NatureMapping>('nature', duplicates);
  const country = new IndexBuilder<DtaaRate>('country', duplicates);

  for (const company of dataset.indian_companies) {
    indian.add(company.name, company);
  }
  for (const company of dataset.foreign_companies) {
    foreign.add(company.name, company);
  }
  for (const [partyName, rows] of dataset.banks_by_party) {
    party.add(partyName, { party_name: partyName, rows });
  }
  for (const row of dataset.nature_map) {
    const invoiceKey = normalize(row.invoice_nature);
    nature.add(row.invoice_nature, row);
    // Rows whose two natures normalize alike are indexed once.
    if (normalize(row.agreement_nature) !== invoiceKey) {
      nature.add(row.agreement_nature, row);
    }
  }
  for (const rate of dataset.dtaa_rates) {
    country.add(rate.country, rate);
  }

  return Object.freeze({
    indian: indian.entries,
    foreign: foreign.entries,
    party: party.entries,
    nature: nature.entries,
    country: country.entries,
    aliases,
    duplicates: Object.freeze(duplicates)
  });
}

async function readJson(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, 'utf8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ReferenceDataError(filePath, `is not valid JSON: ${message}`);
  }
}

export async function loadMasterDataset(filePath: string = masterDataPath()): Promise<MasterDataset> {
  if (!(await fs.pathExists(filePath))) {
    throw new ReferenceDataError(filePath, 'master data file not found');
  }
  return parseMasterDataset(await readJson(filePath), filePath);
}

export async function loadAliasTables(filePath: string = aliasesPath()): Promise<AliasTables> {
  if (!(await fs.pathExists(filePath))) {
    return emptyAliasTables();
  }
  return parseAliasTables(await readJson(filePath), filePath);
}

/** Normalized bank name to the form's bank code; missing file means no codes. */
export async function loadBankCodeLookup(
  filePath: string = bankCodesPath()
): Promise<Record<string, string>> {
  if (!(await fs.pathExists(filePath))) {
    return {};
  }

  const root = asRecord(await readJson(filePath));
  if (!root) {
    throw new ReferenceDataError(filePath, 'bank codes must contain a JSON object');
  }

  const lookup: Record<string, string> = {};
  for (const [bankName, code] of Object.entries(root)) {
    const key = normalize(bankName);
    const value = text(code);
    if (key && value) {
      lookup[key] = value;
    }
  }
  return lookup;
}

export interface MasterIndexSources {
  masterPath?: string;
  aliasesPath?: string;
}

const cache = new Map<string, Promise<MasterIndex>>();

export function loadMasterIndex(sources: MasterIndexSources = {}): Promise<MasterIndex> {
  const masterFile = sources.masterPath ?? masterDataPath();
  const aliasFile = sources.aliasesPath ?? aliasesPath();
  const cacheKey = `${masterFile}\u0000${aliasFile}`;

  const cached = cache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const pending = Promise.all([loadMasterDataset(masterFile), loadAliasTables(aliasFile)])
    .then(([dataset, aliases]) => buildMasterIndex(dataset, aliases))
    .catch((error: unknown) => {
      // A failed build is not memoized.
      cache.delete(cacheKey);
      throw error;
    });
  cache.set(cacheKey, pending);
  return pending;
}

export function clearMasterIndexCache(): void {
  cache.clear();
}
