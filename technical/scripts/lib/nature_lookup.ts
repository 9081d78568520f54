import type { MasterDataset } from './master_data.js';

export interface NatureLookupEntry {
  agreement_nature: string;
  service_category: string;
  purpose_code: string;
}

export interface NatureLookups {
  /** Lower-cased agreement nature to RBI purpose code. */
  compact: Record<string, string>;
  full: Record<string, NatureLookupEntry>;
}

/** Later rows overwrite earlier ones that share a lower-cased agreement nature. */
export function buildNatureLookups(dataset: MasterDataset): NatureLookups {
  const compact: Record<string, string> = {};
  const full: Record<string, NatureLookupEntry> = {};

  for (const row of dataset.nature_map) {
    const nature = row.agreement_nature.trim();
    if (!nature) {
      continue;
    }

    const key = nature.toLowerCase();
    const purpose = row.purpose_code.trim();
    if (purpose) {
      compact[key] = purpose;
    }
    full[key] = {
      agreement_nature: nature,
      service_category: row.service_category.trim(),
      purpose_code: purpose
    };
  }

  return { compact, full };
}
