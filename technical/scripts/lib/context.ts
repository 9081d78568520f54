import { loadBankCodeLookup, loadMasterIndex, type MasterIndex } from './master_data.js';

export interface ReconciliationSources {
  index: MasterIndex;
  bankCodeLookup: Record<string, string>;
}

/** Reference data named by `--master`, `--aliases` and `--bank-codes`, or the defaults. */
export async function loadReconciliationSources(
  options: Map<string, string>
): Promise<ReconciliationSources> {
  const [index, bankCodeLookup] = await Promise.all([
    loadMasterIndex({
      masterPath: options.get('master'),
      aliasesPath: options.get('aliases')
    }),
    loadBankCodeLookup(options.get('bank-codes'))
  ]);
  return { index, bankCodeLookup };
}
