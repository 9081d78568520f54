import { getRunOptions, toPosixRelative, writeJsonFile } from './lib/io.js';
import { loadMasterDataset } from './lib/master_data.js';
import { buildNatureLookups } from './lib/nature_lookup.js';
import { natureCodesFullPath, natureCodesPath } from './lib/paths.js';

function logLookupUpdate(check: boolean, filePath: string, entryCount: number): void {
  const status = check ? 'Would update' : 'Updated';
  console.log(`${status} ${toPosixRelative(filePath)} (${entryCount} entries)`);
}

async function main(): Promise<void> {
  const options = getRunOptions(process.argv.slice(2));
  const dataset = await loadMasterDataset();
  const { compact, full } = buildNatureLookups(dataset);

  let changes = 0;
  const outputs: Array<[string, Record<string, unknown>]> = [
    [natureCodesPath(), compact],
    [natureCodesFullPath(), full]
  ];

  for (const [filePath, data] of outputs) {
    const result = await writeJsonFile(filePath, data, options);
    if (result.changed) {
      changes += 1;
      logLookupUpdate(options.check, filePath, Object.keys(data).length);
    }
  }

  if (options.check) {
    if (changes > 0) {
      console.error(`\n${changes} lookup file(s) would be updated by build_nature_lookup.ts`);
      process.exit(1);
    }
    console.log('build_nature_lookup.ts check passed.');
    return;
  }

  console.log(`\nDone. ${changes} lookup file(s) updated by build_nature_lookup.ts.`);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
