import path from 'node:path';

import { parseCliOptionMap, requireOption } from './lib/cli.js';
import { loadReconciliationSources } from './lib/context.js';
import { parseFieldFileFormat, readFieldFile } from './lib/field_files.js';
import { toPosixRelative, writeJsonFile } from './lib/io.js';
import { formatEvent, mergeSuggestions, suggestFromMaster } from './lib/suggestions.js';
import { maskPanForLog } from './lib/validators.js';

async function main(): Promise<void> {
  const options = parseCliOptionMap(process.argv.slice(2));
  const fieldsPath = path.resolve(requireOption(options, 'fields'));
  const fields = await readFieldFile(fieldsPath, parseFieldFileFormat(options.get('format')));
  const { index, bankCodeLookup } = await loadReconciliationSources(options);

  const { suggestions, events } = suggestFromMaster(index, fields, bankCodeLookup);
  for (const event of events) {
    console.log(formatEvent(event));
  }

  for (const [field, value] of Object.entries(suggestions)) {
    const shown = field === 'RemitterPAN' ? maskPanForLog(value) : value;
    console.log(`Suggest ${field} = ${shown}`);
  }

  const outPath = options.get('out');
  if (!outPath) {
    return;
  }

  const target = path.resolve(outPath);
  const result = await writeJsonFile(target, mergeSuggestions(fields, suggestions), { check: false });
  console.log(`${result.changed ? 'Wrote' : 'Unchanged'} ${toPosixRelative(target)}`);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
