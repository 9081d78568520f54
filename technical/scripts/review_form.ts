import path from 'node:path';

import { parseCliOptionMap, requireOption } from './lib/cli.js';
import { loadReconciliationSources } from './lib/context.js';
import { parseFieldFileFormat, readFieldFile } from './lib/field_files.js';
import { formatDdMmmYyyy, parseFormDate } from './lib/form_fields.js';
import { toPosixRelative, writeJsonFile } from './lib/io.js';
import { reviewFields } from './lib/review.js';
import { terminalReviewPrompts } from './lib/review_prompts.js';
import { formatEvent } from './lib/suggestions.js';
import { generateXml } from './lib/xml_generator.js';

async function main(): Promise<void> {
  const options = parseCliOptionMap(process.argv.slice(2));
  const fields = await readFieldFile(
    path.resolve(requireOption(options, 'fields')),
    parseFieldFileFormat(options.get('format'))
  );
  const sources = await loadReconciliationSources(options);

  const review = await reviewFields(terminalReviewPrompts, fields, sources);
  for (const event of review.events) {
    console.log(formatEvent(event));
  }
  console.log(`Applied ${review.applied.length} suggestion(s)`);

  const proposed = parseFormDate(review.fields.PropDateRem);
  if (proposed) {
    console.log(`Proposed remittance date: ${formatDdMmmYyyy(proposed)}`);
  }

  const savePath = options.get('save');
  if (savePath) {
    const target = path.resolve(savePath);
    await writeJsonFile(target, review.fields, { check: false });
    console.log(`Saved reviewed fields to ${toPosixRelative(target)}`);
  }

  if (!(await terminalReviewPrompts.confirmGenerate())) {
    return;
  }

  const outputPath = await generateXml(review.fields, {
    templatePath: options.get('template'),
    outputDir: options.get('output-dir')
  });
  console.log(`Generated ${toPosixRelative(outputPath)}`);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
