import path from 'node:path';

import { parseCliOptionMap, requireOption } from './lib/cli.js';
import { readFieldFile } from './lib/field_files.js';
import { toPosixRelative } from './lib/io.js';
import { maskPanForLog } from './lib/validators.js';
import { generateXml } from './lib/xml_generator.js';
import { verifyGeneratedXml } from './lib/xml_parser.js';

async function main(): Promise<void> {
  const options = parseCliOptionMap(process.argv.slice(2), ['skip-format-check']);
  const fields = await readFieldFile(path.resolve(requireOption(options, 'fields')));

  const outputPath = await generateXml(fields, {
    templatePath: options.get('template'),
    outputDir: options.get('output-dir'),
    checkFormats: !options.has('skip-format-check')
  });

  const wellFormed = await verifyGeneratedXml(outputPath);
  if (!wellFormed.ok) {
    console.error(
      `Removed ${toPosixRelative(outputPath)}: generated XML is not well-formed (line ${wellFormed.line}): ${wellFormed.message}`
    );
    process.exit(1);
  }

  console.log(
    `Generated ${toPosixRelative(outputPath)} for ${fields.NameRemitter} (PAN ${maskPanForLog(fields.RemitterPAN)})`
  );
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
