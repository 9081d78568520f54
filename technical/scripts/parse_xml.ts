import path from 'node:path';

import { parseCliOptionMap } from './lib/cli.js';
import { listXmlFiles, toPosixRelative, writeJsonFile } from './lib/io.js';
import { outputDir } from './lib/paths.js';
import { parseXmlFile } from './lib/xml_parser.js';

async function parseOne(xmlPath: string, outPath: string | undefined): Promise<void> {
  const fields = await parseXmlFile(xmlPath);
  console.log(`Parsed ${toPosixRelative(xmlPath)} (${Object.keys(fields).length} fields)`);

  if (!outPath) {
    console.log(JSON.stringify(fields, null, 2));
    return;
  }

  const target = path.resolve(outPath);
  const result = await writeJsonFile(target, fields, { check: false });
  console.log(`${result.changed ? 'Wrote' : 'Unchanged'} ${toPosixRelative(target)}`);
}

async function main(): Promise<void> {
  const options = parseCliOptionMap(process.argv.slice(2));
  const xmlPath = options.get('xml');

  if (xmlPath) {
    await parseOne(path.resolve(xmlPath), options.get('out'));
    return;
  }

  if (options.has('out')) {
    throw new Error("Option '--out' requires '--xml'");
  }

  const rootDir = path.resolve(options.get('output-dir') ?? outputDir());
  const files = await listXmlFiles(rootDir);
  if (files.length === 0) {
    console.log(`No XML documents under ${toPosixRelative(rootDir)}`);
    return;
  }

  for (const rel of files) {
    const fields = await parseXmlFile(path.join(rootDir, rel));
    console.log(`${rel}: ${Object.keys(fields).length} fields`);
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
