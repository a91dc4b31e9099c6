import { OfflineDictionary } from '../src/index';

/**
 * Import a dict.cc dump into ./data and run one query of each kind.
 *
 * Usage: npx tsx examples/example-simple.ts path/to/dictcc.txt
 */

async function main() {
  const path = process.argv[2];
  if (!path) throw new Error('Pass the path of a dict.cc vocabulary file');

  const dictionary = new OfflineDictionary({ databaseDirectory: './data' });

  const counts = await dictionary.importFile(path);
  console.log(`Imported ${counts.a} (A => B) and ${counts.b} (B => A) entries`);

  // Exact headword lookup
  console.log(await dictionary.execute('haus'));

  // Keys starting with "hau"
  console.log(await dictionary.execute(':r:hau', true));

  // Any entry mentioning "house"
  console.log(await dictionary.execute(':f:house', true));

  for (const { label, size } of await dictionary.stats())
    console.log(`${label}: ${size} entries`);
}

main().catch(console.error);
