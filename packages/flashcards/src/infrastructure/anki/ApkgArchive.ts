import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import AdmZip from 'adm-zip';
import { errorMessage } from '@unitbatch/core';
import { AnkiPackageError } from '../../domain/errors.js';

/** Collection database names, in the order they are looked up. */
export const COLLECTION_ENTRIES = ['collection.anki2', 'collection.anki21'] as const;

/**
 * Extract the collection database of an `.apkg` archive into `workDir`.
 * Resolves with the path of the extracted database file.
 */
export async function extractCollection(apkgPath: string, workDir: string): Promise<string> {
  let zip: AdmZip;
  try {
    zip = new AdmZip(apkgPath);
  } catch (error) {
    throw new AnkiPackageError(`Cannot open ${apkgPath}: ${errorMessage(error)}`, { cause: error });
  }

  for (const name of COLLECTION_ENTRIES) {
    const entry = zip.getEntry(name);
    if (!entry) continue;

    const target = join(workDir, name);
    await writeFile(target, entry.getData());
    return target;
  }
  throw new AnkiPackageError(`No collection database found in ${apkgPath}`);
}
