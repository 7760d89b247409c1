import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import Papa from 'papaparse';

/** Write a header row and `data` rows with PapaParse, creating parent directories. */
export async function writeCsv(filePath: string, fields: readonly string[], data: string[][]): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const csv = Papa.unparse({ fields: [...fields], data }, { newline: '\n' });
  await writeFile(filePath, `${csv}\n`, 'utf-8');
}
