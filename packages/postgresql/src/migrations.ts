import { readFile } from 'node:fs/promises';

/** SQL creating every table the storage uses. */
export const initialMigrationUrl = new URL('../migrations/0000_initial.sql', import.meta.url);

export async function readInitialMigration(): Promise<string> {
  return await readFile(initialMigrationUrl, 'utf8');
}
