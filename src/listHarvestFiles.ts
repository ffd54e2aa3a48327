import { readdir } from 'fs/promises'

export const HARVEST_FILE_INFIX = 'harv_processed'

export async function listHarvestFiles(
  dir: string,
  infix = HARVEST_FILE_INFIX,
): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true })
  return entries
    .filter(e => e.isFile() && e.name.includes(infix))
    .map(e => e.name)
    .sort()
}
