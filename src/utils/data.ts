import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import type { z } from 'zod'

/**
 * Absolute path of a bundled data file (same depth from src/ and dist/)
 */
export function dataPath(name: string): string {
  return fileURLToPath(new URL(`../../data/${name}`, import.meta.url))
}

/**
 * Read and validate a bundled JSON table. Called once per table at module load.
 */
export function loadDataFile<S extends z.ZodTypeAny>(name: string, schema: S): z.output<S> {
  const raw: unknown = JSON.parse(readFileSync(dataPath(name), 'utf-8'))
  return schema.parse(raw)
}
