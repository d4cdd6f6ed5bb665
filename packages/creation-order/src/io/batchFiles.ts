import fs from 'node:fs/promises'
import path from 'node:path'
import type { CreationOrderResult, NewRecord } from '../types'
import { toCsv } from './csv'

/**
 * Write one `batch_<n>.csv` per creation batch (numbered from 1) and a
 * `summary.json` into `outputDir`. Returns the paths that were written.
 */
export async function writeBatchFiles<T extends NewRecord>(
  outputDir: string,
  result: CreationOrderResult<T>
): Promise<string[]> {
  await fs.mkdir(outputDir, { recursive: true })

  const written: string[] = []
  for (const batch of result.batches) {
    const file = path.join(outputDir, `batch_${batch.index + 1}.csv`)
    await fs.writeFile(file, toCsv(batch.records), 'utf-8')
    written.push(file)
  }

  const summaryFile = path.join(outputDir, 'summary.json')
  const summary = {
    ...result.summary,
    cycle_groups: result.cycleGroups,
    cleared_dependencies: result.clearedDependencies,
  }
  await fs.writeFile(summaryFile, JSON.stringify(summary, null, 2) + '\n', 'utf-8')
  written.push(summaryFile)

  return written
}
