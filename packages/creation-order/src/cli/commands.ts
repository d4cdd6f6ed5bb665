import chalk from 'chalk'
import { CreationOrderResolver } from '../creationOrderResolver'
import { InputError } from '../errors'
import { loadExistingRecords, loadNewRecords } from '../io/records'
import { writeBatchFiles } from '../io/batchFiles'
import { createLogger } from '../logger'
import type { CreationOrderResult, ExistingRecord, Logger } from '../types'
import { loadConfig, validateResolveOptions, type CliOptions } from './config'

export type { CliOptions }

export type ResolveCommandDeps = {
  logger?: Logger
}

/**
 * Resolve command - reads the new and existing employee CSVs, prints the
 * creation batches and the dependency summary, and optionally writes them to
 * a directory.
 */
export async function resolveCommand(
  options: CliOptions,
  deps: ResolveCommandDeps = {}
): Promise<void> {
  try {
    const config = loadConfig(options)

    const errors = validateResolveOptions(options, config)
    if (errors.length > 0) {
      for (const error of errors) {
        console.error(chalk.red(`Error: ${error}`))
      }
      process.exit(1)
      return
    }

    const logger = deps.logger ?? createLogger(config.logLevel)
    const loadOptions = { lowercaseUserIds: config.lowercaseUserIds }

    const newRecords = await loadNewRecords(config.newEmployeesCsv, loadOptions)
    const existingRecords: ExistingRecord[] = config.existingEmployeesCsv
      ? await loadExistingRecords(config.existingEmployeesCsv, loadOptions)
      : []

    const resolver = new CreationOrderResolver({ logger })
    const result = resolver.resolve(newRecords, existingRecords)

    if (config.format === 'json') {
      console.log(JSON.stringify(result, null, 2))
    } else {
      outputTextReport(result)
    }

    if (config.outputDir) {
      const files = await writeBatchFiles(config.outputDir, result)
      logger.info({ outputDir: config.outputDir, files: files.length }, 'Wrote creation batches')
    }
  } catch (error) {
    if (error instanceof InputError) {
      console.error(chalk.red(`Error: ${error.message}`))
      process.exit(1)
      return
    }
    throw error
  }
}

function outputTextReport(result: CreationOrderResult): void {
  const { summary } = result

  if (result.batches.length === 0) {
    console.log(chalk.yellow('No new employees to create'))
  }

  for (const batch of result.batches) {
    const ids = batch.records.map((record) => record.userid).join(', ')
    const header = `Batch ${batch.index + 1} (${batch.records.length} employees)`
    if (batch.kind === 'cycle') {
      console.log(chalk.yellow(`${header} [circular dependencies cleared]: ${ids}`))
    } else {
      console.log(`${chalk.blue(header)}: ${ids}`)
    }
  }

  console.log()
  console.log(chalk.bold('Summary'))
  console.log(`  New employees: ${summary.total_new_employees}`)
  console.log(`  Without dependencies: ${summary.employees_with_no_dependencies}`)
  console.log(`  With dependencies: ${summary.employees_with_dependencies}`)
  console.log(`  In cycles: ${summary.employees_in_cycles}`)

  for (const group of result.cycleGroups) {
    console.log(chalk.yellow(`    Cycle: ${group.join(' -> ')}`))
  }
  for (const cleared of result.clearedDependencies) {
    console.log(
      chalk.gray(`    Cleared ${cleared.userid}.${cleared.field} (was ${cleared.cleared_dependency})`)
    )
  }

  console.log(`  Missing dependencies: ${summary.missing_dependency_count}`)
  for (const missing of summary.missing_dependencies) {
    console.log(
      chalk.red(`    ${missing.userid}.${missing.field} -> ${missing.missing_dependency}`)
    )
  }
}
