#!/usr/bin/env node

import { Command } from 'commander'
import pkg from '../../package.json' with { type: 'json' }
import { resolveCommand } from './commands'

const program = new Command()

program
  .name('creation-order')
  .description('Plan the order in which new employees can be created')
  .version(pkg.version)

program
  .command('resolve')
  .description('Group new employees into dependency-ordered creation batches')
  .option('--new <path>', 'New employees CSV (or NEW_EMPLOYEES_CSV env)')
  .option('--existing <path>', 'Existing employees CSV (or EXISTING_EMPLOYEES_CSV env)')
  .option('--format <format>', 'Output format: text or json', 'text')
  .option('--output-dir <dir>', 'Write batch_<n>.csv files and summary.json here (or OUTPUT_DIR env)')
  .option('--lowercase-ids', 'Match userids case-insensitively (or LOWERCASE_USER_IDS env)')
  .option('--log-level <level>', 'Log level (or LOG_LEVEL env)')
  .action(async (options) => {
    await resolveCommand({
      newEmployees: options.new,
      existingEmployees: options.existing,
      format: options.format,
      outputDir: options.outputDir,
      lowercaseIds: options.lowercaseIds,
      logLevel: options.logLevel,
    })
  })

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})
