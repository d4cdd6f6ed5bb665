import { config } from 'dotenv'
import { isLogLevel, type LogLevel } from '../logger'

function getConfigFromEnv(key: string, defaultValue?: string): string {
  const value = process.env[key]
  if (value == null && defaultValue === undefined) {
    throw new Error(`${key} is undefined`)
  }
  return value ?? defaultValue ?? ''
}

export type OutputFormat = 'text' | 'json'

export interface CliOptions {
  /** Path to the new employees CSV */
  newEmployees?: string

  /** Path to the existing employees CSV */
  existingEmployees?: string

  format?: string

  /** Directory to write batch_<n>.csv files and summary.json into */
  outputDir?: string

  lowercaseIds?: boolean

  logLevel?: string
}

export type Config = {
  newEmployeesCsv: string
  existingEmployeesCsv?: string
  format: OutputFormat
  outputDir?: string
  lowercaseUserIds: boolean
  logLevel: LogLevel
}

/**
 * Merge command line options over environment variables (a `.env` file in
 * the working directory is loaded first).
 */
export function loadConfig(options: CliOptions): Config {
  config()

  const logLevel = options.logLevel || getConfigFromEnv('LOG_LEVEL', 'info')
  const format = options.format || 'text'

  return {
    newEmployeesCsv: options.newEmployees || getConfigFromEnv('NEW_EMPLOYEES_CSV', ''),
    existingEmployeesCsv:
      options.existingEmployees || process.env.EXISTING_EMPLOYEES_CSV || undefined,
    format: format === 'json' ? 'json' : 'text',
    outputDir: options.outputDir || process.env.OUTPUT_DIR || undefined,
    lowercaseUserIds:
      options.lowercaseIds ?? getConfigFromEnv('LOWERCASE_USER_IDS', 'false') === 'true',
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
  }
}

/**
 * Returns a list of problems with the given options; empty when they are usable.
 */
export function validateResolveOptions(options: CliOptions, resolved: Config): string[] {
  const errors: string[] = []

  if (!resolved.newEmployeesCsv) {
    errors.push('New employees CSV is required (--new or NEW_EMPLOYEES_CSV)')
  }

  if (options.format && options.format !== 'text' && options.format !== 'json') {
    errors.push(`Invalid format "${options.format}". Valid formats are: text, json`)
  }

  const logLevel = options.logLevel || process.env.LOG_LEVEL
  if (logLevel && !isLogLevel(logLevel)) {
    errors.push(`Invalid log level "${logLevel}"`)
  }

  return errors
}
