/**
 * Tests for the CLI resolve command
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest'
import { writeFileSync, mkdtempSync, rmSync, readFileSync, existsSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { resolveCommand } from '../commands'
import { loadConfig, validateResolveOptions } from '../config'

const mockConsoleLog = vi.fn()
const mockConsoleError = vi.fn()
const mockProcessExit = vi.fn()

vi.stubGlobal('console', {
  ...console,
  log: mockConsoleLog,
  error: mockConsoleError,
})

Object.defineProperty(process, 'exit', {
  value: mockProcessExit,
})

const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }

const ENV_KEYS = [
  'NEW_EMPLOYEES_CSV',
  'EXISTING_EMPLOYEES_CSV',
  'OUTPUT_DIR',
  'LOG_LEVEL',
  'LOWERCASE_USER_IDS',
]

function loggedText(): string {
  return mockConsoleLog.mock.calls.map((call) => call.join(' ')).join('\n')
}

describe('CLI resolve command', () => {
  let tempDir: string
  let newPath: string
  let existingPath: string

  beforeAll(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'resolve-cli-test-'))
    newPath = join(tempDir, 'new.csv')
    existingPath = join(tempDir, 'existing.csv')

    writeFileSync(
      newPath,
      [
        'userid,manager,matrix_manager,hr',
        'A,B,,',
        'B,C,,',
        'C,X,,',
        'D,C,,',
        'E,F,,',
        'F,E,,',
        'G,,,Nobody',
      ].join('\n')
    )
    writeFileSync(existingPath, 'userid\nX\n')
  })

  afterAll(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  beforeEach(() => {
    mockConsoleLog.mockClear()
    mockConsoleError.mockClear()
    mockProcessExit.mockClear()
    for (const key of ENV_KEYS) {
      delete process.env[key]
    }
  })

  describe('validateResolveOptions', () => {
    it('should return no errors for valid options', () => {
      const options = { newEmployees: newPath, format: 'json' }

      expect(validateResolveOptions(options, loadConfig(options))).toEqual([])
    })

    it('should require the new employees file', () => {
      const options = {}

      expect(validateResolveOptions(options, loadConfig(options))).toEqual([
        'New employees CSV is required (--new or NEW_EMPLOYEES_CSV)',
      ])
    })

    it('should reject an unknown format and log level', () => {
      const options = { newEmployees: newPath, format: 'xml', logLevel: 'loud' }

      expect(validateResolveOptions(options, loadConfig(options))).toEqual([
        'Invalid format "xml". Valid formats are: text, json',
        'Invalid log level "loud"',
      ])
    })
  })

  describe('loadConfig', () => {
    it('should fall back to environment variables', () => {
      process.env.NEW_EMPLOYEES_CSV = newPath
      process.env.EXISTING_EMPLOYEES_CSV = existingPath
      process.env.LOWERCASE_USER_IDS = 'true'
      process.env.LOG_LEVEL = 'debug'

      expect(loadConfig({})).toEqual({
        newEmployeesCsv: newPath,
        existingEmployeesCsv: existingPath,
        format: 'text',
        outputDir: undefined,
        lowercaseUserIds: true,
        logLevel: 'debug',
      })
    })

    it('should prefer command line options', () => {
      process.env.NEW_EMPLOYEES_CSV = 'env.csv'
      process.env.LOWERCASE_USER_IDS = 'true'

      const config = loadConfig({ newEmployees: 'cli.csv', lowercaseIds: false, format: 'json' })

      expect(config.newEmployeesCsv).toBe('cli.csv')
      expect(config.lowercaseUserIds).toBe(false)
      expect(config.format).toBe('json')
    })
  })

  it('should print batches and summary as json', async () => {
    await resolveCommand(
      { newEmployees: newPath, existingEmployees: existingPath, format: 'json' },
      { logger }
    )

    expect(mockProcessExit).not.toHaveBeenCalled()
    expect(mockConsoleLog).toHaveBeenCalledTimes(1)

    const output = JSON.parse(String(mockConsoleLog.mock.calls[0][0]))
    expect(output.batches.map((b: { kind: string }) => b.kind)).toEqual([
      'ordered',
      'ordered',
      'ordered',
      'cycle',
    ])
    expect(
      output.batches.map((b: { records: Array<{ userid: string }> }) =>
        b.records.map((r) => r.userid)
      )
    ).toEqual([['C', 'G'], ['B', 'D'], ['A'], ['E', 'F']])
    expect(output.summary).toEqual({
      total_new_employees: 7,
      employees_with_no_dependencies: 2,
      employees_with_dependencies: 5,
      employees_in_cycles: 2,
      cycle_userids: ['E', 'F'],
      missing_dependencies: [{ userid: 'G', field: 'hr', missing_dependency: 'Nobody' }],
      missing_dependency_count: 1,
    })
    expect(output.cycleGroups).toEqual([['E', 'F']])
  })

  it('should print a text report', async () => {
    await resolveCommand({ newEmployees: newPath, existingEmployees: existingPath }, { logger })

    const text = loggedText()
    expect(text).toContain('Batch 1 (2 employees)')
    expect(text).toContain(': C, G')
    expect(text).toContain('Batch 4 (2 employees) [circular dependencies cleared]: E, F')
    expect(text).toContain('  New employees: 7')
    expect(text).toContain('  In cycles: 2')
    expect(text).toContain('    Cycle: E -> F')
    expect(text).toContain('    Cleared E.manager (was F)')
    expect(text).toContain('    G.hr -> Nobody')
  })

  it('should report an unknown manager when existing employees are not given', async () => {
    await resolveCommand({ newEmployees: newPath, format: 'json' }, { logger })

    const output = JSON.parse(String(mockConsoleLog.mock.calls[0][0]))
    expect(output.summary.missing_dependencies).toEqual([
      { userid: 'C', field: 'manager', missing_dependency: 'X' },
      { userid: 'G', field: 'hr', missing_dependency: 'Nobody' },
    ])
  })

  it('should write batch files to the output directory', async () => {
    const outputDir = join(tempDir, 'batches')

    await resolveCommand(
      { newEmployees: newPath, existingEmployees: existingPath, outputDir, format: 'json' },
      { logger }
    )

    expect(existsSync(join(outputDir, 'batch_4.csv'))).toBe(true)
    expect(readFileSync(join(outputDir, 'batch_4.csv'), 'utf-8')).toBe(
      'userid,manager,matrix_manager,hr\nE,,,\nF,,,'
    )
    expect(logger.info).toHaveBeenCalledWith(
      { outputDir, files: 5 },
      'Wrote creation batches'
    )
  })

  it('should exit with an error when the new employees file is missing', async () => {
    await resolveCommand({}, { logger })

    expect(mockConsoleError).toHaveBeenCalledWith(
      expect.stringContaining('New employees CSV is required (--new or NEW_EMPLOYEES_CSV)')
    )
    expect(mockProcessExit).toHaveBeenCalledWith(1)
    expect(mockConsoleLog).not.toHaveBeenCalled()
  })

  it('should exit with an error on duplicate userids', async () => {
    const duplicatePath = join(tempDir, 'duplicate.csv')
    writeFileSync(duplicatePath, 'userid\nA\nA\n')

    await resolveCommand({ newEmployees: duplicatePath }, { logger })

    expect(mockConsoleError).toHaveBeenCalledWith(
      expect.stringContaining('duplicate userid "A" in new records')
    )
    expect(mockProcessExit).toHaveBeenCalledWith(1)
  })

  it('should match userids case-insensitively with --lowercase-ids', async () => {
    const mixedPath = join(tempDir, 'mixed.csv')
    writeFileSync(mixedPath, 'userid,manager\nEmp1,BOSS\nboss,\n')

    await resolveCommand({ newEmployees: mixedPath, lowercaseIds: true, format: 'json' }, { logger })

    const output = JSON.parse(String(mockConsoleLog.mock.calls[0][0]))
    expect(
      output.batches.map((b: { records: Array<{ userid: string }> }) =>
        b.records.map((r) => r.userid)
      )
    ).toEqual([['boss'], ['emp1']])
  })
})
