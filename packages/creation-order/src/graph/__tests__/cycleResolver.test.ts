import { describe, expect, it } from 'vitest'
import { resolveCycles } from '../cycleResolver'
import type { NewRecord } from '../../types'

function byId(records: NewRecord[]): Map<string, NewRecord> {
  return new Map(records.map((record) => [record.userid, record]))
}

describe('resolveCycles', () => {
  it('clears every reference that closes a cycle', () => {
    const records = byId([
      { userid: 'A', manager: 'B' },
      { userid: 'B', manager: 'C' },
      { userid: 'C', manager: 'A' },
    ])

    const result = resolveCycles(['A', 'B', 'C'], records)

    expect(result.records).toEqual([
      { userid: 'A', manager: null },
      { userid: 'B', manager: null },
      { userid: 'C', manager: null },
    ])
    expect(result.cleared).toEqual([
      { userid: 'A', field: 'manager', cleared_dependency: 'B' },
      { userid: 'B', field: 'manager', cleared_dependency: 'C' },
      { userid: 'C', field: 'manager', cleared_dependency: 'A' },
    ])
  })

  it('keeps references to employees outside the group', () => {
    const records = byId([
      { userid: 'A', manager: 'B', matrix_manager: 'S', hr: 'X', department: 'Finance' },
      { userid: 'B', manager: 'A', hr: 'Z' },
    ])

    const result = resolveCycles(['A', 'B'], records)

    expect(result.records).toEqual([
      { userid: 'A', manager: null, matrix_manager: 'S', hr: 'X', department: 'Finance' },
      { userid: 'B', manager: null, hr: 'Z' },
    ])
  })

  it('always clears a self reference', () => {
    const result = resolveCycles(['a'], byId([{ userid: 'a', matrix_manager: 'a', hr: 'h' }]))

    expect(result.records).toEqual([{ userid: 'a', matrix_manager: null, hr: 'h' }])
    expect(result.cleared).toEqual([{ userid: 'a', field: 'matrix_manager', cleared_dependency: 'a' }])
  })

  it('does not modify the input records', () => {
    const original: NewRecord = { userid: 'A', manager: 'B' }
    const records = byId([original, { userid: 'B', manager: 'A' }])

    const result = resolveCycles(['B', 'A'], records)

    expect(original).toEqual({ userid: 'A', manager: 'B' })
    expect(result.records[0]).not.toBe(original)
  })

  it('returns members sorted by userid', () => {
    const records = byId([
      { userid: 'c', manager: 'a' },
      { userid: 'a', manager: 'c' },
    ])

    const result = resolveCycles(['c', 'a'], records)

    expect(result.records.map((r) => r.userid)).toEqual(['a', 'c'])
  })

  it('returns an empty batch when there is nothing left over', () => {
    expect(resolveCycles([], new Map())).toEqual({ records: [], cleared: [] })
  })

  it('throws when a leftover userid has no record', () => {
    expect(() => resolveCycles(['ghost'], new Map())).toThrowError(
      'Cycle member "ghost" is not a known record'
    )
  })
})
