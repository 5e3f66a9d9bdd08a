import type { MockInstance } from 'vitest'

import { beforeEach, afterEach, describe, expect, it, vi } from 'vitest'

import { createIssue } from '../../core/issues/create-issue'
import { printIssues } from '../../cli/print-issues'
import { stripColors } from '../strip-colors'

describe('printIssues', () => {
  let infoSpy: MockInstance

  beforeEach(() => {
    infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {})
  })

  afterEach(() => {
    infoSpy.mockRestore()
  })

  it('sorts by project and number', () => {
    printIssues([
      createIssue({ summary: 'Tenth', key: 'DEMO-10', type: 'Bug' }),
      createIssue({ summary: 'Ninth', key: 'DEMO-9', type: 'Improvement' }),
      createIssue({ summary: 'Third', key: 'ALPHA-3', type: 'Task' }),
    ])

    let lines = infoSpy.mock.calls.map(call => stripColors(String(call[0])))

    expect(lines).toEqual([
      `ALPHA-3 ${'Task'.padEnd(12)} Third`,
      `DEMO-9 ${'Improvement'.padEnd(12)} Ninth`,
      `DEMO-10 ${'Bug'.padEnd(12)} Tenth`,
    ])
  })

  it('reports an empty release', () => {
    printIssues([])

    expect(infoSpy).toHaveBeenCalledOnce()
    expect(infoSpy).toHaveBeenCalledWith(expect.stringContaining('No issues'))
  })
})
