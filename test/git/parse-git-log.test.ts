import { describe, expect, it } from 'vitest'

import {
  RECORD_SEPARATOR,
  FIELD_SEPARATOR,
  parseGitLog,
} from '../../core/git/parse-git-log'

function entry(hexsha: string, parents: string, message: string): string {
  return `${hexsha}${FIELD_SEPARATOR}${parents}${FIELD_SEPARATOR}${message}${RECORD_SEPARATOR}`
}

describe('parseGitLog', () => {
  it('returns nothing for empty output', () => {
    expect(parseGitLog('')).toEqual([])
    expect(parseGitLog('\n')).toEqual([])
  })

  it('parses consecutive entries', () => {
    let output =
      entry('aaa', 'bbb', '[C++] First\n\nBody\n') +
      '\n' +
      entry('bbb', 'ccc ddd', 'ARROW-1: [R] Second\n') +
      '\n'

    expect(parseGitLog(output)).toEqual([
      { message: '[C++] First\n\nBody', parents: ['bbb'], hexsha: 'aaa' },
      {
        message: 'ARROW-1: [R] Second',
        parents: ['ccc', 'ddd'],
        hexsha: 'bbb',
      },
    ])
  })

  it('handles root commits without parents', () => {
    expect(parseGitLog(entry('aaa', '', 'Initial commit\n'))).toEqual([
      { message: 'Initial commit', hexsha: 'aaa', parents: [] },
    ])
  })
})
