import { beforeEach, describe, expect, it, vi } from 'vitest'

import { getProjectVersions } from '../../core/api/get-project-versions'
import { formatVersion } from '../../core/versions/format-version'
import { createContext, jsonResponse } from './context'

describe('getProjectVersions', () => {
  beforeEach(() => vi.restoreAllMocks())

  it('parses, filters and sorts versions', async () => {
    let spy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse([
        { releaseDate: '2020-04-20', name: '0.17.0', released: true },
        { name: 'JS-0.4.0', released: true },
        { releaseDate: '2020-07-24', name: '1.0.0', released: true },
        { name: '2.0.0', released: false },
        { releaseDate: '2020-05-18', name: '0.17.1', released: true },
      ]),
    )

    let versions = await getProjectVersions(createContext(), 'ARROW')

    expect(spy.mock.calls[0]?.[0]).toBe(
      'https://jira.example.com/rest/api/2/project/ARROW/versions',
    )
    expect(versions.map(formatVersion)).toEqual([
      '2.0.0',
      '1.0.0',
      '0.17.1',
      '0.17.0',
    ])
    expect(versions[0]).toMatchObject({ releaseDate: null, released: false })
    expect(versions[1]).toMatchObject({
      releaseDate: '2020-07-24',
      released: true,
    })
  })

  it('serves repeated calls from the cache', async () => {
    let spy = vi
      .spyOn(globalThis, 'fetch')
      .mockImplementation(() =>
        Promise.resolve(jsonResponse([{ name: '1.0.0', released: true }])),
      )
    let context = createContext()

    await getProjectVersions(context, 'ARROW')
    await getProjectVersions(context, 'ARROW')

    expect(spy).toHaveBeenCalledOnce()
  })

  it('rejects a payload that is not a list', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({ values: [] }),
    )

    await expect(
      getProjectVersions(createContext(), 'ARROW'),
    ).rejects.toThrowError('Unexpected versions payload for project ARROW')
  })

  it('rejects malformed version records', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse([{ name: '1.0.0' }]),
    )

    await expect(
      getProjectVersions(createContext(), 'ARROW'),
    ).rejects.toThrowError('Unexpected version record in project ARROW')
  })
})
