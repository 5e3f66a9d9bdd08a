import { beforeEach, describe, expect, it, vi } from 'vitest'

import { JiraRateLimitError } from '../../core/errors/jira-rate-limit-error'
import { makeRequest } from '../../core/api/make-request'
import { createContext } from './context'

describe('makeRequest', () => {
  beforeEach(() => vi.restoreAllMocks())

  it('sets Authorization header when token present', async () => {
    let spy = vi.spyOn(globalThis, 'fetch').mockImplementation((_url, init) => {
      let headers = init?.headers as Record<string, string>
      expect(headers['Authorization']).toBe('Bearer test-token')
      return Promise.resolve(new Response('{}', { status: 200 }))
    })
    await makeRequest(createContext('test-token'), '/path')
    expect(spy).toHaveBeenCalledOnce()
  })

  it('omits Authorization header without token', async () => {
    vi.spyOn(globalThis, 'fetch').mockImplementation((_url, init) => {
      let headers = init?.headers as Record<string, string>
      expect(headers['Authorization']).toBeUndefined()
      expect(headers['Accept']).toBe('application/json')
      return Promise.resolve(new Response('[]', { status: 200 }))
    })
    await expect(makeRequest(createContext(), '/path')).resolves.toEqual([])
  })

  it('appends query parameters', async () => {
    let spy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(new Response('{}', { status: 200 }))

    await makeRequest(createContext(), '/rest/api/2/search', {
      jql: 'project=ARROW AND fixVersion="1.0.0"',
      startAt: '0',
    })

    expect(spy.mock.calls[0]?.[0]).toBe(
      'https://jira.example.com/rest/api/2/search?' +
        'jql=project%3DARROW+AND+fixVersion%3D%221.0.0%22&startAt=0',
    )
  })

  it('maps 429 to a rate limit error', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('Too Many Requests', {
        headers: { 'Retry-After': '30' },
        status: 429,
      }),
    )
    let request = makeRequest(createContext(), '/x')

    await expect(request).rejects.toBeInstanceOf(JiraRateLimitError)
    await expect(request).rejects.toHaveProperty(
      'message',
      'Jira API rate limit exceeded. Retry after 30s',
    )
  })

  it('ignores a retry date it cannot read as seconds', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('Too Many Requests', {
        headers: { 'Retry-After': 'Wed, 21 Oct 2026 07:28:00 GMT' },
        status: 429,
      }),
    )

    await expect(makeRequest(createContext(), '/x')).rejects.toHaveProperty(
      'message',
      'Jira API rate limit exceeded',
    )
  })

  it('reports a rate limit without a retry header', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('Too Many Requests', { status: 429 }),
    )

    await expect(makeRequest(createContext(), '/x')).rejects.toHaveProperty(
      'message',
      'Jira API rate limit exceeded',
    )
  })

  it('throws with status for other failures', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('Not Found', { statusText: 'Not Found', status: 404 }),
    )
    let request = makeRequest(createContext(), '/x')

    await expect(request).rejects.toHaveProperty(
      'message',
      'Jira API error: 404 Not Found',
    )
    await expect(request).rejects.toHaveProperty('status', 404)
  })
})
