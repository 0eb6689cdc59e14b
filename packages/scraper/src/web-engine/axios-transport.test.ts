import { describe, it, expect, vi, beforeEach } from 'vitest'
import { AxiosTransport } from './axios-transport.js'
import { TransportError } from '../utils/errors.js'

const { getMock, createMock } = vi.hoisted(() => {
  const getMock = vi.fn()
  return { getMock, createMock: vi.fn((_config: unknown) => ({ get: getMock })) }
})

vi.mock('axios', () => ({
  default: {
    create: createMock,
    isAxiosError: (error: unknown) =>
      typeof error === 'object' && error !== null && 'isAxiosError' in error
  }
}))

const requestOptions = {
  headers: { 'User-Agent': 'test-agent' },
  timeoutMs: 1234
}

describe('AxiosTransport', () => {
  beforeEach(() => {
    getMock.mockReset()
  })

  it('creates an axios instance that hands back text for every status', () => {
    new AxiosTransport()

    expect(createMock).toHaveBeenLastCalledWith(
      expect.objectContaining({
        maxRedirects: 5,
        responseType: 'text',
        validateStatus: expect.any(Function)
      })
    )
  })

  it('passes headers and timeout through to axios', async () => {
    getMock.mockResolvedValueOnce({ status: 200, data: 'ok', headers: {}, request: {} })

    await new AxiosTransport().get('https://example.com/page', requestOptions)

    expect(getMock).toHaveBeenCalledWith('https://example.com/page', {
      headers: { 'User-Agent': 'test-agent' },
      timeout: 1234
    })
  })

  it('maps a response into status, body, headers and final URL', async () => {
    getMock.mockResolvedValueOnce({
      status: 200,
      data: '<html></html>',
      headers: { 'Content-Type': 'text/html', 'Set-Cookie': ['a=1', 'b=2'] },
      request: { res: { responseUrl: 'https://example.com/final' } }
    })

    const response = await new AxiosTransport().get('https://example.com/page', requestOptions)

    expect(response).toEqual({
      statusCode: 200,
      body: '<html></html>',
      headers: { 'content-type': 'text/html', 'set-cookie': 'a=1, b=2' },
      finalUrl: 'https://example.com/final'
    })
  })

  it('returns error statuses instead of throwing', async () => {
    getMock.mockResolvedValueOnce({ status: 429, data: 'Too Many Requests', headers: {}, request: {} })

    const response = await new AxiosTransport().get('https://example.com/page', requestOptions)

    expect(response.statusCode).toBe(429)
    expect(response.finalUrl).toBe('https://example.com/page')
  })

  it('serializes non-string bodies as JSON', async () => {
    getMock.mockResolvedValueOnce({ status: 200, data: { teams: 20 }, headers: {}, request: {} })

    const response = await new AxiosTransport().get('https://example.com/api', requestOptions)

    expect(response.body).toBe('{"teams":20}')
  })

  it('wraps axios network failures in a TransportError', async () => {
    getMock.mockRejectedValueOnce(
      Object.assign(new Error('timeout of 1234ms exceeded'), {
        isAxiosError: true,
        code: 'ECONNABORTED'
      })
    )

    const failure = await new AxiosTransport()
      .get('https://example.com/page', requestOptions)
      .catch((error: unknown) => error)

    expect(failure).toBeInstanceOf(TransportError)
    if (failure instanceof TransportError) {
      expect(failure.code).toBe('ECONNABORTED')
      expect(failure.isNetworkError).toBe(true)
      expect(failure.message).toBe('timeout of 1234ms exceeded')
    }
  })

  it('rethrows errors that did not come from axios', async () => {
    getMock.mockRejectedValueOnce(new RangeError('unexpected'))

    await expect(
      new AxiosTransport().get('https://example.com/page', requestOptions)
    ).rejects.toBeInstanceOf(RangeError)
  })
})
