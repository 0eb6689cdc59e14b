import axios, { type AxiosInstance } from 'axios'
import https from 'https'
import http from 'http'
import { TransportError } from '../utils/errors.js'
import type { HttpTransport, TransportRequestOptions, TransportResponse } from './types.js'

type AxiosTransportOptions = {
  maxRedirects?: number
  maxSockets?: number
}

/**
 * Axios-based transport. Keeps connections alive between paced requests and
 * hands every HTTP status back to the caller instead of throwing.
 */
export class AxiosTransport implements HttpTransport {
  private readonly axiosInstance: AxiosInstance

  constructor(options: AxiosTransportOptions = {}) {
    const agentOptions = {
      keepAlive: true,
      keepAliveMsecs: 1000,
      maxSockets: options.maxSockets ?? 1,
      maxFreeSockets: 1
    }

    this.axiosInstance = axios.create({
      maxRedirects: options.maxRedirects ?? 5,
      // Status classification belongs to the retry strategy
      validateStatus: () => true,
      responseType: 'text',
      httpsAgent: new https.Agent(agentOptions),
      httpAgent: new http.Agent(agentOptions)
    })
  }

  async get(url: string, options: TransportRequestOptions): Promise<TransportResponse> {
    try {
      const response = await this.axiosInstance.get<unknown>(url, {
        headers: options.headers,
        timeout: options.timeoutMs
      })

      const responseUrl: unknown = response.request?.res?.responseUrl

      return {
        statusCode: response.status,
        body: stringifyBody(response.data),
        headers: normalizeHeaders(response.headers),
        finalUrl: typeof responseUrl === 'string' ? responseUrl : url
      }
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new TransportError(error.message, { code: error.code, cause: error })
      }

      throw error
    }
  }
}

function stringifyBody(data: unknown): string {
  if (typeof data === 'string') {
    return data
  }

  return data === undefined || data === null ? '' : JSON.stringify(data)
}

function normalizeHeaders(headers: object): Record<string, string> {
  const normalized: Record<string, string> = {}

  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      normalized[key.toLowerCase()] = value
    } else if (typeof value === 'number') {
      normalized[key.toLowerCase()] = String(value)
    } else if (Array.isArray(value)) {
      normalized[key.toLowerCase()] = value.map(String).join(', ')
    }
  }

  return normalized
}

export type { AxiosTransportOptions }
