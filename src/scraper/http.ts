import type { Logger } from '../lib/logger.js'
import { HttpStatusError, MissingRedirectError } from './errors.js'
import type { ResponseReader, Session } from './session.js'
import type { QueryParams, Scope } from './types.js'

export const BASE_DOMAIN = 'sdamgia.ru'

export const buildBaseUrl = (scope: Scope) =>
  `https://${scope.subject}-${scope.examType}.${BASE_DOMAIN}`

export const buildUrl = (scope: Scope, pathOrUrl: string, params: QueryParams = {}) => {
  const url = new URL(pathOrUrl, buildBaseUrl(scope))
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.append(key, String(value))
  }
  return url
}

const isRedirectStatus = (status: number) => status >= 300 && status < 400

// Releases the connection of a response whose body is never read.
const discardBody = async (response: Response) => {
  await response.body?.cancel()
}

export class RequestExecutor {
  constructor(
    private readonly session: Session,
    private readonly logger: Logger,
  ) {}

  fetchHtml(scope: Scope, pathOrUrl: string, params?: QueryParams) {
    return this.send(buildUrl(scope, pathOrUrl, params), (response) => response.text())
  }

  fetchBytes(url: string) {
    // Absolute URLs ignore the base, so any scope works here.
    return this.send(new URL(url), async (response) =>
      Buffer.from(await response.arrayBuffer()),
    )
  }

  fetchRedirectTarget(scope: Scope, path: string, params?: QueryParams) {
    const url = buildUrl(scope, path, params)
    return this.session.request(
      url,
      async (response) => {
        this.logger.debug({ status: response.status, url: url.toString() }, 'Sent GET request')
        await discardBody(response)

        if (!response.ok && !isRedirectStatus(response.status)) {
          throw new HttpStatusError(response.status, url.toString())
        }
        const location = response.headers.get('location')
        if (!location) {
          throw new MissingRedirectError(url.toString())
        }
        return location
      },
      'manual',
    )
  }

  private send<T>(url: URL, read: ResponseReader<T>) {
    return this.session.request(url, async (response) => {
      this.logger.debug({ status: response.status, url: url.toString() }, 'Sent GET request')
      if (!response.ok) {
        await discardBody(response)
        throw new HttpStatusError(response.status, url.toString())
      }
      return read(response)
    })
  }
}
