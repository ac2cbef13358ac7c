import type { Logger } from '../lib/logger.js'
import type { RequestExecutor } from './http.js'
import { loadPage, type Page } from './page.js'
import { paths, selectors } from './selectors.js'
import type { QueryParams, Scope } from './types.js'

export type IdExtractor<T> = ($: Page) => T[]

/** Trailing number of each problem label ("Задание 1 № 26596" → 26596). */
export const extractNumericIds: IdExtractor<number> = ($) =>
  $(selectors.listing.label)
    .map((_index, label) => $(label).text().trim().split(/\s+/).pop() ?? '')
    .get()
    .filter((token) => /^\d+$/.test(token))
    .map((token) => Number.parseInt(token, 10))

/** Link text inside each problem label, kept verbatim. */
export const extractLabelTexts: IdExtractor<string> = ($) =>
  $(selectors.listing.label)
    .map((_index, label) => {
      const link = $(label).find(selectors.listing.labelLink).first()
      return link.length ? link.text() : null
    })
    .get()

export type PaginatedRequest<T> = {
  path: string
  params: QueryParams
  extract: IdExtractor<T>
}

export const collectPaginated = async <T>(
  executor: RequestExecutor,
  scope: Scope,
  request: PaginatedRequest<T>,
  logger: Logger,
): Promise<T[]> => {
  const collected: T[] = []
  for (let page = 1; ; page += 1) {
    const html = await executor.fetchHtml(scope, request.path, { ...request.params, page })
    const ids = request.extract(loadPage(html))
    if (ids.length === 0) {
      break
    }
    collected.push(...ids)
    logger.debug({ path: request.path, page, found: ids.length }, 'Collected listing page')
  }
  logger.debug({ path: request.path, total: collected.length }, 'Listing exhausted')
  return collected
}

export const searchProblems = (
  executor: RequestExecutor,
  scope: Scope,
  query: string,
  logger: Logger,
) =>
  collectPaginated(
    executor,
    scope,
    { path: paths.search, params: { search: query }, extract: extractNumericIds },
    logger,
  )

export const getThemeProblems = (
  executor: RequestExecutor,
  scope: Scope,
  themeId: number,
  logger: Logger,
) =>
  collectPaginated(
    executor,
    scope,
    { path: paths.test, params: { theme: themeId }, extract: extractLabelTexts },
    logger,
  )

export const getTestProblems = async (
  executor: RequestExecutor,
  scope: Scope,
  testId: number,
) => {
  const html = await executor.fetchHtml(scope, paths.test, { id: testId })
  return extractNumericIds(loadPage(html))
}
