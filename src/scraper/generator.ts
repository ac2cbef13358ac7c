import { getCatalog } from './catalog.js'
import { UnexpectedRedirectError } from './errors.js'
import { buildBaseUrl, type RequestExecutor } from './http.js'
import { paths } from './selectors.js'
import type { PdfOptions, QueryParams, Scope, TestSelection } from './types.js'

export const DEFAULT_TEST_SELECTION: TestSelection = { full: 1 }

export const buildGenerateParams = (selection: TestSelection, topicCount: number) => {
  const params: QueryParams = {}
  if ('full' in selection) {
    for (let topic = 1; topic <= topicCount; topic += 1) {
      params[`prob${topic}`] = selection.full
    }
    return params
  }
  for (const [topic, count] of Object.entries(selection.topics)) {
    params[`prob${topic}`] = count
  }
  return params
}

/** `/test?id=123&nt=True` → 123 */
export const parseTestId = (location: string) => {
  const index = location.indexOf('id=')
  const raw = index === -1 ? '' : location.slice(index + 3).split('&nt')[0] ?? ''
  if (!/^\d+$/.test(raw)) {
    throw new UnexpectedRedirectError(location)
  }
  return Number.parseInt(raw, 10)
}

const flag = (value: boolean | undefined) => (value ? 'True' : 'False')

export const buildPdfParams = (testId: number, options: PdfOptions): QueryParams => ({
  id: testId,
  print: 'true',
  pdf: options.pdfVariant ?? '',
  sol: flag(options.solution),
  num: flag(options.nums),
  ans: flag(options.answers),
  key: flag(options.key),
  crit: flag(options.crit),
  pre: flag(options.instruction),
  dcol: options.col ?? '',
  tt: options.title ?? '',
})

export const generateTest = async (
  executor: RequestExecutor,
  scope: Scope,
  selection: TestSelection = DEFAULT_TEST_SELECTION,
) => {
  const topicCount = 'full' in selection ? (await getCatalog(executor, scope)).length : 0
  const location = await executor.fetchRedirectTarget(
    scope,
    `${paths.test}?a=generate`,
    buildGenerateParams(selection, topicCount),
  )
  return parseTestId(location)
}

export const generatePdf = async (
  executor: RequestExecutor,
  scope: Scope,
  testId: number,
  options: PdfOptions = {},
) => {
  const location = await executor.fetchRedirectTarget(
    scope,
    paths.test,
    buildPdfParams(testId, options),
  )
  return new URL(location, buildBaseUrl(scope)).toString()
}
