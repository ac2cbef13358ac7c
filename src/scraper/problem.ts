import type { Cheerio } from 'cheerio'
import type { Element } from 'domhandler'
import { ProblemNotFoundError } from './errors.js'
import type { FormulaPipeline } from './formulas.js'
import { BASE_DOMAIN, buildBaseUrl, type RequestExecutor } from './http.js'
import { loadPage, strippedText, uniqueSources, type Page } from './page.js'
import { labels, paths, selectors } from './selectors.js'
import { normalizeText, stripPrefix } from './text.js'
import type { Problem, ProblemPart, Scope } from './types.js'

type ResolveFormulas = (urls: string[]) => Promise<Map<string, string>>

const absolutizeImages = ($: Page, container: Cheerio<Element>, baseUrl: string) => {
  container.find(selectors.problem.image).each((_index, image) => {
    const src = image.attribs.src
    if (!src || src.includes(BASE_DOMAIN)) {
      return
    }
    $(image).attr('src', new URL(src, baseUrl).toString())
  })
}

const parseTopicId = (container: Cheerio<Element>) => {
  const label = container.find(selectors.problem.label).first()
  if (!label.length) {
    return null
  }
  const token = label.text().trim().split(/\s+/)[1]
  if (!token || !/^\d+$/.test(token)) {
    return null
  }
  return Number.parseInt(token, 10)
}

const parseAnswer = (container: Cheerio<Element>) => {
  const block = container.find(selectors.problem.answer).first()
  if (!block.length) {
    return ''
  }
  return stripPrefix(block.text().trimStart(), labels.answerPrefix).trim()
}

const parseAnalogs = ($: Page, container: Cheerio<Element>, problemId: number) => {
  const ids = container
    .find(selectors.problem.related)
    .first()
    .find(selectors.problem.relatedLink)
    .map((_index, link) => $(link).attr('href')?.replace(labels.problemHrefPrefix, '') ?? '')
    .get()
    .filter((value) => /^\d+$/.test(value))
    .map((value) => Number.parseInt(value, 10))
    .filter((id) => id !== problemId)
  return ids.sort((a, b) => a - b)
}

const buildPart = async (
  $: Page,
  block: Cheerio<Element>,
  resolveFormulas: ResolveFormulas | null,
): Promise<ProblemPart> => {
  const formulaLinks = uniqueSources(block.find(selectors.problem.formulaImage))

  let text = ''
  if (resolveFormulas) {
    const recognized = await resolveFormulas(formulaLinks)
    const raw = strippedText(block, (element) => {
      if (!$(element).is(selectors.problem.formulaImage)) {
        return null
      }
      const src = element.attribs.src
      return src ? recognized.get(src) ?? '' : ''
    })
    text = normalizeText(raw)
  }

  const imageLinks = [...formulaLinks]
  for (const src of uniqueSources(block.find(selectors.problem.image))) {
    if (!imageLinks.includes(src)) {
      imageLinks.push(src)
    }
  }

  return { html: $.html(block), imageLinks, text }
}

/**
 * Parses a problem page. Only a missing problem container is fatal; every
 * other field falls back to null or an empty value.
 */
export const parseProblemPage = async (
  html: string,
  context: {
    problemId: number
    scope: Scope
    resolveFormulas: ResolveFormulas | null
  },
): Promise<Problem> => {
  const { problemId, scope, resolveFormulas } = context
  const $ = loadPage(html)

  const container = $(selectors.problem.container).first()
  if (!container.length) {
    throw new ProblemNotFoundError(problemId)
  }

  absolutizeImages($, container, buildBaseUrl(scope))

  const bodies = container.find(selectors.problem.body)
  const conditionBlock = bodies.first()
  let solutionBlock = container.find(selectors.problem.solution).first()
  if (!solutionBlock.length) {
    solutionBlock = bodies.eq(1)
  }

  const condition = conditionBlock.length
    ? await buildPart($, conditionBlock, resolveFormulas)
    : null
  const solution = solutionBlock.length
    ? await buildPart($, solutionBlock, resolveFormulas)
    : null

  return {
    problemId,
    examType: scope.examType,
    subject: scope.subject,
    condition,
    solution,
    answer: parseAnswer(container),
    topicId: parseTopicId(container),
    analogs: parseAnalogs($, container, problemId),
  }
}

export const extractProblem = async (
  executor: RequestExecutor,
  formulas: FormulaPipeline,
  scope: Scope,
  problemId: number,
  recognizeText: boolean,
) => {
  const html = await executor.fetchHtml(scope, paths.problem, { id: problemId })
  return parseProblemPage(html, {
    problemId,
    scope,
    resolveFormulas: recognizeText ? (urls) => formulas.resolve(urls) : null,
  })
}
