import { Router } from 'express'
import { BadRequestError } from '../middleware/error.js'
import type { SdamGiaClient } from '../scraper/client.js'
import {
  isExamType,
  isPdfVariant,
  isSubject,
  type PdfOptions,
  type ScopeOverride,
  type TestSelection,
} from '../scraper/types.js'

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === 'string' && value.trim().length > 0

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const parseId = (value: unknown, name: string) => {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new BadRequestError(`${name} must be a positive integer.`)
  }
  return Number.parseInt(value, 10)
}

const parseCount = (value: unknown, name: string) => {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new BadRequestError(`${name} must be a non-negative integer.`)
  }
  return value
}

const parseScope = (query: Record<string, unknown>): ScopeOverride => {
  const scope: ScopeOverride = {}
  if (query.examType !== undefined) {
    if (!isExamType(query.examType)) {
      throw new BadRequestError('Unsupported examType.')
    }
    scope.examType = query.examType
  }
  if (query.subject !== undefined) {
    if (!isSubject(query.subject)) {
      throw new BadRequestError('Unsupported subject.')
    }
    scope.subject = query.subject
  }
  return scope
}

const parseSelection = (body: unknown): TestSelection | undefined => {
  if (body === undefined || (isRecord(body) && Object.keys(body).length === 0)) {
    return undefined
  }
  if (!isRecord(body)) {
    throw new BadRequestError('Body must be an object.')
  }
  if (body.full !== undefined) {
    return { full: parseCount(body.full, 'full') }
  }
  if (isRecord(body.topics)) {
    const topics: Record<number, number> = {}
    for (const [topic, count] of Object.entries(body.topics)) {
      topics[parseId(topic, 'Topic number')] = parseCount(count, `topics.${topic}`)
    }
    return { topics }
  }
  throw new BadRequestError('Provide either full or topics.')
}

const BOOLEAN_PDF_OPTIONS = ['solution', 'nums', 'answers', 'key', 'crit', 'instruction'] as const

const parsePdfOptions = (body: unknown): PdfOptions => {
  const input = isRecord(body) ? body : {}
  const options: PdfOptions = {}

  for (const name of BOOLEAN_PDF_OPTIONS) {
    const value = input[name]
    if (value === undefined) {
      continue
    }
    if (typeof value !== 'boolean') {
      throw new BadRequestError(`${name} must be a boolean.`)
    }
    options[name] = value
  }
  for (const name of ['col', 'title'] as const) {
    const value = input[name]
    if (value === undefined) {
      continue
    }
    if (typeof value !== 'string') {
      throw new BadRequestError(`${name} must be a string.`)
    }
    options[name] = value
  }
  if (input.pdfVariant !== undefined) {
    if (!isPdfVariant(input.pdfVariant)) {
      throw new BadRequestError('pdfVariant must be one of "", "h", "z", "m".')
    }
    options.pdfVariant = input.pdfVariant
  }
  return options
}

export const createSdamGiaRouter = (client: SdamGiaClient) => {
  const router = Router()

  router.get('/problems/:id', async (req, res, next) => {
    try {
      const problemId = parseId(req.params.id, 'Problem id')
      const recognize = req.query.recognize
      const problem = await client.getProblem(problemId, {
        scope: parseScope(req.query),
        recognizeText: recognize === 'true' || recognize === '1',
      })
      return res.json({ problem })
    } catch (error) {
      return next(error)
    }
  })

  router.get('/search', async (req, res, next) => {
    try {
      const query = req.query.q
      if (!isNonEmptyString(query)) {
        throw new BadRequestError('Query parameter q is required.')
      }
      const ids = await client.search(query.trim(), { scope: parseScope(req.query) })
      return res.json({ ids })
    } catch (error) {
      return next(error)
    }
  })

  router.get('/tests/:id', async (req, res, next) => {
    try {
      const testId = parseId(req.params.id, 'Test id')
      const ids = await client.getTest(testId, { scope: parseScope(req.query) })
      return res.json({ ids })
    } catch (error) {
      return next(error)
    }
  })

  router.get('/themes/:id', async (req, res, next) => {
    try {
      const themeId = parseId(req.params.id, 'Theme id')
      const ids = await client.getTheme(themeId, { scope: parseScope(req.query) })
      return res.json({ ids })
    } catch (error) {
      return next(error)
    }
  })

  router.get('/catalog', async (req, res, next) => {
    try {
      const catalog = await client.getCatalog({ scope: parseScope(req.query) })
      return res.json({ catalog })
    } catch (error) {
      return next(error)
    }
  })

  router.post('/tests/generate', async (req, res, next) => {
    try {
      const selection = parseSelection(req.body)
      const testId = await client.generateTest(selection, { scope: parseScope(req.query) })
      return res.status(201).json({ testId })
    } catch (error) {
      return next(error)
    }
  })

  router.post('/tests/:id/pdf', async (req, res, next) => {
    try {
      const testId = parseId(req.params.id, 'Test id')
      const url = await client.generatePdf(testId, parsePdfOptions(req.body), {
        scope: parseScope(req.query),
      })
      return res.status(201).json({ url })
    } catch (error) {
      return next(error)
    }
  })

  return router
}
