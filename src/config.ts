import { config } from 'dotenv'
import { isExamType, isSubject, type ExamType, type Subject } from './scraper/types.js'

config()

const parseNumber = (value: string, fallback: number) => {
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? fallback : parsed
}

const parseCorsOrigins = (value: string | undefined) => {
  const fallback = ['http://localhost:5173']
  if (!value) {
    return fallback
  }
  const origins = value
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
  return origins.length > 0 ? origins : fallback
}

const parseExamType = (value: string | undefined): ExamType => {
  const normalized = (value ?? 'ege').trim().toLowerCase()
  if (!isExamType(normalized)) {
    throw new Error(`Unsupported SDAMGIA_EXAM_TYPE: ${value}`)
  }
  return normalized
}

const parseSubject = (value: string | undefined): Subject => {
  const normalized = (value ?? 'math').trim().toLowerCase()
  if (!isSubject(normalized)) {
    throw new Error(`Unsupported SDAMGIA_SUBJECT: ${value}`)
  }
  return normalized
}

export const env = {
  port: parseNumber(process.env.PORT ?? '', 4000),
  serverHost: process.env.SERVER_HOST ?? '0.0.0.0',
  corsOrigins: parseCorsOrigins(process.env.CORS_ORIGIN),
  examType: parseExamType(process.env.SDAMGIA_EXAM_TYPE),
  subject: parseSubject(process.env.SDAMGIA_SUBJECT),
  requestTimeoutMs: Math.max(0, parseNumber(process.env.SDAMGIA_TIMEOUT_MS ?? '', 0)),
  formulaConcurrency: Math.max(1, parseNumber(process.env.FORMULA_CONCURRENCY ?? '', 4)),
  openaiApiKey: process.env.OPENAI_API_KEY ?? '',
  openaiFormulaModel: process.env.OPENAI_FORMULA_MODEL ?? 'gpt-4o',
  scraperDebugDir: process.env.SCRAPER_DEBUG_DIR ?? './.scraper',
}
