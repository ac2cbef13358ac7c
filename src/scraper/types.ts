export const EXAM_TYPES = ['ege', 'oge'] as const

export type ExamType = (typeof EXAM_TYPES)[number]

export const SUBJECTS = [
  'math',
  'mathb',
  'phys',
  'inf',
  'rus',
  'bio',
  'en',
  'chem',
  'geo',
  'soc',
  'de',
  'fr',
  'lit',
  'sp',
  'hist',
] as const

export type Subject = (typeof SUBJECTS)[number]

export type Scope = {
  examType: ExamType
  subject: Subject
}

export type ScopeOverride = Partial<Scope>

export type QueryParams = Record<string, string | number>

export type ProblemPart = {
  html: string
  imageLinks: string[]
  text: string
}

export type Problem = {
  problemId: number
  examType: ExamType
  subject: Subject
  condition: ProblemPart | null
  solution: ProblemPart | null
  answer: string
  topicId: number | null
  analogs: number[]
}

export type CatalogCategory = {
  categoryId: string
  categoryName: string
}

export type CatalogEntry = {
  topicId: string
  topicName: string
  categories: CatalogCategory[]
}

export type TestSelection =
  | { full: number }
  | { topics: Record<number, number> }

export type PdfVariant = '' | 'h' | 'z' | 'm'

export type PdfOptions = {
  solution?: boolean
  nums?: boolean
  answers?: boolean
  key?: boolean
  crit?: boolean
  instruction?: boolean
  col?: string
  title?: string
  pdfVariant?: PdfVariant
}

export const isExamType = (value: unknown): value is ExamType =>
  EXAM_TYPES.some((examType) => examType === value)

export const isSubject = (value: unknown): value is Subject =>
  SUBJECTS.some((subject) => subject === value)

export const isPdfVariant = (value: unknown): value is PdfVariant =>
  value === '' || value === 'h' || value === 'z' || value === 'm'
