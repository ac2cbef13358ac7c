const MINUS_SIGN = /\u2212/g
const SOFT_HYPHEN = /\u00ad/g

/** NFKC, then U+2212 to ASCII minus and soft hyphens removed. */
export const normalizeText = (value: string) =>
  value.normalize('NFKC').replace(MINUS_SIGN, '-').replace(SOFT_HYPHEN, '')

export const wrapFormula = (text: string) => `$${text}$`

export const stripPrefix = (value: string, prefix: string) =>
  value.startsWith(prefix) ? value.slice(prefix.length) : value
