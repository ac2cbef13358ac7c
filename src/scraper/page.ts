import { load, type Cheerio, type CheerioAPI } from 'cheerio'
import { isTag, isText, type AnyNode, type Element } from 'domhandler'

export type Page = CheerioAPI

export const loadPage = (html: string): Page => load(html)

const SKIPPED_TAGS = new Set(['script', 'style'])

/**
 * Text of every text node under the element, each trimmed, joined with no
 * separator. `substitute` may replace an element (and its subtree) with a
 * string of its own.
 */
export const strippedText = (
  root: Cheerio<Element>,
  substitute?: (element: Element) => string | null,
) => {
  const parts: string[] = []

  const visit = (node: AnyNode) => {
    if (isText(node)) {
      const trimmed = node.data.trim()
      if (trimmed) {
        parts.push(trimmed)
      }
      return
    }
    if (!isTag(node) || SKIPPED_TAGS.has(node.name)) {
      return
    }
    const replacement = substitute?.(node)
    if (replacement !== undefined && replacement !== null) {
      const trimmed = replacement.trim()
      if (trimmed) {
        parts.push(trimmed)
      }
      return
    }
    node.children.forEach(visit)
  }

  root.each((_index, element) => {
    element.children.forEach(visit)
  })
  return parts.join('')
}

/** `src` values of the matched images in document order, each once. */
export const uniqueSources = (images: Cheerio<Element>) => {
  const seen = new Set<string>()
  images.each((_index, image) => {
    const src = image.attribs.src
    if (src) {
      seen.add(src)
    }
  })
  return Array.from(seen)
}
