import type { Cheerio } from 'cheerio'
import type { Element } from 'domhandler'
import type { RequestExecutor } from './http.js'
import { loadPage, type Page } from './page.js'
import { labels, paths, selectors } from './selectors.js'
import { stripPrefix } from './text.js'
import type { CatalogCategory, CatalogEntry, Scope } from './types.js'

const { catalog } = selectors

/** "1. Алгебраические выражения" → ["1", "Алгебраические выражения"] */
export const splitTopicLabel = (label: string): [string, string] => {
  const index = label.indexOf(labels.topicSeparator)
  let topicId = index === -1 ? label : label.slice(0, index)
  const topicName = index === -1 ? '' : label.slice(index + labels.topicSeparator.length)

  if (topicId.startsWith(' ')) {
    topicId = topicId.slice(2)
  }
  topicId = stripPrefix(topicId, labels.topicPrefix)
  return [topicId, topicName]
}

const parseCategories = ($: Page, topic: Cheerio<Element>): CatalogCategory[] =>
  topic
    .find(catalog.children)
    .first()
    .find(catalog.category)
    .map((_index, block) => ({
      categoryId: block.attribs[catalog.categoryIdAttribute] ?? '',
      categoryName: $(block).find(catalog.categoryName).first().text(),
    }))
    .get()

export const parseCatalogPage = (html: string): CatalogEntry[] => {
  const $ = loadPage(html)
  const topLevel = $(catalog.category).filter(
    (_index, block) => $(block).parents(catalog.category).length === 0,
  )

  let pseudoEntrySkipped = false
  const entries: CatalogEntry[] = []
  topLevel.each((_index, block) => {
    if (!pseudoEntrySkipped && block.attribs[catalog.categoryIdAttribute] === undefined) {
      pseudoEntrySkipped = true
      return
    }
    const topic = $(block)
    const [topicId, topicName] = splitTopicLabel(topic.find(catalog.topicName).first().text())
    entries.push({ topicId, topicName, categories: parseCategories($, topic) })
  })
  return entries
}

export const getCatalog = async (executor: RequestExecutor, scope: Scope) =>
  parseCatalogPage(await executor.fetchHtml(scope, paths.catalog))
