/**
 * Everything the extractors assume about the site's markup. When the pages
 * change, this is the file to update.
 */
export const selectors = {
  problem: {
    container: 'div.prob_maindiv',
    label: 'span.prob_nums',
    body: 'div.pbody',
    solution: 'div.solution',
    answer: 'div.answer',
    related: 'div.minor',
    relatedLink: 'a[href]',
    formulaImage: 'img.tex',
    image: 'img',
  },
  listing: {
    label: 'span.prob_nums',
    labelLink: 'a',
  },
  catalog: {
    category: 'div.cat_category',
    topicName: 'b.cat_name',
    children: 'div.cat_children',
    categoryName: 'a.cat_name',
    categoryIdAttribute: 'data-id',
  },
} as const

export const labels = {
  answerPrefix: 'Ответ:',
  topicPrefix: 'Задания ',
  topicSeparator: '. ',
  problemHrefPrefix: '/problem?id=',
} as const

export const paths = {
  problem: '/problem',
  search: '/search',
  test: '/test',
  catalog: '/prob_catalog',
} as const
