import { describe, expect, it } from 'vitest'
import { loadPage, strippedText, uniqueSources } from '../src/scraper/page.js'
import { normalizeText, stripPrefix, wrapFormula } from '../src/scraper/text.js'

describe('normalizeText', () => {
  it('rewrites the typographic minus and drops soft hyphens', () => {
    expect(normalizeText('x − 1 = 0')).toBe('x - 1 = 0')
    expect(normalizeText('пере­нос')).toBe('перенос')
  })

  it('applies compatibility composition', () => {
    expect(normalizeText('ﬁle')).toBe('file')
    expect(normalizeText('x²')).toBe('x2')
    expect(normalizeText('10⁻³')).toBe('10-3')
  })

  it('is idempotent', () => {
    const samples = ['a−b­', 'Ответ: ⁻5', '$x^2$при$x = 3$', '① ½']
    for (const sample of samples) {
      const once = normalizeText(sample)
      expect(normalizeText(once)).toBe(once)
    }
  })
})

describe('text helpers', () => {
  it('wraps recognized formulas as inline math', () => {
    expect(wrapFormula('\\frac{1}{2}')).toBe('$\\frac{1}{2}$')
  })

  it('strips a prefix only when it leads', () => {
    expect(stripPrefix('Ответ: 12', 'Ответ:')).toBe(' 12')
    expect(stripPrefix('12 Ответ:', 'Ответ:')).toBe('12 Ответ:')
  })
})

describe('strippedText', () => {
  it('trims each text node and joins them without separators', () => {
    const $ = loadPage('<div id="t"> <p> Первая  строка </p>\n<p>вторая</p><script>skip()</script></div>')

    expect(strippedText($('#t'))).toBe('Первая  строкавторая')
  })

  it('lets a substitute stand in for an element', () => {
    const $ = loadPage('<div id="t">a <img class="tex" src="1.svg"> b <img src="2.png"></div>')

    const text = strippedText($('#t'), (element) =>
      element.name === 'img' && element.attribs.class === 'tex' ? '$z$' : null,
    )

    expect(text).toBe('a$z$b')
  })
})

describe('uniqueSources', () => {
  it('keeps document order and drops repeats and empty sources', () => {
    const $ = loadPage('<img src="b.svg"><img src="a.svg"><img><img src="b.svg">')

    expect(uniqueSources($('img'))).toEqual(['b.svg', 'a.svg'])
  })
})
