// Set-Cookie values may be folded into one header; split only on commas
// that start a new name=value pair, not on the ones inside Expires dates.
const splitSetCookie = (headerValue: string) => headerValue.split(/,(?=[^;]+=)/)

export class CookieJar {
  private cookies = new Map<string, string>()

  ingest(headers: Headers) {
    const values = headers.getSetCookie()
    if (values.length > 0) {
      values.forEach((cookie) => this.addCookie(cookie))
      return
    }

    const raw = headers.get('set-cookie')
    if (!raw) {
      return
    }
    splitSetCookie(raw).forEach((cookie) => this.addCookie(cookie))
  }

  header() {
    return Array.from(this.cookies.entries())
      .map(([name, value]) => `${name}=${value}`)
      .join('; ')
  }

  clear() {
    this.cookies.clear()
  }

  private addCookie(raw: string) {
    const [pair] = raw.split(';')
    if (!pair) {
      return
    }
    const index = pair.indexOf('=')
    if (index === -1) {
      return
    }
    const name = pair.slice(0, index).trim()
    const value = pair.slice(index + 1).trim()
    if (!name) {
      return
    }
    if (/max-age=0(?:;|$)/i.test(raw.replace(/\s+/g, ''))) {
      this.cookies.delete(name)
      return
    }
    this.cookies.set(name, value)
  }
}
