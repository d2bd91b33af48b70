export type UrlPattern = string | RegExp
export type UrlPredicate = (url: URL) => boolean
export type UrlMatcher = string | RegExp | UrlPredicate

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')

/**
 * Matches a pathname containing `path` as whole segments: `/login` hits
 * `/login` and `/app/login/`, not `/login-help`. Query and hash are not part
 * of a pathname, so `/login?next=/trading` is never "on" `/trading`.
 */
export function pathPattern(path: string): RegExp {
  return new RegExp(`${escapeRegExp(path)}(?:/|$)`)
}

export function pathMatcher(path: string): UrlPredicate {
  const pattern = pathPattern(path)
  return (url) => pattern.test(url.pathname)
}

/**
 * Paths (leading `/`) become pathname predicates so they work with or without
 * a configured base URL. Absolute URLs and RegExps are used as given.
 */
export function toUrlMatcher(url: UrlPattern): UrlMatcher {
  if (typeof url === 'string' && url.startsWith('/')) return pathMatcher(url)
  return url
}

export function isOnPath(url: string, path: string): boolean {
  return pathMatcher(path)(new URL(url))
}
