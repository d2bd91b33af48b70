export const Tag = {
  Smoke: '@smoke',
  Regression: '@regression',
  Auth: '@auth',
  Login: '@login',
  Dashboard: '@dashboard',
  Trading: '@trading',
  Portfolio: '@portfolio',
  Watchlist: '@watchlist',
  Trades: '@trades',
} as const

export type Tag = (typeof Tag)[keyof typeof Tag]

const knownTags: ReadonlySet<string> = new Set(Object.values(Tag))

export function toTag(name: string): Tag {
  const trimmed = name.trim()
  const tag = trimmed.startsWith('@') ? trimmed : `@${trimmed}`
  for (const known of Object.values(Tag)) {
    if (known === tag) return known
  }
  throw new Error(`Unknown test tag "${name}". Known tags: ${[...knownTags].join(', ')}`)
}

/** Tests tagged `@login` exercise the sign-in flow themselves and must start signed out. */
export function requiresAuthenticatedSession(tags: readonly string[]): boolean {
  return !tags.includes(Tag.Login)
}

/** Trading tests keep the authenticated cookies between tests. */
export function preservesStorage(tags: readonly string[]): boolean {
  return tags.includes(Tag.Trading)
}

/**
 * A `grep` for Playwright that selects tests carrying every one of `names`
 * (`smoke,auth` → tests tagged both `@smoke` and `@auth`).
 */
export function tagFilter(names: readonly string[]): RegExp {
  if (names.length === 0) throw new Error('tagFilter needs at least one tag')
  const lookaheads = names.map((name) => `(?=.*${toTag(name)}(?![\\w-]))`)
  return new RegExp(`^${lookaheads.join('')}`)
}
