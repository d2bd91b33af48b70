const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Fill `{name}` placeholders in a selector template. Values are escaped for
 * use inside a double-quoted selector string.
 */
export function formatLocator(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER, (_match, key: string) => {
    const value = values[key]
    if (value === undefined) {
      throw new Error(`No value for {${key}} in selector ${template}`)
    }
    return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')
  })
}
