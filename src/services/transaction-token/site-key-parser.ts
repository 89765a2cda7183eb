/**
 * Extraction of the verification material embedded in the platform's home
 * document. Attribute order inside a tag is not fixed, so each tag is
 * matched first and its attributes read separately.
 */

const TAG_PATTERN = (tag: string) => new RegExp(`<${tag}\\b[^>]*>`, 'gi')

function readAttribute(tag: string, name: string): string | null {
  const match = new RegExp(
    `(?:^|\\s)${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)'|([^\\s>]+))`,
    'i',
  ).exec(tag)
  if (!match) return null
  return match[1] ?? match[2] ?? match[3] ?? null
}

function findTagAttribute(
  html: string,
  tag: string,
  keyAttribute: string,
  keyValue: string,
  valueAttribute: string,
): string | null {
  for (const [element] of html.matchAll(TAG_PATTERN(tag))) {
    const key = readAttribute(element, keyAttribute)
    if (key !== null && key.toLowerCase() === keyValue.toLowerCase()) {
      const value = readAttribute(element, valueAttribute)
      if (value) return value
    }
  }
  return null
}

/**
 * Returns the `content` of `<meta name="...">`, or null.
 */
export function extractMetaContent(html: string, name: string): string | null {
  return findTagAttribute(html, 'meta', 'name', name, 'content')
}

/**
 * Returns the `href` of `<link rel="...">`, or null.
 */
export function extractLinkHref(html: string, rel: string): string | null {
  return findTagAttribute(html, 'link', 'rel', rel, 'href')
}

/**
 * Collects the byte indices listed in the marker resource as `[n]`
 * occurrences, in order of first appearance, keeping only indices inside a
 * key of `keyLength` bytes.
 */
export function extractIndices(marker: string, keyLength: number): number[] {
  const indices: number[] = []
  for (const match of marker.matchAll(/\[(\d{1,4})\]/g)) {
    const index = Number.parseInt(match[1], 10)
    if (index < keyLength && !indices.includes(index)) indices.push(index)
  }
  return indices
}
