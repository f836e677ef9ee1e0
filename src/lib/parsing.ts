/**
 * Link extraction from note bodies.
 *
 * Only single-line inline links of the form [text](target) are recognized;
 * nested brackets and links broken across lines are not.
 */

/** Matches [text](target) without crossing line breaks */
const MD_LINK_REGEX = /\[([^\]\n]*)\]\(([^)\n]*)\)/g;

/**
 * Inline link found in a note body.
 */
export interface InlineLink {
  /** Display text between the brackets */
  text: string;
  /** Link target between the parentheses */
  target: string;
  /** Character offset in body */
  offset: number;
}

/**
 * Yield inline markdown links in order of appearance.
 * Each call scans the body afresh.
 */
export function* extractLinks(body: string): Generator<InlineLink> {
  for (const match of body.matchAll(MD_LINK_REGEX)) {
    yield {
      text: match[1],
      target: match[2],
      offset: match.index ?? 0,
    };
  }
}

/**
 * Yield the targets of links whose path contains the marker, e.g. "assets".
 * Duplicates are kept.
 */
export function* extractAssetLinks(
  body: string,
  marker: string,
): Generator<string> {
  for (const link of extractLinks(body)) {
    if (link.target.includes(marker)) {
      yield link.target;
    }
  }
}

function decodePath(value: string): string {
  try {
    return decodeURI(value);
  } catch {
    return value;
  }
}

/**
 * Path of an asset relative to the assets directory.
 *
 * Everything up to and including the first `<marker>/` is dropped, so
 * `../assets/img/x.png` becomes `img/x.png`. Percent-escapes are decoded.
 */
export function assetRelativePath(link: string, marker: string): string {
  const prefix = `${marker}/`;
  const at = link.indexOf(prefix);
  const relative = at === -1 ? link : link.slice(at + prefix.length);
  return decodePath(relative);
}
