/**
 * A JSON number kept as its source text, for values such as integers beyond
 * 2^53 that do not survive a round trip through a JS `number`.
 */
export class RawJsonNumber {
  constructor(readonly source: string) {}

  toJSON(): string {
    return this.source;
  }

  toString(): string {
    return this.source;
  }
}

const NUMBER_TOKEN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

/**
 * Returns `parsed` unless its source text in `text` would not be reproduced by
 * `JSON.stringify`, in which case the source text is kept instead.
 *
 * `text` must be a valid JSON object whose top-level `key` member parsed to
 * `parsed`.
 */
export function exactNumberMember(
  text: string,
  key: string,
  parsed: number
): number | RawJsonNumber {
  const source = topLevelNumberSource(text, key);
  if (source === undefined || source === JSON.stringify(parsed)) {
    return parsed;
  }
  return new RawJsonNumber(source);
}

/**
 * Source text of the last top-level `key` member of a JSON object, when that
 * member is a number. The last one wins, as with `JSON.parse`.
 */
function topLevelNumberSource(text: string, key: string): string | undefined {
  let depth = 0;
  let found: string | undefined;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (ch === '"') {
      const end = skipString(text, i);
      const colon = skipWhitespace(text, end);
      if (depth === 1 && text[colon] === ":") {
        const valueStart = skipWhitespace(text, colon + 1);
        if (JSON.parse(text.slice(i, end)) === key) {
          NUMBER_TOKEN.lastIndex = valueStart;
          found = NUMBER_TOKEN.exec(text)?.[0];
        }
        i = valueStart;
        continue;
      }
      i = end;
      continue;
    }
    if (ch === "{" || ch === "[") {
      depth++;
    } else if (ch === "}" || ch === "]") {
      depth--;
    }
    i++;
  }

  return found;
}

function skipString(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length) {
    if (text[i] === "\\") {
      i += 2;
    } else if (text[i] === '"') {
      return i + 1;
    } else {
      i++;
    }
  }
  return i;
}

function skipWhitespace(text: string, start: number): number {
  let i = start;
  while (i < text.length && " \t\n\r".includes(text[i])) {
    i++;
  }
  return i;
}
