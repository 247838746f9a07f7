/**
 * Positional attribute names, in their canonical spelling. Matching is
 * case-insensitive; results report both the spelling found in the text and
 * the canonical one used as a lookup key.
 */
export const POSITIONAL_ATTRIBUTES = [
  "x",
  "y",
  "width",
  "height",
  "maxWidth",
  "maxHeight",
  "size",
  "borderSize",
  "spacing",
  "position",
  "pos_x"
] as const;

export type AttributeName = (typeof POSITIONAL_ATTRIBUTES)[number];

const canonicalByLowerCase = new Map<string, AttributeName>(
  POSITIONAL_ATTRIBUTES.map(name => [name.toLowerCase(), name])
);

/**
 * `name = value` where value is one of:
 *   - `{ ... }` up to the first closing brace (no nesting)
 *   - a signed integer or decimal, optionally followed by `%`, that is not the
 *     prefix of a longer token (`10s`, `12@anchor`, `1.2.3`)
 *   - anything else up to the next newline or closing brace
 */
export const ATTRIBUTE_PATTERN = new RegExp(
  String.raw`\b(${POSITIONAL_ATTRIBUTES.join("|")})\b\s*=\s*(\{[^}]+\}|-?\d+(?:\.\d+)?%?(?![\w.@])|[^}\n]+)`,
  "gi"
);

/** `name = number` pairs inside a composite value. */
export const INNER_PAIR_PATTERN = /([A-Za-z_]\w*)\s*=\s*(-?\d+(?:\.\d+)?%?)(?![\w.@])/g;

export interface AttributeMatch {
  /** Attribute name as written in the text. */
  name: string;
  canonicalName: AttributeName;
  rawValue: string;
  /** Offset of the match in the scanned content. */
  index: number;
  /** Offset of `rawValue` in the scanned content. */
  valueIndex: number;
  /** Full matched text, `name`, separator and value. */
  text: string;
}

export interface InnerPairMatch {
  name: string;
  rawValue: string;
  /** Offset of `rawValue` relative to the start of the composite. */
  valueIndex: number;
  text: string;
}

export function canonicalAttributeName(name: string): AttributeName | undefined {
  return canonicalByLowerCase.get(name.toLowerCase());
}

export function isCompositeValue(rawValue: string): boolean {
  const trimmed = rawValue.trim();
  return trimmed.startsWith("{") && trimmed.endsWith("}");
}

/**
 * Yields every positional attribute in `content`, in text order. Matches never
 * overlap: a composite value consumes the pairs inside it.
 */
export function* findAttributes(content: string): Generator<AttributeMatch> {
  const pattern = new RegExp(ATTRIBUTE_PATTERN.source, ATTRIBUTE_PATTERN.flags);
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(content)) !== null) {
    const [text, name, rawValue] = match;
    const canonicalName = canonicalAttributeName(name);
    if (!canonicalName) {
      continue;
    }
    yield {
      name,
      canonicalName,
      rawValue,
      index: match.index,
      valueIndex: match.index + text.length - rawValue.length,
      text
    };
  }
}

export function* findInnerPairs(composite: string): Generator<InnerPairMatch> {
  const pattern = new RegExp(INNER_PAIR_PATTERN.source, INNER_PAIR_PATTERN.flags);
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(composite)) !== null) {
    const [text, name, rawValue] = match;
    yield {
      name,
      rawValue,
      valueIndex: match.index + text.length - rawValue.length,
      text
    };
  }
}
