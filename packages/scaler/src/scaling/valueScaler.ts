import {
  findAttributes,
  findInnerPairs,
  type AttributeMatch,
  type AttributeName
} from "../matcher/attributes";

/** Returns the factor for an attribute, or null to leave it as written. */
export type FactorResolver = (name: AttributeName) => number | null | undefined;

const PRESERVED_MARKERS = ["%", "@", "10s"] as const;
const NUMERIC_LITERAL = /^-?\d+(?:\.\d+)?$/;

/**
 * Percent-relative, anchor-relative and `-1` ("native size") values carry no
 * absolute pixel measure and are never rescaled.
 */
export function isPreservedValue(rawValue: string): boolean {
  const value = rawValue.trim();
  return value === "-1" || PRESERVED_MARKERS.some(marker => value.includes(marker));
}

export function parseNumericLiteral(rawValue: string): number | null {
  const value = rawValue.trim();
  if (!NUMERIC_LITERAL.test(value)) {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Rounds to the nearest integer with ties away from zero: 2.5 → 3, -2.5 → -3.
 */
export function roundHalfAwayFromZero(value: number): number {
  const rounded = Math.sign(value) * Math.round(Math.abs(value));
  return rounded === 0 ? 0 : rounded;
}

function scaleNumber(rawValue: string, factor: number): string {
  const parsed = parseNumericLiteral(rawValue);
  if (parsed === null) {
    return rawValue;
  }
  const scaled = roundHalfAwayFromZero(parsed * factor);
  return scaled === parsed ? rawValue : String(scaled);
}

function scaleComposite(composite: string, factor: number): string {
  let output = "";
  let cursor = 0;
  for (const pair of findInnerPairs(composite)) {
    if (isPreservedValue(pair.rawValue)) {
      continue;
    }
    output += composite.slice(cursor, pair.valueIndex) + scaleNumber(pair.rawValue, factor);
    cursor = pair.valueIndex + pair.rawValue.length;
  }
  return output + composite.slice(cursor);
}

/**
 * Returns the value text after scaling, or `rawValue` itself when it must stay
 * as written: no factor, identity factor, preserved marker, unbalanced
 * composite, or not a number.
 */
export function scaleValue(rawValue: string, factor: number | null | undefined): string {
  if (factor === null || factor === undefined || factor === 1) {
    return rawValue;
  }
  if (isPreservedValue(rawValue)) {
    return rawValue;
  }
  const trimmed = rawValue.trim();
  if (trimmed.startsWith("{")) {
    return trimmed.endsWith("}") ? scaleComposite(rawValue, factor) : rawValue;
  }
  return scaleNumber(rawValue, factor);
}

/**
 * Scales one attribute and returns it as `name = value`.
 *
 * @example scaleAttribute("x", "17", 0.6) // "x = 10"
 * @example scaleAttribute("size", "{ x = 5 y = 5 }", 2) // "size = { x = 10 y = 10 }"
 */
export function scaleAttribute(name: string, rawValue: string, factor: number | null | undefined): string {
  return `${name} = ${scaleValue(rawValue.trim(), factor)}`;
}

export interface ScaledContent {
  content: string;
  /** Attributes found in the content. */
  matched: number;
  /** Attributes whose value text changed. */
  scaled: number;
}

/**
 * Single pass over `content`: every attribute the matcher finds gets its value
 * span replaced; everything between matches, including the `name = ` prefix,
 * is copied unchanged.
 */
export function scaleContent(content: string, resolveFactor: FactorResolver): ScaledContent {
  let output = "";
  let cursor = 0;
  let matched = 0;
  let scaled = 0;
  for (const attribute of findAttributes(content)) {
    matched += 1;
    const replacement = scaleMatch(attribute, resolveFactor);
    if (replacement === attribute.rawValue) {
      continue;
    }
    scaled += 1;
    output += content.slice(cursor, attribute.valueIndex) + replacement;
    cursor = attribute.valueIndex + attribute.rawValue.length;
  }
  return { content: output + content.slice(cursor), matched, scaled };
}

function scaleMatch(attribute: AttributeMatch, resolveFactor: FactorResolver): string {
  return scaleValue(attribute.rawValue, resolveFactor(attribute.canonicalName));
}
