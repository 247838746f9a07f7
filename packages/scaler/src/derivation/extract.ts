import { findAttributes, findInnerPairs, isCompositeValue, type AttributeName } from "../matcher/attributes";
import { isPreservedValue, parseNumericLiteral } from "../scaling/valueScaler";

export type PositionalValues = Map<AttributeName, number[]>;

function numericValue(rawValue: string): number | null {
  return isPreservedValue(rawValue) ? null : parseNumericLiteral(rawValue);
}

/**
 * Numeric occurrences per attribute, in order of first appearance. A composite
 * contributes its inner numbers, in order, to the outer attribute, matching
 * how a stored factor for that attribute is later applied to the whole
 * composite. Preserved and non-numeric values are left out.
 */
export function extractPositionalValues(content: string): PositionalValues {
  const values: PositionalValues = new Map();
  const push = (name: AttributeName, value: number | null) => {
    if (value === null) {
      return;
    }
    const list = values.get(name);
    if (list) {
      list.push(value);
    } else {
      values.set(name, [value]);
    }
  };

  for (const attribute of findAttributes(content)) {
    if (isCompositeValue(attribute.rawValue)) {
      for (const pair of findInnerPairs(attribute.rawValue)) {
        push(attribute.canonicalName, numericValue(pair.rawValue));
      }
      continue;
    }
    push(attribute.canonicalName, numericValue(attribute.rawValue));
  }
  return values;
}
