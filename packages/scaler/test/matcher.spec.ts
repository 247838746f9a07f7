import { describe, expect, it } from "vitest";
import {
  canonicalAttributeName,
  findAttributes,
  findInnerPairs,
  isCompositeValue
} from "../src/matcher/attributes";

describe("findAttributes", () => {
  it("finds scalar, percentage and composite values in text order", () => {
    const content = "x = 10\nwidth = 50%\nMAXWIDTH = 200\nsize = { x = 5 y = 6 }\n";
    const found = [...findAttributes(content)];

    expect(found.map(match => [match.name, match.canonicalName, match.rawValue])).toEqual([
      ["x", "x", "10"],
      ["width", "width", "50%"],
      ["MAXWIDTH", "maxWidth", "200"],
      ["size", "size", "{ x = 5 y = 6 }"]
    ]);
  });

  it("reports the offset of the value inside the content", () => {
    const [match] = [...findAttributes("  y   =  42\n")];

    expect(match.index).toBe(2);
    expect(match.valueIndex).toBe(9);
    expect(match.text).toBe("y   =  42");
  });

  it("matches a composite spanning several lines as one value", () => {
    const [match] = [...findAttributes("position = {\n\tx = 1\n\ty = 2\n}\n")];

    expect(match.rawValue).toBe("{\n\tx = 1\n\ty = 2\n}");
  });

  it("keeps unit-suffixed and anchored numbers as text values", () => {
    const found = [...findAttributes("x = 10s\ny = 12@anchor\n")];

    expect(found.map(match => match.rawValue)).toEqual(["10s", "12@anchor"]);
  });

  it("does not match attribute names embedded in longer words", () => {
    expect([...findAttributes("maxWidthLimit = 3\nguiTypes = {\nindex = 4\n")]).toEqual([]);
  });

  it("matches pos_x and borderSize as whole names", () => {
    const found = [...findAttributes("pos_x = 3\nborderSize = { x = 2 y = 2 }\n")];

    expect(found.map(match => match.canonicalName)).toEqual(["pos_x", "borderSize"]);
  });

  it("reads an unterminated brace as text up to the end of the line", () => {
    const [match] = [...findAttributes("size = { x = 5\n")];

    expect(match.rawValue).toBe("{ x = 5");
    expect(isCompositeValue(match.rawValue)).toBe(false);
  });
});

describe("findInnerPairs", () => {
  it("yields every name = number pair with its offset", () => {
    const pairs = [...findInnerPairs("{ x = 5 y = 50% }")];

    expect(pairs.map(pair => [pair.name, pair.rawValue, pair.valueIndex])).toEqual([
      ["x", "5", 6],
      ["y", "50%", 12]
    ]);
  });

  it("skips pairs whose value is not a number", () => {
    expect([...findInnerPairs("{ name = foo x = 3 }")].map(pair => pair.name)).toEqual(["x"]);
  });
});

describe("canonicalAttributeName", () => {
  it("maps any casing to the canonical spelling", () => {
    expect(canonicalAttributeName("MaxHeight")).toBe("maxHeight");
    expect(canonicalAttributeName("POS_X")).toBe("pos_x");
    expect(canonicalAttributeName("depth")).toBeUndefined();
  });
});
