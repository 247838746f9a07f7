import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FactorStoreError } from "../src/errors";
import { SqliteScalingFactorStore } from "../src/store/sqliteStore";

const UNIFORM = { mean: 2, median: 2, stdDev: 0, min: 2, max: 2 };
const EMPTY = { mean: null, median: null, stdDev: null, min: null, max: null };

describe("SqliteScalingFactorStore", () => {
  let store: SqliteScalingFactorStore;

  beforeEach(() => {
    store = new SqliteScalingFactorStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("stores values and factors and reads them back by path and resolution", () => {
    const summary = store.saveFileFactors({
      relativePath: "menus/main.gui",
      filename: "main.gui",
      originalValues: new Map([
        ["x", [10, 20]],
        ["width", [100]]
      ]),
      factors: {
        "4K": { x: UNIFORM, width: EMPTY },
        "2K": { x: { ...UNIFORM, mean: 1.5, median: 1.5, min: 1.5, max: 1.5 } }
      }
    });

    expect(summary.properties).toBe(2);
    expect(summary.originalValues).toBe(3);
    expect(summary.factors).toBe(3);

    const factors4k = store.getFileFactors("menus/main.gui", "4K");
    expect(factors4k.get("x")).toEqual(UNIFORM);
    expect(factors4k.get("width")).toEqual(EMPTY);
    expect(store.getFileFactors("menus/main.gui", "2K").get("x")?.mean).toBe(1.5);
    expect(store.getFileFactors("menus/other.gui", "4K").size).toBe(0);
    expect(store.getOriginalValues("menus/main.gui")).toEqual(
      new Map([
        ["x", [10, 20]],
        ["width", [100]]
      ])
    );
  });

  it("replaces values and factors when a file is derived again", () => {
    const input = {
      relativePath: "a.gui",
      filename: "a.gui",
      originalValues: new Map([["y", [1, 2, 3]]]),
      factors: { "4K": { y: UNIFORM } }
    };
    store.saveFileFactors(input);
    store.saveFileFactors({
      ...input,
      originalValues: new Map([["y", [7]]]),
      factors: { "4K": { y: { ...UNIFORM, mean: 3 } } }
    });

    expect(store.getOriginalValues("a.gui").get("y")).toEqual([7]);
    expect(store.listFactors("4K")).toEqual([
      { path: "a.gui", filename: "a.gui", property: "y", resolution: "4K", ...UNIFORM, mean: 3 }
    ]);
  });

  it("drops attributes that are no longer present when a file is derived again", () => {
    store.saveFileFactors({
      relativePath: "a.gui",
      filename: "a.gui",
      originalValues: new Map([
        ["x", [10]],
        ["width", [100]]
      ]),
      factors: { "4K": { x: UNIFORM, width: UNIFORM } }
    });
    store.saveFileFactors({
      relativePath: "a.gui",
      filename: "a.gui",
      originalValues: new Map([["x", [10]]]),
      factors: { "4K": { x: UNIFORM } }
    });

    expect([...store.getFileFactors("a.gui", "4K").keys()]).toEqual(["x"]);
    expect(store.getOriginalValues("a.gui")).toEqual(new Map([["x", [10]]]));
    expect(store.listFactors().map(row => row.property)).toEqual(["x"]);
  });

  it("lists every stored factor ordered by path and resolution", () => {
    store.saveFileFactors({
      relativePath: "b.gui",
      filename: "b.gui",
      originalValues: new Map([["x", [1]]]),
      factors: { "4K": { x: UNIFORM } }
    });
    store.saveFileFactors({
      relativePath: "a.gui",
      filename: "a.gui",
      originalValues: new Map([["x", [1]]]),
      factors: { "4K": { x: UNIFORM }, "2K": { x: UNIFORM } }
    });

    expect(store.listFactors().map(row => `${row.path}:${row.resolution}`)).toEqual([
      "a.gui:2K",
      "a.gui:4K",
      "b.gui:4K"
    ]);
  });

  it("wraps database errors in FactorStoreError", () => {
    store.close();

    expect(() => store.getFileFactors("a.gui", "4K")).toThrow(FactorStoreError);
  });
});
