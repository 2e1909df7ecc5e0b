import { describe, it, expect } from "vitest";
import { ConfigurationError, TableSchemaError } from "../lib/errors";
import { normalizeName } from "../lib/normalization";
import { buildMergedLayout, reconcile } from "../lib/reconcile/engine";
import { MatchPass } from "../lib/types";
import type { Table } from "../lib/types";
import { testCanonicalizer } from "./fixtures/countries";

const options = { canonicalizer: testCanonicalizer };

function table(columns: string[], rows: Table["rows"]): Table {
  return { columns, rows };
}

describe("reconcile", () => {
  it("matches the same break across country spellings", () => {
    const a = table(["name", "country"], [{ name: "Pipeline", country: "USA" }]);
    const b = table(["name", "country"], [{ name: "Pipeline", country: "United States" }]);

    const result = reconcile(a, b, options);

    expect(result.merged).toHaveLength(1);
    expect(result.merged[0].pass).toBe(MatchPass.DIRECT);
    expect(result.merged[0].values).toEqual({
      name_source1: "Pipeline",
      country: "United States",
      name_source2: "Pipeline",
    });
    expect(result.stats).toEqual({
      directMatches: 1,
      nameToAlternateMatches: 0,
      alternateToNameMatches: 0,
      totalMerged: 1,
      unmatchedA: 0,
      unmatchedB: 0,
    });
  });

  it("matches A's alternate name against B's name", () => {
    const a = table(
      ["name", "alternate_name", "country"],
      [{ name: "Jeffreys Bay", alternate_name: "J-Bay", country: "South Africa" }]
    );
    const b = table(["name", "country"], [{ name: "J Bay", country: "South Africa" }]);

    const result = reconcile(a, b, options);

    expect(result.merged).toHaveLength(1);
    expect(result.merged[0].pass).toBe(MatchPass.ALTERNATE_TO_NAME);
    expect(result.stats.alternateToNameMatches).toBe(1);
    expect(result.table.columns).toEqual([
      "name_source1",
      "alternate_name",
      "country",
      "name_source2",
    ]);
  });

  it("matches A's name against B's alternate name", () => {
    const a = table(["name", "country"], [{ name: "Supertubos", country: "Portugal" }]);
    const b = table(
      ["name", "alternate_name", "country"],
      [{ name: "Peniche Supertubes", alternate_name: "Super-tubos", country: "Portugal" }]
    );

    const result = reconcile(a, b, options);

    expect(result.merged.map((m) => m.pass)).toEqual([MatchPass.NAME_TO_ALTERNATE]);
    expect(result.merged[0].values).toEqual({
      name_source1: "Supertubos",
      country: "Portugal",
      name_source2: "Peniche Supertubes",
      alternate_name: "Super-tubos",
    });
  });

  it("never matches a row with a missing country", () => {
    const a = table(
      ["name", "country"],
      [
        { name: "Pipeline", country: null },
        { name: "Sunset", country: "USA" },
      ]
    );
    const b = table(
      ["name", "country"],
      [
        { name: "Pipeline", country: "United States" },
        { name: "Sunset", country: "United States" },
      ]
    );

    const result = reconcile(a, b, options);

    expect(result.merged).toHaveLength(1);
    expect(result.merged[0].values.name_source1).toBe("Sunset");
    expect(result.remainingA).toEqual([{ name: "Pipeline", country: null }]);
    expect(result.remainingB).toEqual([{ name: "Pipeline", country: "United States" }]);
    expect(result.stats.unmatchedA).toBe(1);
    expect(result.stats.unmatchedB).toBe(1);
  });

  it("never matches rows whose names are empty after normalization", () => {
    const a = table(
      ["name", "country"],
      [
        { name: "", country: "USA" },
        { name: "!!!", country: "USA" },
      ]
    );
    const b = table(
      ["name", "country"],
      [
        { name: "", country: "United States" },
        { name: "...", country: "United States" },
      ]
    );

    const result = reconcile(a, b, options);

    expect(result.merged).toEqual([]);
    expect(result.stats.unmatchedA).toBe(2);
    expect(result.stats.unmatchedB).toBe(2);
  });

  it("never matches an A row with no name through its alternate name", () => {
    const a = table(
      ["name", "alternate_name", "country"],
      [{ name: "", alternate_name: "J-Bay", country: "South Africa" }]
    );
    const b = table(["name", "country"], [{ name: "J Bay", country: "South Africa" }]);

    const result = reconcile(a, b, options);

    expect(result.merged).toEqual([]);
    expect(result.stats.unmatchedA).toBe(1);
    expect(result.stats.unmatchedB).toBe(1);
  });

  it("never matches a B row with no name through its alternate name", () => {
    const a = table(["name", "country"], [{ name: "Supertubos", country: "Portugal" }]);
    const b = table(
      ["name", "alternate_name", "country"],
      [{ name: null, alternate_name: "Supertubos", country: "Portugal" }]
    );

    const result = reconcile(a, b, options);

    expect(result.merged).toEqual([]);
    expect(result.remainingB).toEqual([
      { name: null, alternate_name: "Supertubos", country: "Portugal" },
    ]);
  });

  it("pairs a repeated key at most once per source row", () => {
    const a = table(
      ["name", "country"],
      [
        { name: "Pipeline", country: "USA" },
        { name: "PIPELINE", country: "United States" },
      ]
    );
    const b = table(["name", "country"], [{ name: "Pipeline", country: "United States" }]);

    const result = reconcile(a, b, options);

    expect(result.merged).toHaveLength(1);
    expect(result.merged[0].sourceIndexA).toBe(0);
    expect(result.merged[0].sourceIndexB).toBe(0);
    expect(result.remainingA).toEqual([{ name: "PIPELINE", country: "United States" }]);
    expect(result.stats.unmatchedA).toBe(1);
  });

  it("pairs equal keys one-to-one in table order", () => {
    const a = table(
      ["name", "country", "id"],
      [
        { name: "Pipe", country: "USA", id: "a1" },
        { name: "Pipe", country: "USA", id: "a2" },
      ]
    );
    const b = table(
      ["name", "country", "id"],
      [
        { name: "pipe", country: "United States", id: "b1" },
        { name: "pipe", country: "United States", id: "b2" },
      ]
    );

    const result = reconcile(a, b, options);

    expect(result.table.rows.map((r) => [r.id_source1, r.id_source2])).toEqual([
      ["a1", "b1"],
      ["a2", "b2"],
    ]);
  });

  it("lets an earlier pass claim rows before a later one", () => {
    const a = table(
      ["name", "alternate_name", "country"],
      [{ name: "Uluwatu", alternate_name: "Ulu", country: "Indonesia" }]
    );
    const b = table(
      ["name", "country"],
      [
        { name: "Ulu", country: "Indonesia" },
        { name: "Uluwatu", country: "Indonesia" },
      ]
    );

    const result = reconcile(a, b, options);

    expect(result.merged).toHaveLength(1);
    expect(result.merged[0].pass).toBe(MatchPass.DIRECT);
    expect(result.merged[0].sourceIndexB).toBe(1);
    expect(result.remainingB).toEqual([{ name: "Ulu", country: "Indonesia" }]);
  });

  it("orders output by pass, then by A's row order", () => {
    const a = table(
      ["name", "alternate_name", "country"],
      [
        { name: "Jeffreys Bay", alternate_name: "J-Bay", country: "South Africa" },
        { name: "Supertubos", alternate_name: "", country: "Portugal" },
        { name: "Pipeline", alternate_name: "", country: "USA" },
      ]
    );
    const b = table(
      ["name", "alternate_name", "country"],
      [
        { name: "Pipeline", alternate_name: "", country: "United States" },
        { name: "Peniche", alternate_name: "Supertubos", country: "Portugal" },
        { name: "JBay", alternate_name: "", country: "South Africa" },
      ]
    );

    const result = reconcile(a, b, options);

    expect(result.merged.map((m) => [m.pass, m.sourceIndexA, m.sourceIndexB])).toEqual([
      [MatchPass.DIRECT, 2, 0],
      [MatchPass.NAME_TO_ALTERNATE, 1, 1],
      [MatchPass.ALTERNATE_TO_NAME, 0, 2],
    ]);
  });

  it("falls back to the name when the alternate cell is empty", () => {
    const a = table(
      ["name", "alternate_name", "country"],
      [{ name: "Pipeline", alternate_name: "  ", country: "USA" }]
    );
    const b = table(["name", "country"], [{ name: "Pipeline", country: "United States" }]);

    // A direct match claims the pair; the fallback alternate key equals the name key
    expect(reconcile(a, b, options).stats.directMatches).toBe(1);
  });

  it("only matches directly when neither table has an alternate column", () => {
    const a = table(
      ["name", "country"],
      [
        { name: "Pipeline", country: "USA" },
        { name: "Jeffreys Bay", country: "South Africa" },
      ]
    );
    const b = table(
      ["name", "country"],
      [
        { name: "Pipeline", country: "USA" },
        { name: "J Bay", country: "South Africa" },
      ]
    );

    const { stats } = reconcile(a, b, options);

    expect(stats.directMatches).toBe(1);
    expect(stats.nameToAlternateMatches).toBe(0);
    expect(stats.alternateToNameMatches).toBe(0);
  });

  it("suffixes colliding columns and keeps the rest as they are", () => {
    const a = table(
      ["name", "country", "rating"],
      [{ name: "Pipeline", country: "USA", rating: "5" }]
    );
    const b = table(
      ["name", "rating", "country", "wave_type"],
      [{ name: "Pipeline", rating: "4", country: "United States", wave_type: "Reef" }]
    );

    const result = reconcile(a, b, options);

    expect(result.table).toEqual({
      columns: ["name_source1", "country", "rating_source1", "name_source2", "rating_source2", "wave_type"],
      rows: [
        {
          name_source1: "Pipeline",
          country: "United States",
          rating_source1: "5",
          name_source2: "Pipeline",
          rating_source2: "4",
          wave_type: "Reef",
        },
      ],
    });
  });

  it("accepts custom suffixes and field names", () => {
    const a = table(["break", "nation"], [{ break: "Pipeline", nation: "USA" }]);
    const b = table(["break", "nation"], [{ break: "Pipeline", nation: "United States" }]);

    const result = reconcile(a, b, {
      ...options,
      fields: { name: "break", country: "nation" },
      suffixes: { sourceA: "_a", sourceB: "_b" },
    });

    expect(result.table.columns).toEqual(["break_a", "nation", "break_b"]);
    expect(result.layout.nameColumnA).toBe("break_a");
    expect(result.layout.nameColumnB).toBe("break_b");
    expect(result.stats.directMatches).toBe(1);
  });

  it("raises a schema error when a key column is missing", () => {
    const a = table(["name"], [{ name: "Pipeline" }]);
    const b = table(["name", "country"], []);

    expect(() => reconcile(a, b, options)).toThrow(TableSchemaError);
    try {
      reconcile(a, b, options);
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err).toMatchObject({ table: "source A", missingColumns: ["country"] });
    }
  });

  it("handles empty tables", () => {
    const result = reconcile(table(["name", "country"], []), table(["name", "country"], []), options);
    expect(result.merged).toEqual([]);
    expect(result.stats.totalMerged).toBe(0);
  });

  it("does not modify its inputs and freezes merged records", () => {
    const a = table(["name", "country"], [{ name: "Pipeline", country: "USA" }]);
    const b = table(["name", "country"], [{ name: "Pipeline", country: "United States" }]);
    const before = JSON.stringify([a, b]);

    const result = reconcile(a, b, options);

    expect(JSON.stringify([a, b])).toBe(before);
    expect(Object.isFrozen(result.merged[0])).toBe(true);
    expect(Object.isFrozen(result.merged[0].values)).toBe(true);
  });

  it("keeps its invariants on a mixed dataset", () => {
    const a = table(
      ["name", "alternate_name", "country"],
      [
        { name: "Pipeline", alternate_name: "Banzai Pipeline", country: "USA" },
        { name: "Sunset", alternate_name: "", country: "U.S." },
        { name: "Jeffreys Bay", alternate_name: "J-Bay", country: "South Africa" },
        { name: "Mundaka", alternate_name: "", country: "Spain" },
        { name: "Mundaka", alternate_name: "", country: "Spain" },
        { name: "Nowhere", alternate_name: "", country: "" },
      ]
    );
    const b = table(
      ["name", "alternate_name", "country"],
      [
        { name: "Banzai Pipeline", alternate_name: "", country: "United States of America" },
        { name: "Sunset Beach", alternate_name: "Sunset", country: "United States" },
        { name: "J Bay", alternate_name: "", country: "South Africa" },
        { name: "Mundaka", alternate_name: "", country: "Spain" },
        { name: "Teahupoo", alternate_name: "", country: "French Polynesia" },
      ]
    );

    const result = reconcile(a, b, options);
    const { stats } = result;

    expect(stats).toEqual({
      directMatches: 1,
      nameToAlternateMatches: 1,
      alternateToNameMatches: 2,
      totalMerged: 4,
      unmatchedA: 2,
      unmatchedB: 1,
    });
    expect(stats.directMatches + stats.nameToAlternateMatches + stats.alternateToNameMatches).toBe(
      stats.totalMerged
    );
    expect(new Set(result.merged.map((m) => m.sourceIndexA)).size).toBe(stats.totalMerged);
    expect(new Set(result.merged.map((m) => m.sourceIndexB)).size).toBe(stats.totalMerged);
    expect(stats.unmatchedA).toBe(a.rows.length - stats.totalMerged);
    expect(stats.unmatchedB).toBe(b.rows.length - stats.totalMerged);

    for (const m of result.merged) {
      const rowA = a.rows[m.sourceIndexA];
      const rowB = b.rows[m.sourceIndexB];
      expect(testCanonicalizer.standardize(rowA.country)).toBe(
        testCanonicalizer.standardize(rowB.country)
      );
      const keyA = m.pass === MatchPass.ALTERNATE_TO_NAME ? rowA.alternate_name : rowA.name;
      const keyB = m.pass === MatchPass.NAME_TO_ALTERNATE ? rowB.alternate_name : rowB.name;
      expect(normalizeName(keyA)).toBe(normalizeName(keyB));
    }
  });
});

describe("buildMergedLayout", () => {
  it("emits the country column once at A's position", () => {
    const layout = buildMergedLayout(["country", "name"], ["name", "country", "region"]);
    expect(layout.columns).toEqual(["country", "name_source1", "name_source2", "region"]);
    expect(layout.fromA).toEqual([["name", "name_source1"]]);
    expect(layout.fromB).toEqual([
      ["name", "name_source2"],
      ["region", "region"],
    ]);
  });
});
