import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { AttributeStatistics, ResolutionLabel, ScalingFactorRecord } from "@ui-rescale/shared";
import { FactorStoreError } from "../errors";
import type { FileFactorsInput, SaveSummary, ScalingFactorStore } from "./types";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS file (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    filename TEXT NOT NULL,
    path TEXT NOT NULL UNIQUE
  );
  CREATE INDEX IF NOT EXISTS file_filename_idx ON file (filename);

  CREATE TABLE IF NOT EXISTS property (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    file_id INTEGER NOT NULL REFERENCES file (id) ON DELETE CASCADE,
    UNIQUE (name, file_id)
  );

  CREATE TABLE IF NOT EXISTS original_value (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    property_id INTEGER NOT NULL REFERENCES property (id) ON DELETE CASCADE,
    position INTEGER NOT NULL,
    value REAL NOT NULL
  );
  CREATE INDEX IF NOT EXISTS original_value_property_idx ON original_value (property_id);

  CREATE TABLE IF NOT EXISTS scaling_factor (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    property_id INTEGER NOT NULL REFERENCES property (id) ON DELETE CASCADE,
    resolution TEXT NOT NULL,
    mean REAL,
    median REAL,
    std_dev REAL,
    min REAL,
    max REAL,
    UNIQUE (property_id, resolution)
  );
  CREATE INDEX IF NOT EXISTS scaling_factor_resolution_idx ON scaling_factor (resolution);
`;

interface IdRow {
  id: number;
}

interface StatisticsRow {
  name: string;
  mean: number | null;
  median: number | null;
  stdDev: number | null;
  min: number | null;
  max: number | null;
}

interface FactorRow extends StatisticsRow {
  path: string;
  filename: string;
  resolution: string;
}

interface PropertyRow {
  id: number;
  name: string;
}

interface ValueRow {
  name: string;
  value: number;
}

const FACTOR_SELECT = `
  SELECT p.name AS name, sf.mean AS mean, sf.median AS median, sf.std_dev AS stdDev,
         sf.min AS min, sf.max AS max, f.path AS path, f.filename AS filename,
         sf.resolution AS resolution
  FROM scaling_factor sf
  JOIN property p ON p.id = sf.property_id
  JOIN file f ON f.id = p.file_id
`;

function toStatistics(row: StatisticsRow): AttributeStatistics {
  return { mean: row.mean, median: row.median, stdDev: row.stdDev, min: row.min, max: row.max };
}

function prepareStatements(db: Database.Database) {
  return {
    upsertFile: db.prepare<[string, string], IdRow>(
      `INSERT INTO file (filename, path) VALUES (?, ?)
       ON CONFLICT (path) DO UPDATE SET filename = excluded.filename
       RETURNING id`
    ),
    upsertProperty: db.prepare<[string, number], IdRow>(
      `INSERT INTO property (name, file_id) VALUES (?, ?)
       ON CONFLICT (name, file_id) DO UPDATE SET name = excluded.name
       RETURNING id`
    ),
    selectProperties: db.prepare<[number], PropertyRow>(`SELECT id, name FROM property WHERE file_id = ?`),
    deleteProperty: db.prepare<[number]>(`DELETE FROM property WHERE id = ?`),
    deleteValues: db.prepare<[number]>(`DELETE FROM original_value WHERE property_id = ?`),
    insertValue: db.prepare<[number, number, number]>(
      `INSERT INTO original_value (property_id, position, value) VALUES (?, ?, ?)`
    ),
    upsertFactor: db.prepare<
      [number, string, number | null, number | null, number | null, number | null, number | null]
    >(
      `INSERT INTO scaling_factor (property_id, resolution, mean, median, std_dev, min, max)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT (property_id, resolution) DO UPDATE SET
         mean = excluded.mean,
         median = excluded.median,
         std_dev = excluded.std_dev,
         min = excluded.min,
         max = excluded.max`
    ),
    selectFileFactors: db.prepare<[string, string], FactorRow>(
      `${FACTOR_SELECT} WHERE f.path = ? AND sf.resolution = ? ORDER BY p.id`
    ),
    selectFactorsByResolution: db.prepare<[string], FactorRow>(
      `${FACTOR_SELECT} WHERE sf.resolution = ? ORDER BY f.path, p.id`
    ),
    selectAllFactors: db.prepare<[], FactorRow>(`${FACTOR_SELECT} ORDER BY f.path, sf.resolution, p.id`),
    selectValues: db.prepare<[string], ValueRow>(
      `SELECT p.name AS name, ov.value AS value
       FROM original_value ov
       JOIN property p ON p.id = ov.property_id
       JOIN file f ON f.id = p.file_id
       WHERE f.path = ?
       ORDER BY p.id, ov.position`
    )
  };
}

function openDatabase(filePath: string): Database.Database {
  try {
    if (filePath !== ":memory:") {
      mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    }
    const db = new Database(filePath);
    if (filePath !== ":memory:") {
      db.pragma("journal_mode = WAL");
    }
    db.pragma("foreign_keys = ON");
    db.exec(SCHEMA);
    return db;
  } catch (error) {
    throw new FactorStoreError(`Failed to open scaling factor store at ${filePath}`, error);
  }
}

/**
 * SQLite-backed store. Pass ":memory:" for a throwaway database; any other
 * path has its parent directory created and runs in WAL mode.
 */
export class SqliteScalingFactorStore implements ScalingFactorStore {
  private readonly db: Database.Database;
  private readonly statements: ReturnType<typeof prepareStatements>;
  private readonly saveTransaction: (input: FileFactorsInput) => SaveSummary;

  constructor(readonly filePath: string) {
    this.db = openDatabase(filePath);
    this.statements = prepareStatements(this.db);

    this.saveTransaction = this.db.transaction((input: FileFactorsInput): SaveSummary => {
      const file = this.statements.upsertFile.get(input.filename, input.relativePath);
      if (!file) {
        throw new Error(`File row for ${input.relativePath} was not returned`);
      }
      // attributes gone from the file lose their values and factors too
      const current = new Set<string>(input.originalValues.keys());
      for (const byProperty of Object.values(input.factors)) {
        Object.keys(byProperty).forEach(name => current.add(name));
      }
      for (const property of this.statements.selectProperties.all(file.id)) {
        if (!current.has(property.name)) {
          this.statements.deleteProperty.run(property.id);
        }
      }

      const propertyIds = new Map<string, number>();
      const propertyId = (name: string): number => {
        const known = propertyIds.get(name);
        if (known !== undefined) {
          return known;
        }
        const row = this.statements.upsertProperty.get(name, file.id);
        if (!row) {
          throw new Error(`Property row for ${name} was not returned`);
        }
        propertyIds.set(name, row.id);
        return row.id;
      };

      let valueCount = 0;
      for (const [name, values] of input.originalValues) {
        const id = propertyId(name);
        this.statements.deleteValues.run(id);
        values.forEach((value, position) => {
          this.statements.insertValue.run(id, position, value);
        });
        valueCount += values.length;
      }

      let factorCount = 0;
      for (const [resolution, byProperty] of Object.entries(input.factors)) {
        for (const [name, stats] of Object.entries(byProperty)) {
          this.statements.upsertFactor.run(
            propertyId(name),
            resolution,
            stats.mean,
            stats.median,
            stats.stdDev,
            stats.min,
            stats.max
          );
          factorCount += 1;
        }
      }

      return {
        fileId: file.id,
        properties: propertyIds.size,
        originalValues: valueCount,
        factors: factorCount
      };
    });
  }

  saveFileFactors(input: FileFactorsInput): SaveSummary {
    try {
      return this.saveTransaction(input);
    } catch (error) {
      throw new FactorStoreError(`Failed to store scaling factors for ${input.relativePath}`, error);
    }
  }

  getFileFactors(relativePath: string, resolution: ResolutionLabel): Map<string, AttributeStatistics> {
    try {
      const rows = this.statements.selectFileFactors.all(relativePath, resolution);
      return new Map(rows.map(row => [row.name, toStatistics(row)]));
    } catch (error) {
      throw new FactorStoreError(`Failed to read ${resolution} scaling factors for ${relativePath}`, error);
    }
  }

  getOriginalValues(relativePath: string): Map<string, number[]> {
    try {
      const values = new Map<string, number[]>();
      for (const row of this.statements.selectValues.all(relativePath)) {
        const list = values.get(row.name) ?? [];
        list.push(row.value);
        values.set(row.name, list);
      }
      return values;
    } catch (error) {
      throw new FactorStoreError(`Failed to read original values for ${relativePath}`, error);
    }
  }

  listFactors(resolution?: ResolutionLabel): ScalingFactorRecord[] {
    try {
      const rows = resolution === undefined
        ? this.statements.selectAllFactors.all()
        : this.statements.selectFactorsByResolution.all(resolution);
      return rows.map(row => ({
        path: row.path,
        filename: row.filename,
        property: row.name,
        resolution: row.resolution,
        ...toStatistics(row)
      }));
    } catch (error) {
      throw new FactorStoreError("Failed to list scaling factors", error);
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
