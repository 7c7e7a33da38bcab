import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { z } from "zod";
import { config } from "./config";
import { SnapshotError, ValidationError, SchemaViolation } from "./errors";
import {
  FEATURE_COLUMNS,
  FEATURE_SCHEMA_VERSION,
  featureRecordSchema,
  sqlColumnType,
} from "./feature-schema";
import { GroupingManifest, groupingManifestSchema } from "./grouping";
import {
  CleanedRecord,
  FeatureRecord,
  PipelineRun,
  PipelineStage,
  RawListingRecord,
} from "./types";

let db: Database.Database | null = null;

export function getDb(): Database.Database {
  if (db) return db;
  db = openDb(path.resolve(process.cwd(), config.dbPath));
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/** Open (or create) a snapshot file. Pass ":memory:" for a throwaway store. */
export function openDb(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  const database = new Database(dbPath);
  database.pragma("journal_mode = WAL");
  initSchema(database);
  return database;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS raw_listings (
      listing_id        TEXT NOT NULL CHECK (listing_id <> ''),
      fetched_at        TEXT NOT NULL,
      source_url        TEXT NOT NULL,
      title             TEXT,
      price_text        TEXT,
      location_text     TEXT,
      neighborhood_text TEXT,
      mileage_text      TEXT,
      fuel_text         TEXT,
      transmission_text TEXT,
      color_text        TEXT,
      motor_text        TEXT,
      brand_text        TEXT,
      model_text        TEXT,
      doors_text        TEXT,
      description       TEXT,
      details_json      TEXT NOT NULL,
      extras_json       TEXT NOT NULL,
      PRIMARY KEY (listing_id, fetched_at)
    );

    CREATE TABLE IF NOT EXISTS cleaned_listings (
      listing_id    TEXT PRIMARY KEY,
      source_url    TEXT NOT NULL,
      fetched_at    TEXT NOT NULL,
      title         TEXT NOT NULL,
      price         REAL NOT NULL,
      year          INTEGER NOT NULL,
      mileage_km    REAL,
      motor         REAL,
      doors         INTEGER,
      city          TEXT,
      state_clean   TEXT NOT NULL,
      neighborhood  TEXT,
      zip_code      TEXT,
      marca         TEXT NOT NULL,
      model         TEXT,
      fuel          TEXT,
      transmission  TEXT,
      color         TEXT,
      category      TEXT,
      steering      TEXT,
      vehicle_type  TEXT,
      extras_json   TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS normalization_rejections (
      listing_id TEXT NOT NULL,
      field      TEXT NOT NULL,
      reason     TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS feature_rejections (
      listing_id  TEXT NOT NULL,
      column_name TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS grouping_manifest (
      id             INTEGER PRIMARY KEY CHECK (id = 1),
      schema_version TEXT NOT NULL,
      fitted_at      TEXT NOT NULL,
      manifest_json  TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS pipeline_runs (
      id          TEXT PRIMARY KEY,
      stage       TEXT NOT NULL,
      started_at  TEXT NOT NULL,
      duration_ms INTEGER NOT NULL,
      report_json TEXT NOT NULL
    );
  `);
  createFeatureTable(db);
}

function createFeatureTable(db: Database.Database): void {
  const columns = FEATURE_COLUMNS.map((c) => {
    const notNull = c.nullable ? "" : " NOT NULL";
    const key = c.name === "listing_id" ? " PRIMARY KEY" : "";
    return `${c.name} ${sqlColumnType(c.type)}${notNull}${key}`;
  });
  db.exec(`
    CREATE TABLE IF NOT EXISTS feature_rows (
      ${columns.join(",\n      ")},
      schema_version TEXT NOT NULL
    )
  `);
}

// ===== Row validation =====

function jsonColumn<T>(inner: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return z
    .string()
    .transform((text, ctx): unknown => {
      try {
        return JSON.parse(text);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "invalid JSON" });
        return z.NEVER;
      }
    })
    .pipe(inner);
}

function parseRows<T>(
  table: string,
  rows: unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T[] {
  return rows.map((row, i) => {
    const result = schema.safeParse(row);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new SnapshotError(
        `Corrupt row ${i} in ${table}: ${issue?.path.join(".")} ${issue?.message}`
      );
    }
    return result.data;
  });
}

const text = z.string().nullable();

const rawRowSchema = z
  .object({
    listing_id: z.string().min(1),
    fetched_at: z.string().min(1),
    source_url: z.string(),
    title: text,
    price_text: text,
    location_text: text,
    neighborhood_text: text,
    mileage_text: text,
    fuel_text: text,
    transmission_text: text,
    color_text: text,
    motor_text: text,
    brand_text: text,
    model_text: text,
    doors_text: text,
    description: text,
    details_json: jsonColumn(z.record(z.string())),
    extras_json: jsonColumn(z.array(z.string())),
  })
  .transform(
    (r): RawListingRecord => ({
      listingId: r.listing_id,
      fetchedAt: r.fetched_at,
      sourceUrl: r.source_url,
      title: r.title,
      priceText: r.price_text,
      locationText: r.location_text,
      neighborhoodText: r.neighborhood_text,
      mileageText: r.mileage_text,
      fuelText: r.fuel_text,
      transmissionText: r.transmission_text,
      colorText: r.color_text,
      motorText: r.motor_text,
      brandText: r.brand_text,
      modelText: r.model_text,
      doorsText: r.doors_text,
      description: r.description,
      details: r.details_json,
      extras: r.extras_json,
    })
  );

const cleanedRowSchema = z
  .object({
    listing_id: z.string().min(1),
    source_url: z.string(),
    fetched_at: z.string(),
    title: z.string(),
    price: z.number().positive(),
    year: z.number().int(),
    mileage_km: z.number().nullable(),
    motor: z.number().nullable(),
    doors: z.number().int().nullable(),
    city: text,
    state_clean: z.string().min(1),
    neighborhood: text,
    zip_code: text,
    marca: z.string().min(1),
    model: text,
    fuel: text,
    transmission: text,
    color: text,
    category: text,
    steering: text,
    vehicle_type: text,
    extras_json: jsonColumn(z.array(z.string())),
  })
  .transform(
    (r): CleanedRecord => ({
      listingId: r.listing_id,
      sourceUrl: r.source_url,
      fetchedAt: r.fetched_at,
      title: r.title,
      price: r.price,
      year: r.year,
      mileageKm: r.mileage_km,
      motor: r.motor,
      doors: r.doors,
      city: r.city,
      stateClean: r.state_clean,
      neighborhood: r.neighborhood,
      zipCode: r.zip_code,
      marca: r.marca,
      model: r.model,
      fuel: r.fuel,
      transmission: r.transmission,
      color: r.color,
      category: r.category,
      steering: r.steering,
      vehicleType: r.vehicle_type,
      extras: r.extras_json,
    })
  );

// ===== Raw snapshot (append-only) =====

/** Returns true when a row was added, false when the key already existed. */
export function insertRawListing(db: Database.Database, r: RawListingRecord): boolean {
  const result = db
    .prepare(`
      INSERT OR IGNORE INTO raw_listings (
        listing_id, fetched_at, source_url, title, price_text, location_text,
        neighborhood_text, mileage_text, fuel_text, transmission_text,
        color_text, motor_text, brand_text, model_text, doors_text,
        description, details_json, extras_json
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `)
    .run(
      r.listingId, r.fetchedAt, r.sourceUrl, r.title, r.priceText, r.locationText,
      r.neighborhoodText, r.mileageText, r.fuelText, r.transmissionText,
      r.colorText, r.motorText, r.brandText, r.modelText, r.doorsText,
      r.description, JSON.stringify(r.details), JSON.stringify(r.extras)
    );
  return result.changes > 0;
}

export function getStoredListingIds(db: Database.Database): Set<string> {
  const rows = db.prepare("SELECT DISTINCT listing_id FROM raw_listings").all();
  const parsed = parseRows("raw_listings", rows, z.object({ listing_id: z.string() }));
  return new Set(parsed.map((r) => r.listing_id));
}

export function readRawSnapshot(db: Database.Database): RawListingRecord[] {
  const rows = db
    .prepare("SELECT * FROM raw_listings ORDER BY listing_id, fetched_at")
    .all();
  return parseRows("raw_listings", rows, rawRowSchema);
}

// ===== Cleaned snapshot (rewritten each run) =====

export function writeCleanedSnapshot(
  db: Database.Database,
  records: CleanedRecord[],
  rejections: ValidationError[]
): void {
  const insert = db.prepare(`
    INSERT INTO cleaned_listings (
      listing_id, source_url, fetched_at, title, price, year, mileage_km,
      motor, doors, city, state_clean, neighborhood, zip_code, marca, model,
      fuel, transmission, color, category, steering, vehicle_type, extras_json
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const reject = db.prepare(
    "INSERT INTO normalization_rejections (listing_id, field, reason) VALUES (?, ?, ?)"
  );

  db.transaction(() => {
    db.prepare("DELETE FROM cleaned_listings").run();
    db.prepare("DELETE FROM normalization_rejections").run();
    for (const c of records) {
      insert.run(
        c.listingId, c.sourceUrl, c.fetchedAt, c.title, c.price, c.year,
        c.mileageKm, c.motor, c.doors, c.city, c.stateClean, c.neighborhood,
        c.zipCode, c.marca, c.model, c.fuel, c.transmission, c.color,
        c.category, c.steering, c.vehicleType, JSON.stringify(c.extras)
      );
    }
    for (const r of rejections) reject.run(r.listingId, r.field, r.reason);
  })();
}

export function readCleanedSnapshot(db: Database.Database): CleanedRecord[] {
  const rows = db.prepare("SELECT * FROM cleaned_listings ORDER BY listing_id").all();
  return parseRows("cleaned_listings", rows, cleanedRowSchema);
}

// ===== Feature table + grouping manifest (rewritten each run) =====

export function writeFeatureSnapshot(
  db: Database.Database,
  rows: FeatureRecord[],
  manifest: GroupingManifest,
  violations: SchemaViolation[]
): void {
  const names = FEATURE_COLUMNS.map((c) => c.name);

  db.transaction(() => {
    // Recreated so a schema version bump never leaves stale columns behind
    db.exec("DROP TABLE IF EXISTS feature_rows");
    createFeatureTable(db);
    db.prepare("DELETE FROM feature_rejections").run();

    const insert = db.prepare(`
      INSERT INTO feature_rows (${names.join(", ")}, schema_version)
      VALUES (${names.map(() => "?").join(", ")}, ?)
    `);
    for (const row of rows) {
      insert.run(...names.map((n) => row[n]), FEATURE_SCHEMA_VERSION);
    }

    const reject = db.prepare(
      "INSERT INTO feature_rejections (listing_id, column_name) VALUES (?, ?)"
    );
    for (const v of violations) reject.run(v.listingId, v.column);

    db.prepare(`
      INSERT OR REPLACE INTO grouping_manifest (id, schema_version, fitted_at, manifest_json)
      VALUES (1, ?, ?, ?)
    `).run(manifest.schemaVersion, manifest.fittedAt, JSON.stringify(manifest));
  })();
}

export function readFeatureSnapshot(db: Database.Database): {
  schemaVersion: string | null;
  rows: FeatureRecord[];
} {
  const raw = db.prepare("SELECT * FROM feature_rows ORDER BY listing_id").all();
  const versioned = parseRows(
    "feature_rows",
    raw,
    z.object({ schema_version: z.string() }).passthrough()
  );
  const versions = new Set(versioned.map((r) => r.schema_version));
  if (versions.size > 1) {
    throw new SnapshotError(`feature_rows mixes schema versions: ${Array.from(versions).join(", ")}`);
  }
  return {
    schemaVersion: versioned[0]?.schema_version ?? null,
    rows: parseRows("feature_rows", raw, featureRecordSchema),
  };
}

export function readGroupingManifest(db: Database.Database): GroupingManifest | null {
  const rows = db.prepare("SELECT manifest_json FROM grouping_manifest WHERE id = 1").all();
  const parsed = parseRows(
    "grouping_manifest",
    rows,
    z.object({ manifest_json: jsonColumn(groupingManifestSchema) })
  );
  return parsed[0]?.manifest_json ?? null;
}

// ===== Run history =====

export function insertPipelineRun(db: Database.Database, run: PipelineRun): void {
  db.prepare(`
    INSERT INTO pipeline_runs (id, stage, started_at, duration_ms, report_json)
    VALUES (?, ?, ?, ?, ?)
  `).run(run.id, run.stage, run.startedAt, run.durationMs, run.reportJson);
}

export function getPipelineRuns(db: Database.Database, stage?: PipelineStage): PipelineRun[] {
  const rows = stage
    ? db.prepare("SELECT * FROM pipeline_runs WHERE stage = ? ORDER BY started_at DESC").all(stage)
    : db.prepare("SELECT * FROM pipeline_runs ORDER BY started_at DESC").all();
  return parseRows(
    "pipeline_runs",
    rows,
    z
      .object({
        id: z.string(),
        stage: z.nativeEnum(PipelineStage),
        started_at: z.string(),
        duration_ms: z.number().int(),
        report_json: z.string(),
      })
      .transform(
        (r): PipelineRun => ({
          id: r.id,
          stage: r.stage,
          startedAt: r.started_at,
          durationMs: r.duration_ms,
          reportJson: r.report_json,
        })
      )
  );
}

// ===== Provenance =====

export interface ProvenanceIssue {
  listingId: string;
  cleanedRows: number;
  rawRows: number;
}

/**
 * Feature rows that do not trace to exactly one cleaned row and at least
 * one raw row. Empty when the snapshots are consistent.
 */
export function checkProvenance(db: Database.Database): ProvenanceIssue[] {
  const rows = db
    .prepare(`
      SELECT f.listing_id AS listing_id,
             (SELECT COUNT(*) FROM cleaned_listings c WHERE c.listing_id = f.listing_id) AS cleaned_rows,
             (SELECT COUNT(*) FROM raw_listings r WHERE r.listing_id = f.listing_id) AS raw_rows
      FROM feature_rows f
      ORDER BY f.listing_id
    `)
    .all();
  return parseRows(
    "feature_rows",
    rows,
    z.object({
      listing_id: z.string(),
      cleaned_rows: z.number().int(),
      raw_rows: z.number().int(),
    })
  )
    .filter((r) => r.cleaned_rows !== 1 || r.raw_rows < 1)
    .map((r) => ({ listingId: r.listing_id, cleanedRows: r.cleaned_rows, rawRows: r.raw_rows }));
}
