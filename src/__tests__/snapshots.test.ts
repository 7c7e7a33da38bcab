import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import {
  checkProvenance,
  getPipelineRuns,
  openDb,
  readCleanedSnapshot,
  readFeatureSnapshot,
  readGroupingManifest,
  readRawSnapshot,
  writeCleanedSnapshot,
  writeFeatureSnapshot,
} from "../lib/db";
import { SnapshotError, ValidationError } from "../lib/errors";
import { buildFeatures } from "../lib/features";
import { normalizeSnapshot } from "../lib/normalization";
import { runFeatureStage, runNormalizeStage } from "../lib/pipeline";
import { RawStoreWriter } from "../lib/raw-store";
import { PipelineStage, RawListingRecord } from "../lib/types";

const NORMALIZE = { yearFloor: 1980, currentYear: 2024, minPrice: 1000, maxPrice: 1_000_000 };
const FEATURES = { referenceYear: 2024, carAgeFloor: 0.5, stateMinListings: 1, brandTopN: 20 };

function makeRaw(overrides: Partial<RawListingRecord> = {}): RawListingRecord {
  return {
    listingId: "1000001",
    fetchedAt: "2024-05-01T12:00:00.000Z",
    sourceUrl: "https://www.olx.com.br/autos-e-pecas/carros-vans-e-utilitarios/carro-1000001",
    title: "Toyota Corolla XEI 2019",
    priceText: "R$ 98.000",
    locationText: "Curitiba - PR",
    neighborhoodText: null,
    mileageText: "60.000 km",
    fuelText: "Flex",
    transmissionText: "Automático",
    colorText: null,
    motorText: "2.0",
    brandText: "TOYOTA",
    modelText: "COROLLA",
    doorsText: "4",
    description: "Revisado",
    details: { marca: "TOYOTA" },
    extras: ["blindado"],
    ...overrides,
  };
}

describe("raw snapshot", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDb(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("appends each observation once", () => {
    const writer = new RawStoreWriter(db);

    expect(writer.append(makeRaw())).toBe(true);
    expect(writer.append(makeRaw())).toBe(false);
    expect(writer.append(makeRaw({ fetchedAt: "2024-06-01T12:00:00.000Z" }))).toBe(true);

    expect(writer.getStats()).toEqual({ appended: 2, duplicates: 1 });
    expect(writer.readSnapshot()).toHaveLength(2);
    expect(writer.storedListingIds()).toEqual(new Set(["1000001"]));
  });

  it("never overwrites an existing observation", () => {
    const writer = new RawStoreWriter(db);
    writer.append(makeRaw({ priceText: "R$ 98.000" }));
    writer.append(makeRaw({ priceText: "R$ 1" }));

    expect(readRawSnapshot(db)[0].priceText).toBe("R$ 98.000");
  });

  it("round-trips details and extras", () => {
    const record = makeRaw({ details: { marca: "TOYOTA", cor: "Preto" }, extras: ["blindado", "teto_solar"] });
    new RawStoreWriter(db).append(record);

    expect(readRawSnapshot(db)).toEqual([record]);
  });

  it("refuses a record without a listing id", () => {
    expect(() => new RawStoreWriter(db).append(makeRaw({ listingId: " " }))).toThrow("without listing id");
  });

  it("fails loudly on a corrupt row", () => {
    db.prepare(
      "INSERT INTO raw_listings (listing_id, fetched_at, source_url, details_json, extras_json) VALUES (?, ?, ?, ?, ?)"
    ).run("1000009", "2024-05-01T00:00:00.000Z", "https://example.com", "{not json", "[]");

    expect(() => readRawSnapshot(db)).toThrow(SnapshotError);
  });
});

describe("cleaned and feature snapshots", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDb(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("replaces the cleaned snapshot on every write", () => {
    const { records } = normalizeSnapshot(
      [makeRaw({ listingId: "1000001" }), makeRaw({ listingId: "1000002" })],
      NORMALIZE
    );
    writeCleanedSnapshot(db, records, []);
    writeCleanedSnapshot(db, records.slice(1), [new ValidationError("1000001", "price", "missing_price")]);

    expect(readCleanedSnapshot(db)).toEqual(records.slice(1));
    expect(db.prepare("SELECT listing_id, field, reason FROM normalization_rejections").all()).toEqual([
      { listing_id: "1000001", field: "price", reason: "missing_price" },
    ]);
  });

  it("stores feature rows with their schema version and manifest", () => {
    const { records } = normalizeSnapshot([makeRaw()], NORMALIZE);
    const { rows, manifest } = buildFeatures(records, FEATURES, "2024-06-01T00:00:00.000Z");
    writeFeatureSnapshot(db, rows, manifest, []);

    expect(readFeatureSnapshot(db)).toEqual({ schemaVersion: "v1", rows });
    expect(readGroupingManifest(db)).toEqual(manifest);
  });

  it("reports feature rows that do not trace back to cleaned and raw rows", () => {
    const raw = makeRaw();
    new RawStoreWriter(db).append(raw);
    const { records } = normalizeSnapshot([raw], NORMALIZE);
    writeCleanedSnapshot(db, records, []);

    const orphan = { ...records[0], listingId: "2000001" };
    const { rows, manifest } = buildFeatures([...records, orphan], FEATURES);
    writeFeatureSnapshot(db, rows, manifest, []);

    expect(checkProvenance(db)).toEqual([{ listingId: "2000001", cleanedRows: 0, rawRows: 0 }]);
  });
});

describe("stage runners", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDb(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("rebuilds each snapshot from its predecessor and records the run", () => {
    const writer = new RawStoreWriter(db);
    writer.append(makeRaw({ listingId: "1000001" }));
    writer.append(makeRaw({ listingId: "1000002", title: "Toyota Corolla" }));
    writer.append(makeRaw({ listingId: "1000003", brandText: "VW - VolksWagen", extras: [] }));

    const normalized = runNormalizeStage(db, NORMALIZE);
    expect(normalized.report).toMatchObject({ input: 3, accepted: 2, rejected: 1 });

    const features = runFeatureStage(db, FEATURES, "2024-06-01T00:00:00.000Z");
    expect(features.rows.map((r) => [r.listing_id, r.marca, r.armored])).toEqual([
      ["1000001", "TOYOTA", 1],
      ["1000003", "VOLKSWAGEN", 0],
    ]);
    expect(checkProvenance(db)).toEqual([]);

    const runs = getPipelineRuns(db);
    expect(runs.map((r) => r.stage).sort()).toEqual([PipelineStage.FEATURES, PipelineStage.NORMALIZE]);
    expect(JSON.parse(getPipelineRuns(db, PipelineStage.NORMALIZE)[0].reportJson)).toMatchObject({
      input: 3,
      accepted: 2,
      superseded: 0,
      rejectedByReason: { missing_year: 1 },
    });
  });
});
