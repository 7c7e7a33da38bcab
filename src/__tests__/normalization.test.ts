import { describe, it, expect } from "vitest";
import { ValidationError } from "../lib/errors";
import { latestObservations, normalizeRecord, normalizeSnapshot } from "../lib/normalization";
import { RawListingRecord } from "../lib/types";

const OPTIONS = { yearFloor: 1980, currentYear: 2024, minPrice: 1000, maxPrice: 1_000_000 };

function makeRaw(overrides: Partial<RawListingRecord> = {}): RawListingRecord {
  return {
    listingId: "1234567801",
    fetchedAt: "2024-05-01T12:00:00.000Z",
    sourceUrl: "https://www.olx.com.br/autos-e-pecas/carros-vans-e-utilitarios/honda-civic-1234567801",
    title: "Honda Civic EXL 2.0 2020",
    priceText: "R$ 112.900",
    locationText: "São Paulo, SP, 05422-000",
    neighborhoodText: "Pinheiros",
    mileageText: "45000",
    fuelText: "Flex",
    transmissionText: "Automático",
    colorText: "Prata",
    motorText: "2.0",
    brandText: "HONDA",
    modelText: "CIVIC EXL 2.0",
    doorsText: "4 portas",
    description: null,
    details: { categoria: "Sedã", direcao: "Elétrica", tipo_de_veiculo: "Passeio" },
    extras: ["teto_solar", "bancos_de_couro"],
    ...overrides,
  };
}

describe("normalizeRecord", () => {
  it("cleans every field of a complete listing", () => {
    expect(normalizeRecord(makeRaw(), OPTIONS)).toEqual({
      listingId: "1234567801",
      sourceUrl: "https://www.olx.com.br/autos-e-pecas/carros-vans-e-utilitarios/honda-civic-1234567801",
      fetchedAt: "2024-05-01T12:00:00.000Z",
      title: "Honda Civic EXL 2.0 2020",
      price: 112900,
      year: 2020,
      mileageKm: 45000,
      motor: 2,
      doors: 4,
      city: "são paulo",
      stateClean: "SP",
      neighborhood: "pinheiros",
      zipCode: "05422-000",
      marca: "HONDA",
      model: "CIVIC EXL 2.0",
      fuel: "Flex",
      transmission: "Automático",
      color: "Prata",
      category: "Sedã",
      steering: "Elétrica",
      vehicleType: "Passeio",
      extras: ["bancos_de_couro", "teto_solar"],
    });
  });

  it("keeps optional fields null when the ad omits them", () => {
    const result = normalizeRecord(
      makeRaw({ mileageText: null, motorText: null, locationText: null, brandText: null, details: {} }),
      OPTIONS
    );
    expect(result).toMatchObject({
      mileageKm: null,
      motor: null,
      city: null,
      stateClean: "UNKNOWN",
      marca: "UNKNOWN",
      category: null,
    });
  });

  it("names the field and reason of a rejection", () => {
    const result = normalizeRecord(makeRaw({ mileageText: "muito rodado" }), OPTIONS);
    expect(result).toBeInstanceOf(ValidationError);
    expect(result).toMatchObject({ listingId: "1234567801", field: "mileage", reason: "malformed_mileage" });
  });
});

describe("latestObservations", () => {
  it("keeps the most recent observation per listing", () => {
    const older = makeRaw({ fetchedAt: "2024-04-01T00:00:00.000Z", priceText: "R$ 120.000" });
    const newer = makeRaw({ fetchedAt: "2024-05-01T00:00:00.000Z", priceText: "R$ 110.000" });
    const { latest, superseded } = latestObservations([newer, older]);

    expect(latest).toEqual([newer]);
    expect(superseded).toBe(1);
  });
});

describe("normalizeSnapshot", () => {
  const rows = [
    makeRaw({ listingId: "1000001", fetchedAt: "2024-04-01T00:00:00.000Z", priceText: "Consulte" }),
    makeRaw({ listingId: "1000001", fetchedAt: "2024-05-01T00:00:00.000Z" }),
    makeRaw({ listingId: "1000002", priceText: "R$ 500" }),
    makeRaw({ listingId: "1000003", title: "Fiat Uno Mille" }),
    makeRaw({ listingId: "1000004", title: "Chevette 1975" }),
    makeRaw({ listingId: "1000005", title: "Gol 1.0 2015", priceText: "R$ 32.500" }),
  ];
  const result = normalizeSnapshot(rows, OPTIONS);

  it("accounts for every latest observation", () => {
    expect(result.superseded).toBe(1);
    expect(result.report.input).toBe(5);
    expect(result.report.accepted + result.report.rejected).toBe(result.report.input);
    expect(result.report.accepted).toBe(2);
  });

  it("counts rejections by reason", () => {
    expect(result.report.rejectedByReason).toEqual({
      price_out_of_range: 1,
      missing_year: 1,
      year_out_of_range: 1,
    });
    expect(result.rejections.map((r) => [r.listingId, r.field])).toEqual([
      ["1000002", "price"],
      ["1000003", "year"],
      ["1000004", "year"],
    ]);
  });

  it("uses the latest observation of a relisted ad", () => {
    expect(result.records.map((r) => [r.listingId, r.year, r.price])).toEqual([
      ["1000001", 2020, 112900],
      ["1000005", 2015, 32500],
    ]);
  });

  it("returns an empty report for an empty snapshot", () => {
    const empty = normalizeSnapshot([], OPTIONS);
    expect(empty.records).toEqual([]);
    expect(empty.report).toMatchObject({ input: 0, accepted: 0, rejected: 0 });
  });
});
