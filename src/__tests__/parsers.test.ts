import { describe, it, expect } from "vitest";
import {
  canonicalState,
  cleanText,
  extractYear,
  normalizeBrand,
  normalizeOptionName,
  parseDoors,
  parseLocation,
  parseMileage,
  parseMotor,
  parsePrice,
} from "../lib/parsers";

const YEARS = { floor: 1980, currentYear: 2024 };
const PRICES = { min: 1000, max: 1_000_000 };

describe("extractYear", () => {
  it("finds a year at the end of the title", () => {
    expect(extractYear("Honda Civic 2020 Full", YEARS)).toEqual({ ok: true, value: 2020 });
  });

  it("finds a year at the start of the title", () => {
    expect(extractYear("2019 Toyota Corolla", YEARS)).toEqual({ ok: true, value: 2019 });
  });

  it("takes the rightmost plausible token", () => {
    expect(extractYear("Corolla XEI 2019 2020", YEARS)).toEqual({ ok: true, value: 2020 });
  });

  it("skips implausible tokens to the right", () => {
    expect(extractYear("Gol 2015 motor 5000", YEARS)).toEqual({ ok: true, value: 2015 });
  });

  it("accepts next year's models", () => {
    expect(extractYear("Onix Plus 2025", YEARS)).toEqual({ ok: true, value: 2025 });
    expect(extractYear("Onix Plus 2026", YEARS)).toEqual({ ok: false, reason: "year_out_of_range" });
  });

  it("does not read digits inside longer numbers", () => {
    expect(extractYear("Fiat Uno 123456", YEARS)).toEqual({ ok: false, reason: "missing_year" });
  });

  it("rejects titles without any year", () => {
    expect(extractYear("Fiat Uno Mille", YEARS)).toEqual({ ok: false, reason: "missing_year" });
    expect(extractYear(null, YEARS)).toEqual({ ok: false, reason: "missing_year" });
  });

  it("rejects years below the floor", () => {
    expect(extractYear("Chevette 1975", YEARS)).toEqual({ ok: false, reason: "year_out_of_range" });
  });
});

describe("parsePrice", () => {
  it("parses Brazilian formatting", () => {
    expect(parsePrice("R$ 45.990", PRICES)).toEqual({ ok: true, value: 45990 });
    expect(parsePrice("R$ 45.990,50", PRICES)).toEqual({ ok: true, value: 45990.5 });
  });

  it("distinguishes missing, malformed and out-of-range prices", () => {
    expect(parsePrice(null, PRICES)).toEqual({ ok: false, reason: "missing_price" });
    expect(parsePrice("  ", PRICES)).toEqual({ ok: false, reason: "missing_price" });
    expect(parsePrice("Consulte", PRICES)).toEqual({ ok: false, reason: "malformed_price" });
    expect(parsePrice("R$ 500", PRICES)).toEqual({ ok: false, reason: "price_out_of_range" });
    expect(parsePrice("R$ 0", PRICES)).toEqual({ ok: false, reason: "price_out_of_range" });
    expect(parsePrice("R$ 2.500.000", PRICES)).toEqual({ ok: false, reason: "price_out_of_range" });
  });
});

describe("parseMileage", () => {
  it("parses km text", () => {
    expect(parseMileage("45.000 km")).toEqual({ ok: true, value: 45000 });
    expect(parseMileage("0 km")).toEqual({ ok: true, value: 0 });
  });

  it("treats absent mileage as null", () => {
    expect(parseMileage(null)).toEqual({ ok: true, value: null });
    expect(parseMileage("")).toEqual({ ok: true, value: null });
  });

  it("rejects malformed and implausible mileage", () => {
    expect(parseMileage("muito")).toEqual({ ok: false, reason: "malformed_mileage" });
    expect(parseMileage("1.500.000 km")).toEqual({ ok: false, reason: "mileage_out_of_range" });
  });
});

describe("parseMotor and parseDoors", () => {
  it("reads plausible displacement", () => {
    expect(parseMotor("1.6")).toBe(1.6);
    expect(parseMotor("Motor 2,0")).toBe(2);
    expect(parseMotor("16")).toBeNull();
    expect(parseMotor(null)).toBeNull();
  });

  it("reads plausible door counts", () => {
    expect(parseDoors("4 portas")).toBe(4);
    expect(parseDoors("7")).toBeNull();
    expect(parseDoors("sem")).toBeNull();
  });
});

describe("parseLocation", () => {
  it("splits city, state and zip", () => {
    expect(parseLocation("São Paulo, SP, 05422-000")).toEqual({
      city: "são paulo",
      stateClean: "SP",
      zipCode: "05422-000",
    });
  });

  it("splits on a spaced dash", () => {
    expect(parseLocation("Curitiba - PR")).toEqual({ city: "curitiba", stateClean: "PR", zipCode: null });
  });

  it("maps full state names without accents", () => {
    expect(parseLocation("Vitória, Espírito Santo")).toEqual({
      city: "vitória",
      stateClean: "ES",
      zipCode: null,
    });
  });

  it("uses a trailing state code in the city", () => {
    expect(parseLocation("Belo Horizonte MG")).toEqual({
      city: "belo horizonte",
      stateClean: "MG",
      zipCode: null,
    });
  });

  it("falls back to UNKNOWN", () => {
    expect(parseLocation("Atlantida, XX")).toEqual({ city: "atlantida", stateClean: "UNKNOWN", zipCode: null });
    expect(parseLocation(null)).toEqual({ city: null, stateClean: "UNKNOWN", zipCode: null });
  });
});

describe("canonicalState", () => {
  it("accepts codes in any case and names with or without accents", () => {
    expect(canonicalState("rj")).toBe("RJ");
    expect(canonicalState("Paraná")).toBe("PR");
    expect(canonicalState("PARANA")).toBe("PR");
    expect(canonicalState("Narnia")).toBe("UNKNOWN");
  });
});

describe("normalizeBrand", () => {
  it("resolves OLX brand labels through the alias table", () => {
    expect(normalizeBrand("VW - VolksWagen")).toBe("VOLKSWAGEN");
    expect(normalizeBrand("GM - Chevrolet")).toBe("CHEVROLET");
    expect(normalizeBrand("Citroën")).toBe("CITROEN");
  });

  it("upper-cases unknown brands and takes the name after a dash", () => {
    expect(normalizeBrand("honda")).toBe("HONDA");
    expect(normalizeBrand("XY - Volvo")).toBe("VOLVO");
  });

  it("returns UNKNOWN for blanks", () => {
    expect(normalizeBrand(null)).toBe("UNKNOWN");
    expect(normalizeBrand("nan")).toBe("UNKNOWN");
  });
});

describe("cleanText and normalizeOptionName", () => {
  it("collapses whitespace and drops placeholders", () => {
    expect(cleanText("  Flex \n  Gasolina ")).toBe("Flex Gasolina");
    expect(cleanText("None")).toBeNull();
    expect(cleanText("NULL")).toBeNull();
    expect(cleanText("")).toBeNull();
  });

  it("builds column-safe option keys", () => {
    expect(normalizeOptionName("Tração 4x4")).toBe("tracao_4x4");
    expect(normalizeOptionName("  Ar-condicionado ")).toBe("ar_condicionado");
    expect(normalizeOptionName("Único dono")).toBe("unico_dono");
  });
});
