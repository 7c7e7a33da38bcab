import { ParseResult, UNKNOWN } from "./types";
import {
  BLANK_TOKENS,
  BRAND_ALIASES,
  STATE_CODES,
  STATE_NAME_TO_CODE,
  stripAccents,
} from "./normalization-maps";

// Every parser here is total: it returns a typed value or a rejection reason
// and never throws on odd input.

/**
 * Normalize an option or detail label into a column-safe key:
 * "Tração 4x4" → "tracao_4x4", "Ar-condicionado" → "ar_condicionado".
 */
export function normalizeOptionName(text: string): string {
  return stripAccents(text.toLowerCase())
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/** Collapse whitespace; blank or placeholder strings become null. */
export function cleanText(text: string | null): string | null {
  if (text === null) return null;
  const cleaned = text.replace(/\s+/g, " ").trim();
  if (BLANK_TOKENS.has(cleaned.toLowerCase())) return null;
  return cleaned;
}

export interface YearBounds {
  floor: number;
  currentYear: number;
}

/**
 * Model year from free-form title text. Titles usually put the year after
 * brand and model ("Corolla XEI 2019/2020"), so the rightmost standalone
 * 4-digit token inside [floor, currentYear + 1] wins.
 */
export function extractYear(
  title: string | null,
  bounds: YearBounds
): ParseResult<number> {
  if (!title) return { ok: false, reason: "missing_year" };

  const tokens = Array.from(title.matchAll(/\b\d{4}\b/g), (m) =>
    parseInt(m[0], 10)
  );
  if (tokens.length === 0) return { ok: false, reason: "missing_year" };

  for (let i = tokens.length - 1; i >= 0; i--) {
    const year = tokens[i];
    if (year >= bounds.floor && year <= bounds.currentYear + 1) {
      return { ok: true, value: year };
    }
  }
  return { ok: false, reason: "year_out_of_range" };
}

export interface PriceBounds {
  min: number;
  max: number;
}

/** "R$ 45.990" → 45990, "R$ 45.990,50" → 45990.5 */
export function parsePrice(
  text: string | null,
  bounds: PriceBounds
): ParseResult<number> {
  if (text === null || text.trim() === "") {
    return { ok: false, reason: "missing_price" };
  }

  const cleaned = text
    .replace(/R\$/gi, "")
    .replace(/\s/g, "")
    .replace(/\./g, "")
    .replace(",", ".");
  if (!/^\d+(\.\d+)?$/.test(cleaned)) {
    return { ok: false, reason: "malformed_price" };
  }

  const value = parseFloat(cleaned);
  if (value <= 0 || value < bounds.min || value > bounds.max) {
    return { ok: false, reason: "price_out_of_range" };
  }
  return { ok: true, value };
}

const MAX_MILEAGE_KM = 1_000_000;

/** "45.000 km" → 45000. Absent mileage is a valid null, not a rejection. */
export function parseMileage(text: string | null): ParseResult<number | null> {
  if (text === null || text.trim() === "") return { ok: true, value: null };

  const cleaned = text
    .toLowerCase()
    .replace(/km/g, "")
    .replace(/\s/g, "")
    .replace(/\./g, "")
    .replace(",", ".");
  if (!/^\d+(\.\d+)?$/.test(cleaned)) {
    return { ok: false, reason: "malformed_mileage" };
  }

  const value = parseFloat(cleaned);
  if (value < 0 || value > MAX_MILEAGE_KM) {
    return { ok: false, reason: "mileage_out_of_range" };
  }
  return { ok: true, value };
}

/** Engine displacement in litres ("1.6", "Motor 2,0"); implausible → null. */
export function parseMotor(text: string | null): number | null {
  if (!text) return null;
  const match = text.match(/(\d+(?:[.,]\d+)?)/);
  if (!match) return null;
  const value = parseFloat(match[1].replace(",", "."));
  return value >= 0.5 && value <= 10 ? value : null;
}

/** "4 portas" → 4; anything outside 2-5 → null. */
export function parseDoors(text: string | null): number | null {
  if (!text) return null;
  const match = text.match(/(\d+)/);
  if (!match) return null;
  const value = parseInt(match[1], 10);
  return value >= 2 && value <= 5 ? value : null;
}

/** UF code for a code or full state name, UNKNOWN otherwise. */
export function canonicalState(raw: string | null): string {
  if (!raw) return UNKNOWN;
  const key = stripAccents(raw).toUpperCase().replace(/\s+/g, " ").trim();
  if (STATE_CODES.has(key)) return key;
  return STATE_NAME_TO_CODE[key] ?? UNKNOWN;
}

export interface LocationParts {
  city: string | null;
  stateClean: string;
  zipCode: string | null;
}

const ZIP_PATTERN = /^\d{5}-?\d{3}$/;
const TRAILING_UF = /\s+([a-z]{2})$/i;

/**
 * Split "City, ST", "City - ST" or "City, ST, 01310-100". When the state
 * part is missing or unmapped, a trailing UF in the city ("sao paulo sp")
 * is used and removed from the city.
 */
export function parseLocation(text: string | null): LocationParts {
  const parts = (text ?? "")
    .split(/\s*,\s*|\s+-\s+/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);

  const zipIndex = parts.findIndex((p) => ZIP_PATTERN.test(p));
  const zipCode = zipIndex >= 0 ? parts.splice(zipIndex, 1)[0] : null;

  let city = parts.length > 0 ? parts[0].toLowerCase() : null;
  let stateClean = canonicalState(parts.length > 1 ? parts[1] : null);

  if (stateClean === UNKNOWN && city) {
    const trailing = city.match(TRAILING_UF);
    if (trailing && STATE_CODES.has(trailing[1].toUpperCase())) {
      stateClean = trailing[1].toUpperCase();
      city = city.slice(0, trailing.index).trim();
    }
  }

  return { city: city || null, stateClean, zipCode };
}

/** Canonical upper-case brand: "VW - VolksWagen" → "VOLKSWAGEN". */
export function normalizeBrand(raw: string | null): string {
  const cleaned = cleanText(raw);
  if (!cleaned) return UNKNOWN;

  const key = stripAccents(cleaned).toLowerCase();
  const alias = BRAND_ALIASES[key];
  if (alias) return alias;

  // "XX - Full Name" labels carry the full brand after the dash
  const dash = key.split(" - ");
  const name = dash[dash.length - 1].trim();
  return BRAND_ALIASES[name] ?? name.toUpperCase();
}
