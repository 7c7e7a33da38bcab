import brStates from "./data/br-states.json";

// ===== State Normalization Maps =====
// UF codes, plus full names keyed without accents in upper case

export const STATE_CODES: ReadonlySet<string> = new Set(
  brStates.map((s) => s.code)
);

export const STATE_NAME_TO_CODE: Record<string, string> = Object.fromEntries(
  brStates.map((s) => [stripAccents(s.name).toUpperCase(), s.code])
);

// ===== Brand Normalization Maps =====
// OLX brand labels and common spellings → canonical upper-case brand

export const BRAND_ALIASES: Record<string, string> = {
  "vw": "VOLKSWAGEN",
  "vw - volkswagen": "VOLKSWAGEN",
  "volks": "VOLKSWAGEN",
  "gm": "CHEVROLET",
  "gm - chevrolet": "CHEVROLET",
  "chevy": "CHEVROLET",
  "kia motors": "KIA",
  "caoa chery": "CHERY",
  "chery/caoa chery": "CHERY",
  "mercedes": "MERCEDES-BENZ",
  "mercedes benz": "MERCEDES-BENZ",
  "land-rover": "LAND ROVER",
  "citroen": "CITROEN",
  "ram": "RAM",
  "dodge/ram": "RAM",
};

// ===== Text Cleanup =====

/** Placeholder strings that mean "no value" once text is cleaned. */
export const BLANK_TOKENS: ReadonlySet<string> = new Set([
  "",
  "nan",
  "none",
  "null",
  "-",
]);

// ===== Detail Section Keys =====
// Labels of the listing detail section after normalizeOptionName

export const DETAIL_KEYS = {
  brand: "marca",
  model: "modelo",
  mileage: "quilometragem",
  fuel: "combustivel",
  transmission: "cambio",
  color: "cor",
  doors: "portas",
  motorPower: "potencia_do_motor",
  category: "categoria",
  steering: "direcao",
  vehicleType: "tipo_de_veiculo",
} as const;

// ===== Feature Option Keys =====
// Extras that become boolean feature columns

export const FEATURE_OPTIONS = {
  leather_seats: "bancos_de_couro",
  sunroof: "teto_solar",
  four_wheel_drive: "tracao_4x4",
  armored: "blindado",
  single_owner: "unico_dono",
} as const;

export function stripAccents(text: string): string {
  return text.normalize("NFD").replace(/[\u0300-\u036f]/g, "");
}
