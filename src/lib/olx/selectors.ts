// Selectors for OLX Brazil pages. Class names are hashed by their build, so
// most selectors match on stable prefixes or suffixes.

export const SEARCH = {
  card: "div[class^='olx-adcard__content']",
  link: "a",
  title: "h2[class^='typo-body-large']",
  price: "h3[class^='typo-body-large']",
  mileage: "[aria-label$='quilômetros rodados']",
  color: "[aria-label^='Cor']",
  motor: "[aria-label^='Motor']",
} as const;

export const LISTING = {
  /** Present once the JS-populated detail section has rendered. */
  ready: "#details",
  title: "h1",
  price: ["#price-box-container h2", "[data-testid='ad-price'] h2", "h2[class*='price']"],
  description: "[data-section='description']",
  detailRow: "#details [data-ds-component='DS-Container']",
  detailLabel: "span[data-variant='overline']",
  detailValue: "a, span:not([data-variant='overline'])",
  option: "div[class^='ad__sc-1jr3zuf-1']",
  location: "div[class$='gYzJpw']",
  neighborhood: "span.olx-text--body-medium",
  cityStateZip: "span.olx-text--body-small",
} as const;
