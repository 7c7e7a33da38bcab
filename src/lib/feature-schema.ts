import { z } from "zod";
import { FeatureRecord } from "./types";

/** Bump whenever a column is added, removed, renamed or retyped. */
export const FEATURE_SCHEMA_VERSION = "v1";

export type FeatureColumnType = "text" | "real" | "flag";

export interface FeatureColumn {
  name: keyof FeatureRecord;
  type: FeatureColumnType;
  nullable: boolean;
}

// Column order is part of the schema.
export const FEATURE_COLUMNS: readonly FeatureColumn[] = [
  { name: "listing_id", type: "text", nullable: false },
  { name: "log_price", type: "real", nullable: false },
  { name: "car_age", type: "real", nullable: false },
  { name: "km_per_year", type: "real", nullable: true },
  { name: "motor", type: "real", nullable: true },
  { name: "marca", type: "text", nullable: false },
  { name: "state_clean", type: "text", nullable: false },
  { name: "transmission", type: "text", nullable: true },
  { name: "fuel", type: "text", nullable: true },
  { name: "leather_seats", type: "flag", nullable: false },
  { name: "sunroof", type: "flag", nullable: false },
  { name: "four_wheel_drive", type: "flag", nullable: false },
  { name: "armored", type: "flag", nullable: false },
  { name: "single_owner", type: "flag", nullable: false },
];

const flag = z.union([z.literal(0), z.literal(1)]);

export const featureRecordSchema: z.ZodType<FeatureRecord, z.ZodTypeDef, unknown> = z.object({
  listing_id: z.string().min(1),
  log_price: z.number().finite(),
  car_age: z.number().finite().positive(),
  km_per_year: z.number().finite().nullable(),
  motor: z.number().finite().nullable(),
  marca: z.string().min(1),
  state_clean: z.string().min(1),
  transmission: z.string().nullable(),
  fuel: z.string().nullable(),
  leather_seats: flag,
  sunroof: flag,
  four_wheel_drive: flag,
  armored: flag,
  single_owner: flag,
});

export function sqlColumnType(type: FeatureColumnType): string {
  switch (type) {
    case "text":
      return "TEXT";
    case "real":
      return "REAL";
    case "flag":
      return "INTEGER";
  }
}
