// Shared primitives for the cycle insight domain.
// NOTE: These are domain contracts only.
// - No persistence assumptions.
// - No in-place mutation: fields are readonly.

// Calendar day, "YYYY-MM-DD". Day arithmetic is done in UTC.
export type ISODateString = string;

// Full ISO-8601 date-time string.
export type ISODateTimeString = string;

export type UserId = string;

export type ConfidenceLevel = "low" | "medium" | "high";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | { readonly [k: string]: JsonValue } | readonly JsonValue[];
