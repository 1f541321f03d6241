import type { ISODateString } from "./Primitives";

export type FlowIntensity = "spotting" | "light" | "medium" | "heavy" | "very_heavy";

export const FLOW_INTENSITIES = ["spotting", "light", "medium", "heavy", "very_heavy"] as const satisfies readonly FlowIntensity[];

// One menstrual cycle, keyed by the first day of bleeding.
// Records are ordered by startDate and never overlap.
// The engine only reads them; the logging interface appends them.
export interface CycleRecord {
  readonly id: string;
  readonly startDate: ISODateString;

  // Last day of bleeding, inclusive. Absent while the period is still ongoing.
  readonly endDate?: ISODateString | null;

  readonly flowIntensity: FlowIntensity;
}
