import type { ISODateString } from "./Primitives";

export const SYMPTOM_TYPES = [
  "menstrual_cramps",
  "severe_cramps",
  "pelvic_pain",
  "sudden_pelvic_pain",
  "lower_back_pain",
  "thigh_pain",
  "leg_pain",
  "heavy_bleeding",
  "prolonged_bleeding",
  "large_clots",
  "spotting",
  "irregular_periods",
  "missed_period",
  "light_periods",
  "acne",
  "weight_gain",
  "weight_loss",
  "hirsutism",
  "scalp_hair_loss",
  "dark_skin_patches",
  "painful_intercourse",
  "painful_bowel_movements",
  "fatigue",
  "nausea",
  "vomiting",
  "diarrhea",
  "constipation",
  "bloating",
  "breast_tenderness",
  "food_cravings",
  "mood_swings",
  "irritability",
  "anxiety",
  "depression",
  "anger_outbursts",
  "difficulty_concentrating",
  "insomnia",
  "headache",
  "dizziness",
  "shortness_of_breath",
  "pelvic_pressure",
  "frequent_urination",
  "temperature_sensitivity",
  "vision_changes",
] as const;

export type SymptomType = (typeof SYMPTOM_TYPES)[number];

export const MOOD_TAGS = ["happy", "calm", "energetic", "anxious", "sad", "irritable", "tired"] as const;

export type MoodTag = (typeof MOOD_TAGS)[number];

export type SymptomSeverity = 1 | 2 | 3 | 4 | 5;

export interface SymptomEntry {
  readonly id: string;
  readonly date: ISODateString;
  readonly symptomType: SymptomType;

  // 1 = barely noticeable, 5 = stops daily activity.
  readonly severity: SymptomSeverity;

  readonly moodTag?: MoodTag;

  // Free text stays with the user. It is never read by scoring.
  readonly notes?: string;
}

const SYMPTOM_TYPE_SET: ReadonlySet<string> = new Set(SYMPTOM_TYPES);

export function isSymptomType(value: string): value is SymptomType {
  return SYMPTOM_TYPE_SET.has(value);
}
