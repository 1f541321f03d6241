import type { SeverityBand } from "../domain/Diagnosis";
import type { ScreeningPolicy } from "../config/screeningPolicy";

// Monotonic banding of a risk score. Below the activation threshold there is no band.
export function classifySeverity(score: number, policy: ScreeningPolicy): SeverityBand | null {
  if (score < policy.activationThreshold) return null;
  if (score < policy.mildCutpoint) return "low";
  if (score < policy.moderateCutpoint) return "mild";
  if (score < policy.highCutpoint) return "moderate";
  if (score < policy.criticalCutpoint) return "high";
  return "critical";
}

// Wording used in assessment text.
export function riskLevelLabel(severity: SeverityBand): "low" | "moderate" | "high" {
  switch (severity) {
    case "low":
    case "mild":
      return "low";
    case "moderate":
      return "moderate";
    case "high":
    case "critical":
      return "high";
  }
}
