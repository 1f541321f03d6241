import type { Diagnosis } from "../domain/Diagnosis";

// Outbound collaborator: tells the user a diagnosis is due for re-screening.
// Delivery (push, email, in-app) belongs to the implementation.
export interface FollowUpNotifier {
  notifyFollowUpDue(diagnosis: Diagnosis): Promise<void>;
}

// Default notifier: writes a log line. Never logs assessment text or symptoms.
export class ConsoleFollowUpNotifier implements FollowUpNotifier {
  async notifyFollowUpDue(diagnosis: Diagnosis): Promise<void> {
    console.log(
      `[FollowUp] ${diagnosis.conditionId} (${diagnosis.severity}) due ${diagnosis.followUpDate ?? "now"} for user ${diagnosis.userId.slice(0, 8)}...`,
    );
  }
}
