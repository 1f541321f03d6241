import type { UserId } from "../domain/Primitives";

// Runs operations for one user strictly one after another.
// Screening's dedup check-then-act must never interleave for the same user.
export class UserExecutionQueue {
  private readonly tails = new Map<UserId, Promise<void>>();

  run<T>(userId: UserId, op: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(userId) ?? Promise.resolve();

    const next = prev.then(op, op);

    // Ensure queue advances even if an op fails.
    const tail = next.then(() => undefined, () => undefined);
    this.tails.set(userId, tail);

    // Drop the entry once idle so the map does not grow with every user ever seen.
    void tail.then(() => {
      if (this.tails.get(userId) === tail) this.tails.delete(userId);
    });

    return next;
  }

  get activeUsers(): number {
    return this.tails.size;
  }
}
