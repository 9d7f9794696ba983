import { completionService, type CompletionStore } from "./completion.service";
import { completionKeysToIds, parseCompletionKey } from "../utils/completion-keys";

export type CompletionSubject =
  | { kind: "user"; userId: number }
  | { kind: "anonymous"; keys: readonly string[] };

export type SkipReason = "malformed_key" | "unknown_challenge";

export interface SkippedKey {
  key: string;
  reason: SkipReason;
}

export interface FailedKey {
  key: string;
  error: string;
}

export interface ReconcileResult {
  /** Rows newly created; existing rows and skipped keys are not counted. */
  mergedCount: number;
  /** What the anonymous set should hold afterwards: only keys whose write failed. */
  remainingKeys: string[];
  skipped: SkippedKey[];
  failed: FailedKey[];
}

export function createCompletionReconciler(store: CompletionStore) {
  const queues = new Map<number, Promise<unknown>>();

  // Runs tasks for the same user one after another
  async function serialize<T>(userId: number, task: () => Promise<T>): Promise<T> {
    const previous = queues.get(userId) ?? Promise.resolve();
    const run = previous.then(task, task);
    // The chain only tracks completion; `run` still rejects for the caller
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    queues.set(userId, tail);

    try {
      return await run;
    } finally {
      if (queues.get(userId) === tail) {
        queues.delete(userId);
      }
    }
  }

  async function merge(userId: number, anonymousKeys: readonly string[]): Promise<ReconcileResult> {
    const result: ReconcileResult = { mergedCount: 0, remainingKeys: [], skipped: [], failed: [] };

    for (const key of new Set(anonymousKeys)) {
      const challengeId = parseCompletionKey(key);
      if (challengeId === null) {
        console.warn(`[reconcile] user:${userId} dropping malformed key "${key}"`);
        result.skipped.push({ key, reason: "malformed_key" });
        continue;
      }

      try {
        if (!(await store.challengeExists(challengeId))) {
          console.warn(`[reconcile] user:${userId} dropping key "${key}": no such challenge`);
          result.skipped.push({ key, reason: "unknown_challenge" });
          continue;
        }

        if (await store.createIfAbsent(userId, challengeId)) {
          result.mergedCount += 1;
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[reconcile] user:${userId} failed to store "${key}", keeping it for retry:`, message);
        result.failed.push({ key, error: message });
        result.remainingKeys.push(key);
      }
    }

    if (anonymousKeys.length > 0) {
      console.log(
        `[reconcile] user:${userId} merged ${result.mergedCount}, ` +
          `skipped ${result.skipped.length}, failed ${result.failed.length}`
      );
    }

    return result;
  }

  return {
    /**
     * Moves anonymous completions into the user's durable completions.
     * Safe to repeat: keys already stored for the user are no-ops.
     */
    reconcile(userId: number, anonymousKeys: readonly string[]): Promise<ReconcileResult> {
      return serialize(userId, () => merge(userId, anonymousKeys));
    },

    async isCompleted(subject: CompletionSubject, challengeId: number): Promise<boolean> {
      if (subject.kind === "user") {
        return store.exists(subject.userId, challengeId);
      }
      // Keys naming a missing challenge are dropped on merge, so they never count here either
      if (!completionKeysToIds(subject.keys).includes(challengeId)) return false;
      return store.challengeExists(challengeId);
    },

    async completedChallengeIds(subject: CompletionSubject): Promise<number[]> {
      if (subject.kind === "user") {
        return store.listChallengeIds(subject.userId);
      }
      const ids = completionKeysToIds(subject.keys);
      const exists = await Promise.all(ids.map((id) => store.challengeExists(id)));
      return ids.filter((_, index) => exists[index]);
    },
  };
}

export type CompletionReconciler = ReturnType<typeof createCompletionReconciler>;

export const reconcileService = createCompletionReconciler(completionService);
