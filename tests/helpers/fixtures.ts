import type { ClassificationResult, WorkItem } from "../../src/types";

export const T0 = new Date("2026-03-02T12:00:00.000Z");

/** Creates a QUEUED WorkItem fixture. */
export function makeItem(overrides?: Partial<WorkItem>): WorkItem {
  return {
    id: "1001",
    title: "Backend Developer",
    company: "Acme Logistics",
    url: "https://jobs.example.test/vacancy/1001",
    description: "TypeScript, Node.js, PostgreSQL. Remote.",
    priorityKey: "2026-03-01T09:00:00.000Z",
    status: "QUEUED",
    createdAt: T0.toISOString(),
    lastTransitionAt: T0.toISOString(),
    deliveredAt: null,
    ...overrides,
  };
}

/** Creates a ClassificationResult fixture with enrichment not attempted. */
export function makeClassification(
  overrides?: Partial<ClassificationResult>,
): ClassificationResult {
  return {
    itemId: "1001",
    accepted: true,
    score: 0.85,
    rationale: "Strong Node.js match",
    tags: ["typescript", "node.js"],
    modelUsed: "test-model",
    classifiedAt: T0.toISOString(),
    enrichment: { status: "NOT_ATTEMPTED", attempts: 0, lastAttemptAt: null },
    artifact: null,
    ...overrides,
  };
}

/** Resolves after pending microtasks and already-due timers have run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

/** A promise the test settles by hand. */
export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
