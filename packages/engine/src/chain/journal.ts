/**
 * State that can be captured before a transaction and put back when the
 * transaction reverts.
 */
export interface Journaled<TSnapshot> {
  snapshot(): TSnapshot;
  restore(snapshot: TSnapshot): void;
}

export type Restorer = () => void;

export function capture<TSnapshot>(store: Journaled<TSnapshot>): Restorer {
  const saved = store.snapshot();
  return () => store.restore(saved);
}

export function isJournaled(value: object): value is Journaled<unknown> {
  return (
    "snapshot" in value &&
    typeof value.snapshot === "function" &&
    "restore" in value &&
    typeof value.restore === "function"
  );
}
