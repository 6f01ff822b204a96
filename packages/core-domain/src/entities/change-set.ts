/** Counts reported after a reconciliation pass. */
export interface ChangeSet {
  scanned: number;
  added: number;
  updated: number;
  removedWithNotes: number;
}

export function emptyChangeSet(): ChangeSet {
  return { scanned: 0, added: 0, updated: 0, removedWithNotes: 0 };
}
