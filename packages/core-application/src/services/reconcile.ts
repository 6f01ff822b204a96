import {
  emptyChangeSet,
  indexByFullPath,
  type ChangeSet,
  type FileRecord,
} from "@file-inventory/core-domain";

export type ReconcileResult = {
  records: FileRecord[];
  changes: ChangeSet;
};

function noteOf(record: FileRecord | undefined): string {
  return record?.manualNotes == null ? "" : String(record.manualNotes);
}

/**
 * Merge a fresh scan with the previously persisted records.
 *
 * Current files come first, in scan order, as `Added`, `Updated` or `Active`
 * with their notes carried forward. Previously tracked files that are gone
 * follow as `Removed` tombstones, but only when they carry a note; the rest
 * are dropped.
 */
export function reconcile(
  currentScan: readonly FileRecord[],
  previous: readonly FileRecord[]
): ReconcileResult {
  const previousByPath = indexByFullPath(previous);
  const unmatched = new Set(previousByPath.keys());

  const changes = emptyChangeSet();
  const records: FileRecord[] = [];

  for (const current of currentScan) {
    const old = previousByPath.get(current.fullPath);
    changes.scanned++;

    if (old) {
      const changed = old.sizeBytes !== current.sizeBytes || old.lastModified !== current.lastModified;
      if (changed) changes.updated++;
      records.push({
        ...current,
        status: changed ? "Updated" : "Active",
        manualNotes: noteOf(old),
      });
      unmatched.delete(current.fullPath);
    } else {
      changes.added++;
      records.push({ ...current, status: "Added", manualNotes: "" });
    }
  }

  for (const key of unmatched) {
    const old = previousByPath.get(key);
    if (!old) continue;

    const note = noteOf(old);
    if (!note.trim()) continue;

    records.push({ ...old, fullPath: key, status: "Removed", manualNotes: note });
    changes.removedWithNotes++;
  }

  return { records, changes };
}

export function summarizeChanges(changes: ChangeSet): string {
  return (
    `Scan complete. Found ${changes.scanned} files. ` +
    `(${changes.added} new, ${changes.updated} updated, ${changes.removedWithNotes} removed-kept-with-notes).`
  );
}
