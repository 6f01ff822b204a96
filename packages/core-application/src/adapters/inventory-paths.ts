import path from "node:path";

export const TEMP_SUFFIX = "_temp.xlsx";
export const BACKUP_SUFFIX = ".bak";
// temp name written by older releases; still picked up by recovery
export const LEGACY_TEMP_SUFFIX = ".xlsx.tmp";

export function tempPathFor(location: string): string {
  return `${location}${TEMP_SUFFIX}`;
}

/** Temp saves recovery looks at, in order of preference. */
export function recoveryTempPathsFor(location: string): string[] {
  return [tempPathFor(location), `${location}${LEGACY_TEMP_SUFFIX}`];
}

export function rollingBackupPathFor(location: string): string {
  return `${location}${BACKUP_SUFFIX}`;
}

export function rotatingBackupPrefixFor(location: string): string {
  return `${path.basename(location)}${BACKUP_SUFFIX}.`;
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function backupTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * True for the inventory table itself and every file the store writes next
 * to it (backups, temp saves).
 */
export function isInventoryArtifact(fileName: string, location: string): boolean {
  const base = path.basename(location);
  return (
    fileName === base ||
    fileName === `${base}${TEMP_SUFFIX}` ||
    fileName === `${base}${LEGACY_TEMP_SUFFIX}` ||
    fileName.startsWith(`${base}${BACKUP_SUFFIX}`)
  );
}
