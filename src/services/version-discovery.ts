/**
 * Firmware versions are encoded in table name suffixes:
 *   Parameterlijst_V7, parameterlijst_V12, Datalabel_V3 …
 * The version set is always 1..max, even when intermediate versions
 * have no tables of their own.
 */
import logger from "../utils/logger.js";

/** Anything, then `V` and one or two digits at the very end (case-sensitive `V`) */
export const VERSION_TABLE_PATTERN = /^.+V[0-9]{1,2}$/;

/** Number after the last `_V`, or null when the name has no such suffix */
export function versionSuffix(table: string): number | null {
  if (!VERSION_TABLE_PATTERN.test(table)) return null;
  const sep = table.lastIndexOf("_V");
  if (sep === -1) return null;
  const digits = table.slice(sep + 2);
  return /^[0-9]{1,2}$/.test(digits) ? parseInt(digits, 10) : null;
}

export function discoverVersions(tables: readonly string[]): number[] {
  let max = 0;
  for (const table of tables) {
    const version = versionSuffix(table);
    if (version === null) {
      if (VERSION_TABLE_PATTERN.test(table)) {
        logger.debug(`Ignoring table without _V suffix: ${table}`, { module: "versions" });
      }
      continue;
    }
    if (version > max) max = version;
  }

  const versions = Array.from({ length: max }, (_, i) => i + 1);
  logger.debug(`Found versions: ${versions.join(", ") || "none"}`, { module: "versions" });
  return versions;
}
