/**
 * Centralised configuration — fixed at start-up from the environment
 */

function envBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (val === undefined || val === "") return fallback;
  return !["0", "false", "no", "off"].includes(val.toLowerCase());
}

const ROOT_TOPIC = process.env.ROOT_TOPIC || "itho_wtw";

export const MQTT_CONFIG = {
  deviceId: process.env.DEVICE_ID || "itho_432432",
  rootTopic: ROOT_TOPIC,
  statusTopic: `${ROOT_TOPIC}/ithostatus`,
  availabilityTopic: `${ROOT_TOPIC}/lwt`,
  payloadAvailable: "online",
  payloadNotAvailable: "offline",
  uniqueIdSeparator: "_",
};

export type MqttConfig = typeof MQTT_CONFIG;

export const MDB_CONFIG = {
  schemaTool: "mdb-schema",
  tablesTool: "mdb-tables",
  exportTool: "mdb-export",
  timeoutMs: parseInt(process.env.MDB_TIMEOUT_MS || "60000") || 60000,
  maxBuffer: 256 * 1024 * 1024, // 256MB
};

export type MdbConfig = typeof MDB_CONFIG;

export const CATALOG_CONFIG = {
  /** Reuse the previous version's table when a version has none of its own */
  carryOverMissingTables: envBool("CARRY_OVER_MISSING_TABLES", true),
};
