#!/usr/bin/env node
/**
 * HRU parameter file extractor CLI
 *
 * Reads a ventilation unit parameter file (.par / .mdb, via mdbtools),
 * lists its firmware versions and prints MQTT sensor discovery descriptors
 * (or the parameter catalog) for one version.
 *
 * Usage:
 *   npx tsx extract.ts --file parameters/HRU250-300.par
 *   npx tsx extract.ts --file HRU250-300.par --version 4 --format json
 *
 * Environment variables (or .env file):
 *   PARAMETER_FILE (alternative to --file)
 *   DEVICE_ID, ROOT_TOPIC, MDB_TIMEOUT_MS, CARRY_OVER_MISSING_TABLES
 *   LOG_LEVEL (debug|info|warn|error, default: info)
 */
import "dotenv/config";
import { writeFileSync } from "node:fs";
import { isOutputFormat, type OutputFormat, renderParameters, renderSensors, serializerFor } from "./src/services/catalog-output.js";
import { withParameterCatalog } from "./src/services/parameter-catalog.js";
import { isLanguage, LANGUAGES, type Language } from "./src/types/catalog.js";
import { CatalogError, errorMessage } from "./src/utils/errors.js";
import logger from "./src/utils/logger.js";

interface CliArgs {
  file: string;
  version: number | null;
  listVersions: boolean;
  parameters: boolean;
  format: OutputFormat;
  output: string | null;
  language: Language;
}

const HELP = `
HRU parameter extractor — parameter file → MQTT sensor discovery

Usage:
  npx tsx extract.ts --file <path> [options]

Options:
  --file, -f <path>      Parameter file (.par or .mdb)
  --version, -v <n>      Firmware version (default: latest)
  --list-versions        Print the discovered versions and exit
  --parameters           Export the parameter catalog instead of sensors
  --format <yaml|json>   Output format (default: yaml)
  --language <nl|en|de>  Language of sensor names (default: en)
  --output, -o <path>    Write to a file instead of stdout
  --help, -h             Show this help

Environment:
  PARAMETER_FILE         Alternative to --file
  DEVICE_ID              Device identifier for unique ids (default: itho_432432)
  ROOT_TOPIC             MQTT root topic (default: itho_wtw)
  MDB_TIMEOUT_MS         Timeout per mdbtools call (default: 60000)
  CARRY_OVER_MISSING_TABLES  Reuse the previous version's table (default: true)
  LOG_LEVEL              debug | info | warn | error (default: info)
`;

// ── Parse CLI args ──────────────────────────────────────────
function usageError(msg: string): never {
  console.error(`Error: ${msg}`);
  process.exit(1);
}

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  const parsed: CliArgs = {
    file: process.env.PARAMETER_FILE || "",
    version: null,
    listVersions: false,
    parameters: false,
    format: "yaml",
    output: null,
    language: "en",
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if ((arg === "--file" || arg === "-f") && next) {
      parsed.file = next;
      i++;
    } else if ((arg === "--version" || arg === "-v") && next) {
      const version = parseInt(next, 10);
      if (!Number.isInteger(version) || version < 1) usageError(`Invalid version: ${next}`);
      parsed.version = version;
      i++;
    } else if (arg === "--format" && next) {
      if (!isOutputFormat(next)) usageError(`Unknown format: ${next} (expected yaml or json)`);
      parsed.format = next;
      i++;
    } else if (arg === "--language" && next) {
      if (!isLanguage(next)) usageError(`Unknown language: ${next} (expected ${LANGUAGES.join(", ")})`);
      parsed.language = next;
      i++;
    } else if ((arg === "--output" || arg === "-o") && next) {
      parsed.output = next;
      i++;
    } else if (arg === "--list-versions") {
      parsed.listVersions = true;
    } else if (arg === "--parameters") {
      parsed.parameters = true;
    } else if (arg === "--help" || arg === "-h") {
      console.log(HELP);
      process.exit(0);
    } else {
      usageError(`Unknown or incomplete option: ${arg}`);
    }
  }

  if (!parsed.file) usageError("Parameter file required. Use --file <path> or set PARAMETER_FILE env var.");
  return parsed;
}

// ── Main ────────────────────────────────────────────────────
function main(): void {
  const args = parseArgs();
  logger.info(`Parameter file: ${args.file}`);

  const rendered = withParameterCatalog(args.file, { sensors: { language: args.language } }, catalog => {
    const versions = catalog.versions();
    if (args.listVersions) return `${versions.join("\n")}\n`;

    const version = args.version ?? catalog.latestVersion();
    if (version === null) throw new CatalogError("unknown_version", `No firmware versions found in ${args.file}`, { file: args.file });
    logger.info(`Using firmware version ${version} (available: ${versions.join(", ")})`);

    const serializer = serializerFor(args.format);
    return args.parameters
      ? renderParameters(catalog.parameters(version), serializer)
      : renderSensors(catalog.sensors(version), serializer);
  });

  if (args.output) {
    writeFileSync(args.output, rendered, "utf8");
    logger.info(`✅ Written to ${args.output}`);
  } else {
    process.stdout.write(rendered);
  }
}

try {
  main();
} catch (e) {
  if (e instanceof CatalogError) {
    logger.error(`Extraction failed: ${e.message}`);
  } else {
    logger.error(`Fatal error: ${errorMessage(e)}`, e instanceof Error ? { stack: e.stack } : undefined);
  }
  process.exit(1);
}
