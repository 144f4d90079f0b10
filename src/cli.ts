#!/usr/bin/env node
// netschema build CLI
// Usage: netschema-build [--config netschema.yaml] [--version <v>] [--force] [--quiet]

import { existsSync } from "node:fs";
import { parseArgs } from "node:util";
import { DEFAULT_CONFIG_FILE, loadConfig } from "./config.js";
import { createLogger } from "./log.js";
import { runBuild } from "./pipeline.js";

function printUsage(): void {
  process.stderr.write(
    `Usage: netschema-build [options]

Options:
  --config <path>      Build configuration (default: ./${DEFAULT_CONFIG_FILE})
  --version, -v <ver>  Build one release instead of all supported releases
  --force              Rewrite every output even if its content is unchanged
  --quiet, -q          Only report warnings and errors
  --help, -h           Show this help

Examples:
  netschema-build                      # derive schemas for every release
  netschema-build -v 255               # derive schemas for release 255 only
  netschema-build --force              # full rebuild

Derived schemas are written to <out_dir>/<release>/<format>.schema.json.
`
  );
}

async function main(): Promise<number> {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      config: { type: "string", default: DEFAULT_CONFIG_FILE },
      version: { type: "string", short: "v" },
      force: { type: "boolean", default: false },
      quiet: { type: "boolean", default: false, short: "q" },
      help: { type: "boolean", default: false, short: "h" },
    },
    allowPositionals: false,
    strict: true,
  });

  if (values.help) {
    printUsage();
    return 0;
  }

  const configPath = values.config ?? DEFAULT_CONFIG_FILE;
  if (!existsSync(configPath)) {
    process.stderr.write(`Error: config not found: ${configPath}\n`);
    return 1;
  }

  const logger = createLogger({ quiet: values.quiet });
  const config = loadConfig(configPath);
  const report = await runBuild(config, {
    version: values.version,
    force: values.force,
    logger,
  });

  logger.info(
    `${report.written.length} file(s) written, ${report.unchanged.length} unchanged, ` +
      `${report.degraded} undocumented key(s)`
  );
  if (report.failures.length > 0) {
    logger.error(`Build failed with ${report.failures.length} error(s):`);
    for (const failure of report.failures) {
      const where = failure.version ? `${failure.format}@${failure.version}` : failure.format;
      logger.error(`  ${where}: ${failure.error.name}: ${failure.error.message.split("\n")[0]}`);
    }
    return 1;
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(
      `Fatal: ${err instanceof Error ? err.message : String(err)}\n`
    );
    process.exitCode = 1;
  }
);
