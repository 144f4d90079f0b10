// Build pipeline — derive, validate and write every (format, release) schema

import { join } from "node:path";
import { compareDocuments } from "./changelog.js";
import type { ChangelogEntry } from "./changelog.js";
import type { BuildConfig } from "./config.js";
import { deriveRelease } from "./derive.js";
import { ConfigError, InputUnavailable, SchemaError, VersionMismatch } from "./errors.js";
import { buildLedger } from "./ledger.js";
import type { LifespanLedger } from "./ledger.js";
import { silentLogger } from "./log.js";
import type { Logger } from "./log.js";
import type { CuratedSchemaDocument, FormatType, RawSchemaDocument } from "./model.js";
import { parseCuratedFile, parseRawFile } from "./parser.js";
import { renderDocument, writeIfChanged } from "./serializer.js";
import { validateCurated } from "./validator.js";
import { compareVersions } from "./versions.js";

export interface BuildOptions {
  /** Build one release instead of every configured release. */
  version?: string;
  /** Rewrite every output even when its content is unchanged. */
  force?: boolean;
  logger?: Logger;
}

export interface BuildFailure {
  format: FormatType;
  version?: string;       // absent when the whole format was aborted
  error: Error;
}

export interface BuildReport {
  written: string[];
  unchanged: string[];
  failures: BuildFailure[];
  degraded: number;       // undocumented keys across written and unchanged outputs
}

// --- Layout ---

export function rawPath(config: BuildConfig, version: string, format: FormatType): string {
  return join(config.rawDir, version, `${format}.json`);
}

export function curatedPath(config: BuildConfig, format: FormatType): string {
  return join(config.curatedDir, `${format}.yaml`);
}

function schemaFileName(config: BuildConfig, format: FormatType): string {
  return `${format}.schema.${config.outputFormat}`;
}

export function outputPath(config: BuildConfig, version: string, format: FormatType): string {
  return join(config.outDir, version, schemaFileName(config, format));
}

export function changesPath(config: BuildConfig, version: string, format: FormatType): string {
  return join(config.outDir, version, `${format}.changes.json`);
}

export function schemaId(config: BuildConfig, version: string, format: FormatType): string | undefined {
  if (!config.idBase) return undefined;
  return `${config.idBase}/${version}/${schemaFileName(config, format)}`;
}

export function selectVersions(config: BuildConfig, version?: string): string[] {
  if (version === undefined) return [...config.versions];
  const match = config.versions.find((v) => compareVersions(v, version) === 0);
  if (!match) {
    throw new ConfigError(
      `Version ${version} is not in the supported list: ${config.versions.join(", ")}`
    );
  }
  return [match];
}

// --- Inputs ---

interface FormatInputs {
  curatedBase: CuratedSchemaDocument;
  raws: Map<string, RawSchemaDocument>;
  ledger: LifespanLedger;
}

function loadRaw(config: BuildConfig, version: string, format: FormatType): RawSchemaDocument {
  const path = rawPath(config, version, format);
  const raw = parseRawFile(path);
  if (raw.format !== format || compareVersions(raw.version, version) !== 0) {
    throw new InputUnavailable(
      `${path} describes ${raw.format}@${raw.version}, expected ${format}@${version}`
    );
  }
  if (Object.keys(raw.sections).length === 0) {
    throw new InputUnavailable(`${path} has no sections; release data unavailable`);
  }
  // Directory names are the canonical release identifiers
  return { ...raw, version };
}

function loadInputs(config: BuildConfig, format: FormatType): FormatInputs {
  const curatedBase = parseCuratedFile(curatedPath(config, format));
  if (curatedBase.format !== format) {
    throw new VersionMismatch(
      `Curated baseline ${curatedPath(config, format)} is a ${curatedBase.format} schema`,
      format,
      curatedBase.format
    );
  }
  if (compareVersions(curatedBase.version, config.baseVersion) !== 0) {
    throw new VersionMismatch(
      `Curated ${format} baseline is for ${curatedBase.version}, configured base is ${config.baseVersion}`,
      config.baseVersion,
      curatedBase.version
    );
  }
  const validation = validateCurated(curatedBase);
  if (!validation.isValid) {
    throw new InputUnavailable(
      `Curated ${format} baseline is invalid:\n  ${validation.errors.join("\n  ")}`
    );
  }

  const raws = new Map<string, RawSchemaDocument>();
  for (const version of config.versions) raws.set(version, loadRaw(config, version, format));
  return {
    curatedBase: { ...curatedBase, version: config.baseVersion },
    raws,
    ledger: buildLedger([...raws.values()]),
  };
}

function requireRaw(inputs: FormatInputs, version: string): RawSchemaDocument {
  const raw = inputs.raws.get(version);
  if (!raw) throw new InputUnavailable(`No raw schema loaded for ${version}`);
  return raw;
}

// --- Per-format build ---

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function countDegraded(doc: CuratedSchemaDocument): number {
  let count = 0;
  for (const section of Object.values(doc.sections)) {
    for (const key of Object.values(section.keys)) if (!key.curated) count++;
  }
  return count;
}

function deriveOne(
  config: BuildConfig,
  format: FormatType,
  inputs: FormatInputs,
  version: string
): CuratedSchemaDocument {
  const { document } = deriveRelease({
    curatedBase: inputs.curatedBase,
    rawBase: requireRaw(inputs, config.baseVersion),
    rawTarget: requireRaw(inputs, version),
    ledger: inputs.ledger,
  });
  const id = schemaId(config, version, format);
  if (id !== undefined) document.id = id;
  const validation = validateCurated(document);
  if (!validation.isValid) {
    throw new SchemaError(
      `Derived ${format} schema for ${version} is invalid:\n  ${validation.errors.join("\n  ")}`
    );
  }
  return document;
}

function predecessor(config: BuildConfig, version: string): string | undefined {
  const index = config.versions.indexOf(version);
  return index > 0 ? config.versions[index - 1] : undefined;
}

interface FormatPlan {
  format: FormatType;
  report: BuildReport;
  derived: Map<string, CuratedSchemaDocument>;
  changes: Map<string, ChangelogEntry>;
}

/**
 * Load, derive and diff one format entirely in memory. A VersionMismatch
 * propagates; every other failure is recorded on the plan's report.
 */
function planFormat(
  config: BuildConfig,
  format: FormatType,
  selected: string[],
  logger: Logger
): FormatPlan {
  const plan: FormatPlan = {
    format,
    report: { written: [], unchanged: [], failures: [], degraded: 0 },
    derived: new Map(),
    changes: new Map(),
  };
  const { report, derived, changes } = plan;

  let inputs: FormatInputs;
  try {
    inputs = loadInputs(config, format);
  } catch (err) {
    if (err instanceof VersionMismatch) throw err;
    const error = asError(err);
    logger.error(`${format}: aborted: ${error.message}`);
    report.failures.push({ format, error });
    return plan;
  }

  for (const version of selected) {
    try {
      derived.set(version, deriveOne(config, format, inputs, version));
    } catch (err) {
      if (err instanceof VersionMismatch) throw err;
      const error = asError(err);
      logger.error(`${format}@${version}: ${error.message}`);
      report.failures.push({ format, version, error });
    }
  }

  // Predecessors are derived in memory only, for the per-release change lists
  for (const version of selected) {
    const current = derived.get(version);
    const previousVersion = predecessor(config, version);
    if (!current || previousVersion === undefined) continue;
    let previous = derived.get(previousVersion);
    if (!previous) {
      try {
        previous = deriveOne(config, format, inputs, previousVersion);
      } catch (err) {
        if (err instanceof VersionMismatch) throw err;
        logger.warn(
          `${format}@${version}: change list skipped, ${previousVersion} cannot be derived: ${asError(err).message}`
        );
        continue;
      }
    }
    changes.set(version, {
      format,
      previous: previousVersion,
      current: version,
      changes: compareDocuments(previous, current),
    });
  }
  return plan;
}

async function writeFormat(
  config: BuildConfig,
  plan: FormatPlan,
  selected: string[],
  options: BuildOptions,
  logger: Logger
): Promise<BuildReport> {
  const { format, report, derived, changes } = plan;
  await Promise.all(
    selected.map(async (version) => {
      const document = derived.get(version);
      if (!document) return;
      const entry = changes.get(version);
      try {
        const targets: [string, string][] = [
          [outputPath(config, version, format), renderDocument(document, config.outputFormat)],
        ];
        if (entry) {
          targets.push([changesPath(config, version, format), `${JSON.stringify(entry, null, 2)}\n`]);
        }
        for (const [path, content] of targets) {
          const outcome = await writeIfChanged(path, content, { force: options.force });
          if (outcome === "written") {
            report.written.push(path);
            logger.info(`wrote ${path}`);
          } else {
            report.unchanged.push(path);
          }
        }
        const degraded = countDegraded(document);
        report.degraded += degraded;
        if (degraded > 0) {
          logger.warn(`${format}@${version}: ${degraded} undocumented key(s)`);
        }
      } catch (err) {
        const error = asError(err);
        logger.error(`${format}@${version}: ${error.message}`);
        report.failures.push({ format, version, error });
      }
    })
  );
  return report;
}

/**
 * Build every configured format for the selected releases. Failures are
 * collected per format or per release; a VersionMismatch aborts the run
 * before any output is written.
 */
export async function runBuild(config: BuildConfig, options: BuildOptions = {}): Promise<BuildReport> {
  const logger = options.logger ?? silentLogger;
  const selected = selectVersions(config, options.version);
  logger.info(
    `Deriving ${config.formats.join(", ")} for ${selected.join(", ")} from base ${config.baseVersion}`
  );

  // Every format is derived before the first write
  const plans = config.formats.map((format) => planFormat(config, format, selected, logger));
  const reports = await Promise.all(
    plans.map((plan) => writeFormat(config, plan, selected, options, logger))
  );
  const total: BuildReport = { written: [], unchanged: [], failures: [], degraded: 0 };
  for (const report of reports) {
    total.written.push(...report.written);
    total.unchanged.push(...report.unchanged);
    total.failures.push(...report.failures);
    total.degraded += report.degraded;
  }
  total.written.sort();
  total.unchanged.sort();
  return total;
}
