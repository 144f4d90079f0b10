// netschema — public library surface
// Import this to derive release schemas from your own tooling.

export { parseRawDict, parseRawFile, parseCuratedDict, parseCuratedFile, loadMapping } from "./parser.js";
export { diffRaw, isEmptyDiff, describeDiff } from "./differ.js";
export {
  applyDiff,
  synthesizeKey,
  undocumentedDescription,
  retargetDocumentationUrl,
  retargetTitle,
  checkParity,
  isParityClean,
  assertParity,
} from "./applicator.js";
export { LifespanLedger, buildLedger, annotateLifespans, lifespanContains } from "./ledger.js";
export { deriveRelease } from "./derive.js";
export { renderDocument, parseDocument, toCanonical, writeIfChanged } from "./serializer.js";
export { validateCurated } from "./validator.js";
export { compareDocuments, buildChangelog, isEmptyChangeSet } from "./changelog.js";
export { compareVersions, sortVersions, versionLabel } from "./versions.js";
export { loadConfig, parseConfigDict, DEFAULT_CONFIG_FILE } from "./config.js";
export { runBuild, selectVersions, outputPath, rawPath, curatedPath, changesPath, schemaId } from "./pipeline.js";
export { createLogger, silentLogger } from "./log.js";
export {
  SchemaError,
  InputUnavailable,
  VersionMismatch,
  PostconditionViolation,
  SerializationWriteFailure,
  SchemaParseError,
  ConfigError,
  formatParityReport,
} from "./errors.js";
export { FORMAT_TYPES, SCALAR_KINDS, isFormatType, isValueKind, keyRefId, ownValue } from "./model.js";
export type {
  FormatType,
  ScalarKind,
  ValueKind,
  Scalar,
  DefaultValue,
  Constraints,
  KeyDefinition,
  CuratedSection,
  CuratedSchemaDocument,
  Provenance,
  RawSection,
  RawSchemaDocument,
  KeyRef,
  StructuralDiff,
  ParityReport,
  ValidationResult,
} from "./model.js";
export type { ApplyOptions } from "./applicator.js";
export type { Lifespan } from "./ledger.js";
export type { DerivationInput, Derivation } from "./derive.js";
export type { OutputFormat, WriteOutcome, WriteOptions } from "./serializer.js";
export type { ChangeSet, ChangelogEntry } from "./changelog.js";
export type { BuildConfig } from "./config.js";
export type { BuildOptions, BuildFailure, BuildReport } from "./pipeline.js";
export type { Logger, LoggerOptions, LineSink } from "./log.js";
