/**
 * @packageDocumentation
 *
 * # task-bundle-migrate
 *
 * Discovers and applies the migration scripts that Tekton task bundles ship
 * with their releases. Given a task repository in an OCI registry and a
 * version range `(from, to]`, the library lists the released versions,
 * selects one tag per version, fetches the migration attached to each and
 * runs them in ascending order against a pipeline definition.
 *
 * ## Main APIs
 *
 * - {@link buildMigrationPlan} - Discover versions and resolve the ordered plan
 * - {@link MigrationExecutor} - Apply a plan to one pipeline file
 * - {@link runMigrations} - Plan and execute a batch of task upgrades
 * - {@link OciRegistryClient} - Registry access over HTTP
 */

// Version model
export {
  parseVersion,
  tryParseVersion,
  compareVersions,
  versionsEqual,
  formatVersion,
  parseTagVersion,
} from './migration/version.js';
export type { Version, Ordering, ParsedTagName } from './migration/version.js';

// Errors
export {
  MigrationToolError,
  VersionParseError,
  InvalidRangeError,
  DiscoveryError,
  NoScriptAttachedError,
  TransportFailureError,
  MalformedRegistryDocumentError,
  IncorrectMigrationAttachmentError,
  ExecutionFailureError,
  InvalidUpgradesError,
  PipelineFileError,
  ConfigError,
} from './migration/errors.js';
export type { MigrationErrorCode, FetchError } from './migration/errors.js';

// Discovery and planning
export { listVersionGroups } from './migration/tag-index.js';
export type { Tag, VersionGroup } from './migration/tag-index.js';
export { selectTag, hasDivergentDigests } from './migration/tag-selector.js';
export { assertValidRange, resolveRange } from './migration/range.js';
export { buildMigrationPlan, formatPlan } from './migration/planner.js';
export type { BuildPlanOptions, MigrationPlan, PlanStep } from './migration/planner.js';

// Fetching and execution
export {
  MigrationFetcher,
  ANNOTATION_HAS_MIGRATION,
  ANNOTATION_IS_MIGRATION,
  ANNOTATION_PREVIOUS_MIGRATION_BUNDLE,
  MIGRATION_ARTIFACT_TYPE,
} from './migration/fetcher.js';
export type { MigrationScript } from './migration/fetcher.js';
export { LinkedMigrationResolver } from './migration/linked-resolver.js';
export type { ResolverMode } from './migration/linked-resolver.js';
export { MigrationExecutor } from './migration/executor.js';
export type {
  MigrationExecutorOptions,
  MigrationRunReport,
  RunStatus,
  ScriptSource,
  StepReport,
  StepState,
  TransitionEvent,
} from './migration/executor.js';
export { ShellScriptRunner } from './migration/script-runner.js';
export type {
  ScriptRunner,
  ScriptRunRequest,
  ScriptRunResult,
  ShellScriptRunnerOptions,
} from './migration/script-runner.js';
export { runMigrations, targetFromPlan } from './migration/orchestrator.js';
export type { MigrationRequest, RunMigrationsOptions, TaskMigrationOutcome } from './migration/orchestrator.js';
export { formatPlanReport, formatRunReport } from './migration/report.js';
export type { ReportLine } from './migration/report.js';

// Registry
export { OciRegistryClient, splitRepository } from './registry/oci-client.js';
export type { OciRegistryClientOptions } from './registry/oci-client.js';
export type {
  Annotations,
  OciDescriptor,
  OciImageIndex,
  OciManifest,
  RegistryClient,
  TagInfo,
} from './registry/types.js';

// Pipeline definitions and upgrade input
export { PipelineFile, fileChecksum } from './pipeline/pipeline-file.js';
export type { PipelineKind, TaskBundleUsage } from './pipeline/pipeline-file.js';
export { parseBundleReference, formatBundleReference } from './pipeline/bundle-reference.js';
export type { BundleReference } from './pipeline/bundle-reference.js';
export {
  parseUpgrades,
  groupUpgradesByFile,
  toMigrationRequests,
  currentBundle,
  TEKTON_BUNDLE_DEP_TYPE,
} from './upgrades/upgrades.js';
export type { PackageFileUpgrades, TaskBundleUpgrade } from './upgrades/upgrades.js';

// Configuration
export { loadConfig, mergeConfig, validateConfig } from './config/loader.js';
export { DEFAULT_CONFIG, getDefaultConfig } from './config/defaults.js';
export type { MigrateConfig, PartialMigrateConfig, CliConfigOverrides } from './config/types.js';

// Utilities
export { withRetry, isTransientError, calculateBackoffDelay } from './utils/retry.js';
export type { RetryOptions } from './utils/retry.js';
export { processInParallel } from './utils/concurrency.js';
