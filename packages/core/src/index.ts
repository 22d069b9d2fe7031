// High-level API exports
export * from "./api";

export {
  composeBundle,
  type ComposeBundleOptions,
  mergeEditorSettings,
  mergeExtensions,
  mergeFormatter,
  PROJECT_RULE_SET,
} from "./bundle/compose";
export {
  aliasMatches,
  type CheckerConfig,
  type CheckResult,
  type CheckSeverity,
  checkBundle,
  hasErrors,
  pluginPrefix,
} from "./checker";
export {
  DESTINATION_IDS,
  type DestinationId,
  FILE_EXTENSIONS,
  LINT_TARGET_SAMPLES,
  LOCK_FILES,
  RESOURCE_LIMITS,
  STYLEPACK_DIR,
} from "./config/limits";
export {
  findProjectRoot,
  formatFromExtension,
  type InitializeProjectOptions,
  initializeProject,
  type LoadProjectConfigOptions,
  loadProjectConfig,
  type ProjectConfig,
  type ProjectConfigFormat,
  type ProjectConfigResult,
  type SaveProjectConfigOptions,
  saveProjectConfig,
  serializeProjectConfig,
  validateProjectConfig,
} from "./config/project-config";
export {
  destinations,
  getDestination,
  isDestinationId,
} from "./destinations";
export {
  APPLIED_RECORD_FILE,
  type AppliedRecord,
  type ApplyManagerOptions,
  ApplyManager,
  type ApplyOptions,
  type ApplyReport,
  type DriftEntry,
  type DriftState,
  type FileAction,
  type FileChange,
  hashContent,
  type PlanOptions,
} from "./installation/apply-manager";
export {
  detectPackageManager,
  type InstallPlan,
  isPackageManager,
  planInstall,
  type RunInstallOptions,
  runInstall,
  type SpawnedProcess,
  type SpawnFn,
} from "./installation/package-manager";
// Export all public APIs
export * from "./interfaces";
export { BUILTIN_PRESETS } from "./presets/builtin";
export {
  type AvailablePreset,
  PresetManager,
  type PresetSource,
} from "./presets/preset-manager";
export { FileLock, withFileLock } from "./utils/file-lock";
export * from "./utils/security";
