export * as Catalog from "./control_catalog";
export * as Assessments from "./assessment_store";
export * as Scoring from "./scoring";
export * as Findings from "./finding_generator";
export * as Scanner from "./pattern_scanner";
export * as Session from "./audit_session";
export * as Config from "./config_manager";
export * as Logger from "./logger";
export * as Schemas from "./schemas";

// Direct exports for the common entry points
export { ControlCatalog, loadControlCatalog, resolveBundledCatalogPath } from "./control_catalog";
export { AuditSession } from "./audit_session";
export type { AuditReport } from "./audit_session";
export { PatternScanner } from "./pattern_scanner";
export { ConfigManager, ConfigError } from "./config_manager";
export type { SecpostureConfig } from "./config_manager";

// Interfaces implemented in ./fs and ./memory
export type { FileLister } from "./file_lister";
export { FileListerError } from "./file_lister";
export type { ConfigStore, RawConfig } from "./config_store";
