export {
  ControlCatalog,
  loadControlCatalog,
  parseCatalogContent,
  resolveBundledCatalogPath,
} from "./control_catalog";
export { CatalogLoadError, UnknownControlError } from "./control_catalog.errors";
export { RISK_CLASSES } from "./control_catalog.types";
export type {
  CatalogStatistics,
  Control,
  Domain,
  RawControlRecord,
  RiskClass,
} from "./control_catalog.types";
