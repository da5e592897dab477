export * from "./assessment_store";
export * from "./assessment_store.types";
export * from "./assessment_store.errors";
export * from "./assessment_file";
export * from "./compliance_status";
