export { AuditSession } from "./audit_session";
export type { AuditReport, AuditSessionOptions, ScanMergeResult } from "./audit_session.types";
