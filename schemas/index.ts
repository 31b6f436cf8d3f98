export * from "./measurement";
export * from "./completeness";
export * from "./monitoringConfig";
