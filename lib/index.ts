export * from "./types/zod";
export * from "./model/errors";
export * from "./model/forecast-math";
export * from "./model/scenario-projector";
export * from "./model/median-convergence";
export * from "./model/intervention-strategies";
export * from "./model/manager-budget";
export * from "./model/population-metrics";
export * from "./model/salary-floors";
export * from "./model/effective-config";
export * from "./model/validation";
export * from "./model/engine";
export { recommendationsToCsv } from "./export/recommendationsToCsv";
export { buildAnalysisExport, analysisExportToJson, type AnalysisExport } from "./utils/export-analysis";
export { explainRecommendation } from "./utils/why-staged";
export { createLogger, resolveLogLevel, type Logger, type LogLevel } from "./utils/logger";
