export * from "./lib/errors";
export * from "./lib/json";
export { Logger, createRunLogger, createStepLogger, withTiming, type ILogger, type LogLevel } from "./lib/logger";
export { withRetry, sleep, type RetryConfig } from "./lib/retry";

export * from "./extract/jsonBlock";
export * from "./extract/deepSearch";
export * from "./extract/hydration";
export * from "./extract/pages";

export * from "./normalize/outcome";
export * from "./normalize/matches";
export * from "./normalize/shots";

export * from "./source/urls";
export * from "./source/pageFetcher";

export * from "./schemas/config";
export * from "./schemas/shotRow";
export * from "./table/shotTable";

export { runFetchPipeline, type FetchPipelineDeps, type FetchPipelineResult } from "./jobs/runFetchPipeline";
export { filterByRound, selectMatches, type MatchFilters } from "./jobs/steps/02_selectMatches";

export * from "./calculators/playerTotals";
export * from "./calculators/conversion";
export * from "./calculators/xgVsGoals";
export * from "./calculators/shotMap";
export { renderShotMap } from "./charts/shotMapChart";
export { renderConversionChart } from "./charts/conversionChart";
export { renderXgGoalsChart } from "./charts/xgGoalsChart";
export { makeCharts, shotMapFileName } from "./charts/makeCharts";
