export { Pipeline, PipelineRun } from './orchestrator';
export type { PipelineDependencies, RunOptions, RunHealth, RunResult } from './orchestrator';
export {
  validatePipelineConfig,
  pipelineConfigFromEnv,
  pipelineConfigSchema,
  splitProxyList,
} from './config';
export type { PipelineConfig, PipelineConfigInput } from './config';
export { PipelineConfigError } from './errors';
export { systemClock } from './clock';
export type { Clock } from './clock';
export { RateGovernor } from './rate-governor';
export type { RateGovernorOptions } from './rate-governor';
export { ProxyPool, parseProxyString, proxyKey } from './proxy-pool';
export type { ProxyAcquisition, ProxyIdentity, ProxyPoolOptions, ProxyPoolStats } from './proxy-pool';
export { FetchExecutor, classifyResponse, parseRetryAfter } from './fetch-executor';
export type { FetchExecutorOptions } from './fetch-executor';
export { decide, backoffBase } from './retry-policy';
export type { RetryPolicyConfig } from './retry-policy';
export { fetchPage } from './page-fetcher';
export type { PageFetchContext, PageFetchResult, PageRequest } from './page-fetcher';
export { PaginationController, PaginationStateError } from './pagination';
export type { PaginationLimits, PaginationState, PageResult } from './pagination';
export { RecordValidator, RunDeduplicator, normalizeForFingerprint } from './validator';
export type { ValidationResult } from './validator';
export { RunSummaryRecorder } from './summary';
export type { RunSummary } from './summary';
export { FetchMonitor } from './monitor';
export type { FetchHealth } from './monitor';
export { mergeBounded } from './merge';
export type {
  FetchRequest,
  FetchOutcome,
  FetchSuccess,
  FetchSoftFailure,
  FetchHardFailure,
  FetchFailure,
  SoftFailureReason,
  HardFailureReason,
  RetryDecision,
  StopReason,
  ScrapeTarget,
} from './types';
