// Fetcher exports
export { HttpTransport, decompressBody, classifyTransportError } from './http';
export { HeadlessTransport, classifyBrowserError } from './headless';
export { getRandomUserAgent, buildBrowserHeaders, USER_AGENTS } from './user-agents';
export { detectBlock, blockTypeToErrorCode, hasCloudflareHeaders } from './block-detection';
export { assessBody, shapeFromContentType } from './plausibility';
export { TransportError, proxyToUrl } from './types';
export type { Transport, TransportRequest, TransportResponse } from './types';
export type { HttpTransportOptions } from './http';
export type { HeadlessTransportOptions, BlockableResource } from './headless';
export type { BlockType, BlockDetectionResult } from './block-detection';
export type { BodyAssessment } from './plausibility';
