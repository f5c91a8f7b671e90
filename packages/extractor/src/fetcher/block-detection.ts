// Block detection: recognizes responses where the source refuses our identity
import type { ContentShape, ErrorCode } from '@trawl/shared';
import {
  CAPTCHA_PATTERNS,
  CLOUDFLARE_PATTERNS,
  BOT_DETECTION_PATTERNS,
  GEO_BLOCK_PATTERNS,
  RATE_LIMIT_PATTERNS,
  MIN_NORMAL_HTML_SIZE,
  MAX_CHALLENGE_PAGE_SIZE,
  CLOUDFLARE_HEADERS,
} from './block-patterns';

export type BlockType =
  | 'captcha'
  | 'cloudflare'
  | 'rate_limit'
  | 'forbidden'
  | 'bot_detection'
  | 'geo_block';

export interface BlockDetectionResult {
  blocked: boolean;
  blockType: BlockType | null;
  confidence: 'high' | 'medium' | 'low';
  recommendation: string | null;
}

const NOT_BLOCKED: BlockDetectionResult = {
  blocked: false,
  blockType: null,
  confidence: 'high',
  recommendation: null,
};

/**
 * Detect whether the source is blocking the request, from status, body and headers.
 * Body heuristics run only for HTML bodies up to MAX_CHALLENGE_PAGE_SIZE.
 */
export function detectBlock(
  httpStatus: number | null,
  body: string | null,
  headers: Record<string, string>,
  shape: ContentShape = 'html'
): BlockDetectionResult {
  const statusDetection = detectByStatus(httpStatus, headers);
  if (statusDetection.blocked) {
    return statusDetection;
  }

  if (body && shape === 'html') {
    return detectByContent(body, headers);
  }

  return NOT_BLOCKED;
}

function blocked(blockType: BlockType, confidence: BlockDetectionResult['confidence']): BlockDetectionResult {
  return { blocked: true, blockType, confidence, recommendation: getRecommendation(blockType) };
}

function detectByStatus(
  httpStatus: number | null,
  headers: Record<string, string>
): BlockDetectionResult {
  if (httpStatus === 429) {
    return blocked('rate_limit', 'high');
  }

  if (httpStatus === 403) {
    return blocked(hasCloudflareHeaders(headers) ? 'cloudflare' : 'forbidden', 'high');
  }

  // 503 is plain unavailability unless Cloudflare answered it
  if (httpStatus === 503 && hasCloudflareHeaders(headers)) {
    return blocked('cloudflare', 'high');
  }

  return NOT_BLOCKED;
}

function detectByContent(
  html: string,
  headers: Record<string, string>
): BlockDetectionResult {
  const htmlSize = Buffer.byteLength(html, 'utf8');
  if (htmlSize > MAX_CHALLENGE_PAGE_SIZE) {
    return NOT_BLOCKED;
  }

  if (matchesPatterns(html, CLOUDFLARE_PATTERNS)) {
    return blocked('cloudflare', hasCloudflareHeaders(headers) ? 'high' : 'medium');
  }

  if (matchesPatterns(html, CAPTCHA_PATTERNS)) {
    return blocked('captcha', 'high');
  }

  if (matchesPatterns(html, RATE_LIMIT_PATTERNS)) {
    return blocked('rate_limit', 'medium');
  }

  if (matchesPatterns(html, GEO_BLOCK_PATTERNS)) {
    return blocked('geo_block', 'high');
  }

  if (htmlSize < MIN_NORMAL_HTML_SIZE && matchesPatterns(html, BOT_DETECTION_PATTERNS)) {
    return blocked('bot_detection', 'medium');
  }

  return NOT_BLOCKED;
}

export function hasCloudflareHeaders(headers: Record<string, string>): boolean {
  const lowerHeaders = Object.keys(headers).map(k => k.toLowerCase());
  return CLOUDFLARE_HEADERS.some(header => lowerHeaders.includes(header));
}

function matchesPatterns(html: string, patterns: RegExp[]): boolean {
  return patterns.some(pattern => pattern.test(html));
}

function getRecommendation(blockType: BlockType): string {
  switch (blockType) {
    case 'captcha':
      return 'Rotate proxy identity and slow down; consider headless transport';
    case 'cloudflare':
      return 'Use headless transport or reduce request frequency';
    case 'rate_limit':
      return 'Increase the minimum delay between requests';
    case 'forbidden':
      return 'Rotate to a different proxy identity';
    case 'bot_detection':
      return 'Rotate proxy and user agent; consider headless transport';
    case 'geo_block':
      return 'Use a proxy from an allowed region';
  }
}

/**
 * Map block type to ErrorCode
 */
export function blockTypeToErrorCode(blockType: BlockType): ErrorCode {
  switch (blockType) {
    case 'captcha':
      return 'BLOCK_CAPTCHA_SUSPECTED';
    case 'cloudflare':
      return 'BLOCK_CLOUDFLARE_SUSPECTED';
    case 'rate_limit':
      return 'BLOCK_RATE_LIMIT_429';
    case 'forbidden':
      return 'BLOCK_FORBIDDEN_403';
    case 'bot_detection':
      return 'BLOCK_BOT_DETECTION';
    case 'geo_block':
      return 'BLOCK_GEO';
  }
}
