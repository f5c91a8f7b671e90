export { extractField, extractWithStrategy } from './extract';
export { extractWithCSS } from './css';
export { extractWithXPath } from './xpath';
export { extractWithRegex } from './regex';
export { extractWithJsonPath, resolvePath } from './json-path';
export { applyPostprocess } from './postprocess';
export { HtmlListingExtractor, JsonListingExtractor } from './listing';
export type { HtmlListingConfig, JsonListingConfig } from './listing';
export type { PostprocessContext } from './postprocess';
export type {
  ExtractionScope,
  FieldExtractionResult,
  PageContent,
  ExtractionContext,
  PageExtraction,
  SiteExtractor,
} from './types';
