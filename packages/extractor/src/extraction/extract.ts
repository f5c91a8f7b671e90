import { isDocument } from 'domhandler';
import type { FieldSpec, FieldStrategy, FieldValue } from '@trawl/shared';
import type { ExtractionScope, FieldExtractionResult } from './types';
import { extractWithCSS } from './css';
import { extractWithXPath } from './xpath';
import { extractWithRegex } from './regex';
import { extractWithJsonPath } from './json-path';
import { applyPostprocess, type PostprocessContext } from './postprocess';

/**
 * Extract one field from a scope.
 * Strategies are tried in order; the first that yields a non-empty value wins.
 * No match leaves the field absent (value null).
 */
export function extractField(
  scope: ExtractionScope,
  field: FieldSpec,
  context: PostprocessContext = {}
): FieldExtractionResult {
  let index = 0;
  for (const strategy of field.strategies) {
    const raw = extractWithStrategy(scope, strategy);
    const value = raw === null ? null : finalize(raw, field, context);
    if (value !== null) {
      return { name: field.name, value, strategyUsed: strategy, fallbackUsed: index > 0 };
    }
    index++;
  }

  return { name: field.name, value: null, strategyUsed: null, fallbackUsed: false };
}

function finalize(raw: FieldValue, field: FieldSpec, context: PostprocessContext): FieldValue | null {
  if (typeof raw === 'number') {
    return raw;
  }
  const processed = applyPostprocess(raw, field.postprocess ?? [], context);
  return processed.trim() === '' ? null : processed;
}

/**
 * Run a single strategy. Strategies that do not apply to the scope's
 * content kind (CSS on JSON, JSON path on HTML) yield null.
 */
export function extractWithStrategy(scope: ExtractionScope, strategy: FieldStrategy): FieldValue | null {
  const attribute = strategy.attribute ?? 'text';

  if (scope.kind === 'json') {
    switch (strategy.method) {
      case 'json_path':
        return extractWithJsonPath(scope.value, strategy.selector);
      case 'regex':
        return extractWithRegex(JSON.stringify(scope.value) ?? '', strategy.selector);
      default:
        return null;
    }
  }

  switch (strategy.method) {
    case 'css':
      return extractWithCSS(scope.root, strategy.selector, attribute);

    case 'xpath':
      return extractWithXPath(renderXml(scope), strategy.selector, attribute);

    case 'regex':
      return extractWithRegex(scope.$.html(scope.root), strategy.selector);

    case 'json_path':
      return null;
  }
}

// The document root renders its element children so doctype directives stay out of the XML
function renderXml(scope: Extract<ExtractionScope, { kind: 'html' }>): string {
  const node = scope.root.get(0);
  return scope.$.xml(node && isDocument(node) ? scope.root.children() : scope.root);
}
