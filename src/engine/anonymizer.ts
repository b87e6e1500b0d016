import { fail, ok, Result, unwrap } from '../common/errors';
import { Logger } from '../common/logger';
import { defaultCatalog, OperatorCatalog, OperatorConfigMap } from '../operators';
import { checkSpanBounds, reconcileSpans, Span } from '../spans';
import { replaceFallback, resolveOperation } from './dispatcher';
import { rewriteText } from './rewriter';
import { AnonymizationResult, ResolvedOperation } from './types';

export interface EngineOptions {
  catalog?: OperatorCatalog;
  logger?: Logger;
}

export function checkText(text: string): Result<string> {
  if (text.length === 0) {
    return fail('Invalid input, text can not be empty', { field: 'text', expected: 'non-empty string' });
  }
  return ok(text);
}

/**
 * Rewrites detected spans of a text. The engine only holds its catalog, so a
 * single instance can serve any number of concurrent callers.
 */
export class AnonymizerEngine {
  private readonly catalog: OperatorCatalog;
  private readonly logger?: Logger;

  constructor(options: EngineOptions = {}) {
    this.catalog = options.catalog ?? defaultCatalog;
    this.logger = options.logger;
  }

  listOperators(): string[] {
    return this.catalog.list('anonymize');
  }

  anonymize(text: string, spans: readonly Span[], operators: OperatorConfigMap = {}): Result<AnonymizationResult> {
    const checked = checkText(text);
    if (!checked.ok) {
      return checked;
    }
    for (const span of spans) {
      const bounds = checkSpanBounds(span, text.length);
      if (!bounds.ok) {
        return bounds;
      }
    }

    const survivors = reconcileSpans(spans);
    const operations: ResolvedOperation[] = [];
    for (const span of survivors) {
      const operation = resolveOperation(span, operators, { catalog: this.catalog, fallback: replaceFallback });
      if (!operation.ok) {
        return operation;
      }
      operations.push(operation.value);
    }

    const result = rewriteText(text, operations);
    if (result.ok) {
      this.logger?.debug('Anonymized text', {
        candidates: spans.length,
        applied: result.value.items.length,
        textLength: text.length,
      });
    }
    return result;
  }

  /** Same as {@link anonymize}, throwing the InvalidParamError instead of returning it. */
  anonymizeOrThrow(text: string, spans: readonly Span[], operators: OperatorConfigMap = {}): AnonymizationResult {
    return unwrap(this.anonymize(text, spans, operators));
  }
}
