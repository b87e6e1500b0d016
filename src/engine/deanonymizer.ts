import { ok, Result, unwrap } from '../common/errors';
import { Logger } from '../common/logger';
import { defaultCatalog, OperatorCatalog, OperatorConfigMap } from '../operators';
import { checkSpanBounds, reconcileSpans, Span } from '../spans';
import { checkText, EngineOptions } from './anonymizer';
import { resolveOperation } from './dispatcher';
import { rewriteText } from './rewriter';
import { DeanonymizationResult, EntityRange, ResolvedOperation } from './types';

/**
 * Restores entities produced by reversible operators. Entity offsets refer to
 * the anonymized text, i.e. the `outputStart`/`outputEnd` of earlier results.
 * Every entity type needs an operator entry (or DEFAULT); there is no
 * built-in fallback.
 */
export class DeanonymizerEngine {
  private readonly catalog: OperatorCatalog;
  private readonly logger?: Logger;

  constructor(options: EngineOptions = {}) {
    this.catalog = options.catalog ?? defaultCatalog;
    this.logger = options.logger;
  }

  listOperators(): string[] {
    return this.catalog.list('deanonymize');
  }

  deanonymize(
    text: string,
    entities: readonly EntityRange[],
    operators: OperatorConfigMap,
  ): Result<DeanonymizationResult> {
    const checked = checkText(text);
    if (!checked.ok) {
      return checked;
    }
    const spans: Span[] = [];
    for (const entity of entities) {
      const bounds = checkSpanBounds(entity, text.length);
      if (!bounds.ok) {
        return bounds;
      }
      spans.push({ start: entity.start, end: entity.end, entityType: entity.entityType, score: 1 });
    }

    const operations: ResolvedOperation[] = [];
    for (const span of reconcileSpans(spans)) {
      const operation = resolveOperation(span, operators, { catalog: this.catalog, direction: 'deanonymize' });
      if (!operation.ok) {
        return operation;
      }
      operations.push(operation.value);
    }

    const result = rewriteText(text, operations);
    if (!result.ok) {
      return result;
    }
    this.logger?.debug('Deanonymized text', { entities: entities.length, applied: result.value.items.length });
    return ok(result.value);
  }

  deanonymizeOrThrow(
    text: string,
    entities: readonly EntityRange[],
    operators: OperatorConfigMap,
  ): DeanonymizationResult {
    return unwrap(this.deanonymize(text, entities, operators));
  }
}
