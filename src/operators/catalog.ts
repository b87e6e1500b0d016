import { EncryptOperator, DecryptOperator } from './encrypt';
import { HashOperator } from './hash';
import { MaskOperator } from './mask';
import { RedactOperator } from './redact';
import { ReplaceOperator } from './replace';
import { Operator, OperatorDirection } from './types';

export function builtinOperators(): Operator[] {
  return [
    new HashOperator(),
    new MaskOperator(),
    new RedactOperator(),
    new ReplaceOperator(),
    new EncryptOperator(),
    new DecryptOperator(),
  ];
}

/**
 * Read-only lookup of operators by name. Built once and shared by every
 * engine; nothing can be registered after construction.
 */
export class OperatorCatalog {
  private readonly operators: ReadonlyMap<string, Operator>;

  constructor(operators: readonly Operator[] = builtinOperators()) {
    const byName = new Map<string, Operator>();
    for (const operator of operators) {
      if (byName.has(operator.name)) {
        throw new Error(`Operator "${operator.name}" is defined twice`);
      }
      byName.set(operator.name, operator);
    }
    this.operators = byName;
    Object.freeze(this);
  }

  get(name: string): Operator | undefined {
    return this.operators.get(name);
  }

  has(name: string): boolean {
    return this.operators.has(name);
  }

  list(direction?: OperatorDirection): string[] {
    return [...this.operators.values()]
      .filter((operator) => !direction || operator.direction === direction)
      .map((operator) => operator.name);
  }
}

export function createOperatorCatalog(operators?: readonly Operator[]): OperatorCatalog {
  return new OperatorCatalog(operators);
}

export const defaultCatalog = createOperatorCatalog();
