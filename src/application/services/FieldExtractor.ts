import { ElementScope } from '../ports/PagePort';
import {
  ComputedRule,
  ExtractionRule,
  ExtractionSchema,
  ItemFilter,
  ListRule,
  parseCount,
} from '../../domain/extraction/ExtractionRule';
import { ExtractionError } from '../../domain/errors/HarvestErrors';
import { HarvestRecord } from '../../domain/result/RunResult';
import { Logger, getLogger } from '../../infrastructure/logging';

/**
 * Record produced by one schema, plus the optional fields that were left out.
 */
export interface ExtractionOutcome {
  record: HarvestRecord;
  unresolved: string[];
}

/**
 * Evaluates extraction schemas against a page or element scope.
 *
 * Fields are read in declared order. An optional field that cannot be
 * resolved is omitted; a required one stops the record with an
 * ExtractionError that carries everything resolved so far.
 */
export class FieldExtractor {
  private readonly logger: Logger;

  constructor() {
    this.logger = getLogger('Extractor');
  }

  async extract(
    scope: ElementScope,
    schema: ExtractionSchema,
    baseUrl: string
  ): Promise<ExtractionOutcome> {
    const record: HarvestRecord = {};
    const unresolved: string[] = [];

    for (const field of schema) {
      const value = await this.evaluate(scope, field.rule, baseUrl);

      if (value === undefined) {
        unresolved.push(field.name);
        if (field.required) {
          throw new ExtractionError([...unresolved], { ...record });
        }
        this.logger.debug(`Optional field '${field.name}' not found`);
        continue;
      }

      record[field.name] = value;
    }

    return { record, unresolved };
  }

  /**
   * Resolve one rule. `undefined` means the field could not be resolved.
   */
  private async evaluate(
    scope: ElementScope,
    rule: ExtractionRule,
    baseUrl: string
  ): Promise<unknown> {
    switch (rule.kind) {
      case 'text': {
        const element = await scope.query(rule.selector);
        return element ? (await element.text()).trim() : undefined;
      }

      case 'attribute': {
        const element = await scope.query(rule.selector);
        const value = element ? await element.attribute(rule.attribute) : null;
        if (value === null) {
          return undefined;
        }
        return rule.resolveUrl ? resolveUrl(value, baseUrl) : value;
      }

      case 'computed':
        return this.compute(scope, rule);

      case 'list':
        return this.collect(scope, rule, baseUrl);
    }
  }

  private async compute(scope: ElementScope, rule: ComputedRule): Promise<unknown> {
    const { transform } = rule;

    if (transform.type === 'count') {
      return (await scope.queryAll(rule.selector)).length;
    }

    const element = await scope.query(rule.selector);
    if (!element) {
      return undefined;
    }
    const text = await element.text();

    if (transform.type === 'number') {
      return parseCount(text);
    }

    const match = new RegExp(transform.pattern, transform.flags).exec(text);
    if (!match) {
      return undefined;
    }
    const group = transform.group ?? (match.length > 1 ? 1 : 0);
    return match[group];
  }

  /**
   * One nested record per item. Items missing a required nested field are
   * skipped; an empty list counts as unresolved.
   */
  private async collect(
    scope: ElementScope,
    rule: ListRule,
    baseUrl: string
  ): Promise<HarvestRecord[] | undefined> {
    const items = await scope.queryAll(rule.itemSelector);
    const collected: HarvestRecord[] = [];
    const seen = new Set<string>();

    for (const [index, item] of items.entries()) {
      if (rule.limit !== undefined && collected.length >= rule.limit) {
        break;
      }

      let outcome: ExtractionOutcome;
      try {
        outcome = await this.extract(item, rule.fields, baseUrl);
      } catch (error) {
        if (error instanceof ExtractionError) {
          this.logger.debug(`Skipping item ${index} of '${rule.itemSelector}'`, {
            missing: error.unresolvedFields,
          });
          continue;
        }
        throw error;
      }

      if (!matchesAll(outcome.record, rule.where ?? [])) {
        continue;
      }

      if (rule.uniqueBy !== undefined) {
        const key = outcome.record[rule.uniqueBy];
        if (key !== undefined) {
          const keyText = stringify(key);
          if (seen.has(keyText)) {
            continue;
          }
          seen.add(keyText);
        }
      }

      collected.push(outcome.record);
    }

    this.logger.debug(`Collected ${collected.length} of ${items.length} items`, {
      selector: rule.itemSelector,
    });
    return collected.length > 0 ? collected : undefined;
  }
}

function resolveUrl(value: string, baseUrl: string): string {
  try {
    return new URL(value, baseUrl).toString();
  } catch {
    // Not resolvable against this base (e.g. about:blank); keep what the page said.
    return value;
  }
}

function stringify(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function matchesAll(record: HarvestRecord, filters: ItemFilter[]): boolean {
  return filters.every(filter => {
    const value = record[filter.field];
    const text = value === undefined ? '' : stringify(value);
    const matched = new RegExp(filter.pattern, filter.flags).test(text);
    return filter.negate ? !matched : matched;
  });
}
