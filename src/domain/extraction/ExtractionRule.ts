/**
 * Extraction rules: how one field of a record is read from the page.
 */

/**
 * Trimmed inner text of the first element matching `selector`.
 */
export interface TextRule {
  kind: 'text';
  selector: string;
}

/**
 * Attribute of the first element matching `selector`.
 */
export interface AttributeRule {
  kind: 'attribute';
  selector: string;
  attribute: string;
  /** Resolve the value against the page URL (for href/src) */
  resolveUrl?: boolean;
}

export type ComputeTransform =
  | { type: 'count' }
  | { type: 'number' }
  | { type: 'match'; pattern: string; flags?: string; group?: number };

/**
 * Value derived from the matched elements rather than read verbatim.
 */
export interface ComputedRule {
  kind: 'computed';
  selector: string;
  transform: ComputeTransform;
}

/**
 * Keep only items whose `field` matches `pattern` (or does not, when negated).
 */
export interface ItemFilter {
  field: string;
  pattern: string;
  flags?: string;
  negate?: boolean;
}

/**
 * Repeated structure: one nested record per element matching `itemSelector`.
 * Nested selectors are scoped to the item.
 */
export interface ListRule {
  kind: 'list';
  itemSelector: string;
  fields: FieldSpec[];
  limit?: number;
  /** Drop items whose value for this field was already collected */
  uniqueBy?: string;
  where?: ItemFilter[];
}

export type ExtractionRule = TextRule | AttributeRule | ComputedRule | ListRule;

export interface FieldSpec {
  name: string;
  rule: ExtractionRule;
  /** Unresolved required fields abort the record; optional ones are omitted (default: false) */
  required?: boolean;
}

/**
 * Schemas may be written as an ordered list or as a name-keyed mapping.
 */
export type SchemaInput = FieldSpec[] | Record<string, Omit<FieldSpec, 'name'>>;

export type ExtractionSchema = readonly FieldSpec[];

/**
 * Normalize a schema into an ordered, frozen list of field specs.
 * Mapping keys keep their declaration order.
 */
export function defineSchema(input: SchemaInput): ExtractionSchema {
  const specs: FieldSpec[] = Array.isArray(input)
    ? input.map(spec => ({ ...spec, required: spec.required ?? false }))
    : Object.entries(input).map(([name, spec]) => ({
        name,
        rule: spec.rule,
        required: spec.required ?? false,
      }));

  const seen = new Set<string>();
  for (const spec of specs) {
    if (seen.has(spec.name)) {
      throw new Error(`Duplicate field '${spec.name}' in extraction schema`);
    }
    seen.add(spec.name);
  }

  return Object.freeze(specs.map(spec => Object.freeze(spec)));
}

/**
 * Parse the first number in a label, honouring thousands separators and K/M suffixes.
 * "1,204" -> 1204, "3.4K" -> 3400, "2M" -> 2000000. Returns 0 when no digits are present.
 */
export function parseCount(text: string | null | undefined): number {
  if (!text) {
    return 0;
  }

  const match = /(\d+(?:\.\d+)?)([KM]?)/i.exec(text.replace(/,/g, ''));
  if (!match) {
    return 0;
  }

  const value = parseFloat(match[1]);
  switch (match[2].toUpperCase()) {
    case 'K':
      return Math.trunc(value * 1_000);
    case 'M':
      return Math.trunc(value * 1_000_000);
    default:
      return Math.trunc(value);
  }
}
