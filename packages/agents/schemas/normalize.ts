// Schema Validator: makes any parsed model output schema-safe
// Never fails on bad model output: missing fields get defaults, wrong types are coerced or
// defaulted, out-of-set enum values fall back, scores are clamped. Every repair is recorded.

import { z } from 'zod';
import { ValidationImpossible } from '../utils/errors.js';
import type {
  AgentOutputSchema, FieldSpec, Infer, JsonObject, JsonValue, NumberSpec, ObjectSpec,
} from './field-spec.js';

export type IssueKind = 'missing' | 'coerced' | 'defaulted' | 'enum_fallback' | 'clamped' | 'dropped_key' | 'dropped_item';

export interface NormalizeIssue {
  readonly path: string;
  readonly kind: IssueKind;
  readonly detail: string;
}

export interface NormalizeResult<T> {
  value: T;
  issues: NormalizeIssue[];
}

const NUMERIC_RE = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?$/i;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeInput(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'string') return JSON.stringify(value.length > 40 ? `${value.slice(0, 37)}...` : value);
  if (typeof value === 'object') return 'object';
  return `${typeof value} ${String(value)}`;
}

/** Deep-copies a value keeping only JSON-representable parts. */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) {
    return value.map(v => toJsonValue(v) ?? null);
  }
  if (isPlainObject(value)) {
    const out: JsonObject = {};
    for (const [k, v] of Object.entries(value)) {
      const json = toJsonValue(v);
      if (json !== undefined) out[k] = json;
    }
    return out;
  }
  return undefined;
}

function toJsonObject(value: Record<string, unknown>): JsonObject {
  const out: JsonObject = {};
  for (const [k, v] of Object.entries(value)) {
    const json = toJsonValue(v);
    if (json !== undefined) out[k] = json;
  }
  return out;
}

export function defaultFor(spec: FieldSpec): unknown {
  switch (spec.kind) {
    case 'string': return spec.default;
    case 'enum': return spec.fallback;
    case 'number': return spec.default;
    case 'boolean': return spec.default;
    case 'array': return [];
    case 'record': return {};
    case 'object': {
      const out: Record<string, unknown> = {};
      for (const [key, field] of Object.entries(spec.fields)) {
        out[key] = defaultFor(field);
      }
      return out;
    }
  }
}

function parseNumericString(value: string): number | undefined {
  const cleaned = value.trim().replace(/,/g, '');
  if (!NUMERIC_RE.test(cleaned)) return undefined;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : undefined;
}

function normalizeNumber(spec: NumberSpec, input: unknown, path: string, issues: NormalizeIssue[]): number | null {
  let n: number | undefined;
  if (typeof input === 'number' && Number.isFinite(input)) {
    n = input;
  } else if (typeof input === 'string') {
    n = parseNumericString(input);
    if (n !== undefined) {
      issues.push({ path, kind: 'coerced', detail: `numeric string ${describeInput(input)} → ${n}` });
    }
  } else if (input === null && spec.nullable) {
    return null;
  }

  if (n === undefined) {
    issues.push({ path, kind: 'defaulted', detail: `${describeInput(input)} is not a number` });
    return spec.default;
  }

  if (spec.integer && !Number.isInteger(n)) {
    const truncated = Math.trunc(n);
    issues.push({ path, kind: 'coerced', detail: `${n} → ${truncated} (integer)` });
    n = truncated;
  }
  if (spec.min !== undefined && n < spec.min) {
    issues.push({ path, kind: 'clamped', detail: `${n} → ${spec.min}` });
    n = spec.min;
  }
  if (spec.max !== undefined && n > spec.max) {
    issues.push({ path, kind: 'clamped', detail: `${n} → ${spec.max}` });
    n = spec.max;
  }
  return n;
}

function normalizeObject(spec: ObjectSpec, input: unknown, path: string, issues: NormalizeIssue[]): Record<string, unknown> {
  if (typeof input === 'string' && spec.fromString) {
    issues.push({ path, kind: 'coerced', detail: `string placed into "${spec.fromString}"` });
    const out: Record<string, unknown> = {};
    for (const [key, field] of Object.entries(spec.fields)) {
      out[key] = key === spec.fromString ? input : defaultFor(field);
    }
    return out;
  }

  if (!isPlainObject(input)) {
    issues.push({ path, kind: 'defaulted', detail: `${describeInput(input)} is not an object` });
    const fallback = defaultFor(spec);
    return isPlainObject(fallback) ? fallback : {};
  }

  const out: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(spec.fields)) {
    out[key] = normalizeField(field, input[key], `${path}.${key}`, issues);
  }
  for (const key of Object.keys(input)) {
    if (!(key in spec.fields)) {
      issues.push({ path: `${path}.${key}`, kind: 'dropped_key', detail: 'not declared in schema' });
    }
  }
  return out;
}

function normalizeField(spec: FieldSpec, input: unknown, path: string, issues: NormalizeIssue[]): unknown {
  if (input === undefined) {
    issues.push({ path, kind: 'missing', detail: 'field absent, default applied' });
    return defaultFor(spec);
  }

  switch (spec.kind) {
    case 'string': {
      if (typeof input === 'string') return input;
      if ((typeof input === 'number' && Number.isFinite(input)) || typeof input === 'boolean') {
        issues.push({ path, kind: 'coerced', detail: `${describeInput(input)} → string` });
        return String(input);
      }
      issues.push({ path, kind: 'defaulted', detail: `${describeInput(input)} is not a string` });
      return spec.default;
    }

    case 'enum': {
      const candidate = typeof input === 'string'
        ? input.trim()
        : typeof input === 'number' || typeof input === 'boolean' ? String(input) : undefined;
      if (candidate === undefined) {
        issues.push({ path, kind: 'defaulted', detail: `${describeInput(input)} is not a string; using "${spec.fallback}"` });
        return spec.fallback;
      }
      const match = spec.values.find(v => v.toLowerCase() === candidate.toLowerCase());
      if (match === undefined) {
        issues.push({
          path,
          kind: 'enum_fallback',
          detail: `${JSON.stringify(candidate)} not in {${spec.values.join(', ')}}; using "${spec.fallback}"`,
        });
        return spec.fallback;
      }
      if (match !== input) {
        issues.push({ path, kind: 'coerced', detail: `${describeInput(input)} → "${match}"` });
      }
      return match;
    }

    case 'number':
      return normalizeNumber(spec, input, path, issues);

    case 'boolean': {
      if (typeof input === 'boolean') return input;
      if (typeof input === 'string' && /^(true|false)$/i.test(input.trim())) {
        const b = input.trim().toLowerCase() === 'true';
        issues.push({ path, kind: 'coerced', detail: `${describeInput(input)} → ${b}` });
        return b;
      }
      if (input === 0 || input === 1) {
        issues.push({ path, kind: 'coerced', detail: `${input} → ${input === 1}` });
        return input === 1;
      }
      issues.push({ path, kind: 'defaulted', detail: `${describeInput(input)} is not a boolean` });
      return spec.default;
    }

    case 'array': {
      let items: unknown[];
      const nested = spec.unwrapKey && isPlainObject(input) ? input[spec.unwrapKey] : undefined;
      if (Array.isArray(input)) {
        items = input;
      } else if (Array.isArray(nested)) {
        issues.push({ path, kind: 'coerced', detail: `unwrapped "${spec.unwrapKey}"` });
        items = nested;
      } else if (spec.wrapSingle && isPlainObject(input)) {
        issues.push({ path, kind: 'coerced', detail: 'single object wrapped into array' });
        items = [input];
      } else {
        issues.push({ path, kind: 'defaulted', detail: `${describeInput(input)} is not an array` });
        return [];
      }
      const out: unknown[] = [];
      items.forEach((item, i) => {
        const itemPath = `${path}[${i}]`;
        // Stray scalars in a list of records carry nothing to default from
        const itemSpec = spec.items;
        if (itemSpec.kind === 'object' && !isPlainObject(item) && !(typeof item === 'string' && itemSpec.fromString)) {
          issues.push({ path: itemPath, kind: 'dropped_item', detail: `${describeInput(item)} is not an object` });
          return;
        }
        out.push(normalizeField(itemSpec, item, itemPath, issues));
      });
      return out;
    }

    case 'object':
      return normalizeObject(spec, input, path, issues);

    case 'record': {
      if (isPlainObject(input)) return toJsonObject(input);
      issues.push({ path, kind: 'defaulted', detail: `${describeInput(input)} is not an object` });
      return {};
    }
  }
}

// ── Conformance (strict zod schema derived from the field spec) ─────

const zodCache = new WeakMap<FieldSpec, z.ZodTypeAny>();

export function toZodSchema(spec: FieldSpec): z.ZodTypeAny {
  const cached = zodCache.get(spec);
  if (cached) return cached;

  let schema: z.ZodTypeAny;
  switch (spec.kind) {
    case 'string':
      schema = z.string();
      break;
    case 'enum': {
      const allowed: readonly string[] = spec.values;
      schema = z.string().refine(v => allowed.includes(v), { message: `expected one of ${allowed.join(', ')}` });
      break;
    }
    case 'number': {
      let n = z.number().finite();
      if (spec.integer) n = n.int();
      if (spec.min !== undefined) n = n.min(spec.min);
      if (spec.max !== undefined) n = n.max(spec.max);
      schema = spec.nullable ? n.nullable() : n;
      break;
    }
    case 'boolean':
      schema = z.boolean();
      break;
    case 'array':
      schema = z.array(toZodSchema(spec.items));
      break;
    case 'object': {
      const shape: Record<string, z.ZodTypeAny> = {};
      for (const [key, field] of Object.entries(spec.fields)) {
        shape[key] = toZodSchema(field);
      }
      schema = z.object(shape).strict();
      break;
    }
    case 'record':
      schema = z.record(z.unknown());
      break;
  }

  zodCache.set(spec, schema);
  return schema;
}

export function conformanceProblems(value: unknown, spec: FieldSpec): string[] {
  const result = toZodSchema(spec).safeParse(value);
  if (result.success) return [];
  return result.error.issues.map(i => `$${i.path.map(p => (typeof p === 'number' ? `[${p}]` : `.${p}`)).join('')}: ${i.message}`);
}

export function conforms<S extends FieldSpec>(value: unknown, schema: AgentOutputSchema<S>): value is Infer<S> {
  return conformanceProblems(value, schema.root).length === 0;
}

export function assertConforms<S extends FieldSpec>(value: unknown, schema: AgentOutputSchema<S>): asserts value is Infer<S> {
  const problems = conformanceProblems(value, schema.root);
  if (problems.length > 0) throw new ValidationImpossible(schema.name, problems);
}

/**
 * Normalize a parsed model output against an agent schema.
 * `raw` may be anything, including undefined when no block could be extracted.
 * Throws ValidationImpossible only if the normalizer itself produced a non-conforming value.
 */
export function normalize<S extends FieldSpec>(raw: unknown, schema: AgentOutputSchema<S>): NormalizeResult<Infer<S>> {
  const issues: NormalizeIssue[] = [];
  const value = normalizeField(schema.root, raw, '$', issues);
  assertConforms(value, schema);
  return { value, issues };
}

export function formatIssue(issue: NormalizeIssue): string {
  return `${issue.kind} ${issue.path}: ${issue.detail}`;
}
