// Renders agent schemas into prompt text: an annotated JSON skeleton plus explicit field rules

import type { AgentOutputSchema, FieldSpec } from './field-spec.js';

function formatBound(n: number): string {
  return Number.isInteger(n) ? n.toFixed(1) : String(n);
}

function scalarLabel(spec: FieldSpec): string {
  switch (spec.kind) {
    case 'string': return '"string"';
    case 'enum': return spec.values.map(v => JSON.stringify(v)).join(' | ');
    case 'number': {
      const base = spec.integer ? 'integer' : 'float';
      return spec.nullable ? `${base} | null` : base;
    }
    case 'boolean': return 'true | false';
    case 'record': return '{}';
    default: return '';
  }
}

function constraintNote(spec: FieldSpec): string | undefined {
  if (spec.kind === 'enum') return `one of: ${spec.values.join(', ')}`;
  if (spec.kind === 'number' && spec.min !== undefined && spec.max !== undefined) {
    return `${formatBound(spec.min)} to ${formatBound(spec.max)}`;
  }
  if (spec.kind === 'number' && spec.min !== undefined) return `>= ${formatBound(spec.min)}`;
  return undefined;
}

function comment(spec: FieldSpec): string {
  const parts = [spec.description, constraintNote(spec)].filter((p): p is string => Boolean(p));
  return parts.length > 0 ? ` // ${parts.join('; ')}` : '';
}

function renderField(key: string | null, spec: FieldSpec, depth: number, last: boolean): string[] {
  const pad = '  '.repeat(depth);
  const comma = last ? '' : ',';
  const label = key === null ? '' : `${JSON.stringify(key)}: `;

  if (spec.kind === 'object') {
    const entries = Object.entries(spec.fields);
    const inner = entries.flatMap(([k, s], i) => renderField(k, s, depth + 1, i === entries.length - 1));
    return [`${pad}${label}{${comment(spec)}`, ...inner, `${pad}}${comma}`];
  }
  if (spec.kind === 'array') {
    const inner = renderField(null, spec.items, depth + 1, true);
    return [`${pad}${label}[${comment(spec)}`, ...inner, `${pad}]${comma}`];
  }
  return [`${pad}${label}${scalarLabel(spec)}${comma}${comment(spec)}`];
}

/** Annotated JSON skeleton of the schema, suitable for embedding in a prompt. */
export function describeSchema(schema: AgentOutputSchema): string {
  return renderField(null, schema.root, 0, true).join('\n');
}

function collectRules(spec: FieldSpec, key: string, seen: Set<string>, out: string[]): void {
  switch (spec.kind) {
    case 'enum': {
      const rule = `- ${key} must be one of: ${spec.values.join(', ')} (anything else is recorded as "${spec.fallback}")`;
      if (!seen.has(rule)) {
        seen.add(rule);
        out.push(rule);
      }
      return;
    }
    case 'number': {
      if (spec.min === undefined || spec.max === undefined) return;
      const rule = `- ${key} must be a number between ${formatBound(spec.min)} and ${formatBound(spec.max)}`;
      if (!seen.has(rule)) {
        seen.add(rule);
        out.push(rule);
      }
      return;
    }
    case 'array':
      collectRules(spec.items, key, seen, out);
      return;
    case 'object':
      for (const [k, s] of Object.entries(spec.fields)) collectRules(s, k, seen, out);
      return;
    default:
      return;
  }
}

/** One line per constrained field: enumerations and numeric ranges, in schema order. */
export function schemaRules(schema: AgentOutputSchema): string[] {
  const out: string[] = [];
  collectRules(schema.root, schema.name, new Set(), out);
  return out;
}
