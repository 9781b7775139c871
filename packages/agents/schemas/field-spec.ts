// Declarative agent output schemas
// Each agent declares its output as a field-spec tree; the TypeScript output type is inferred from it

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

interface BaseSpec {
  /** Shown next to the field when the schema is rendered into a prompt */
  readonly description?: string;
}

export interface StringSpec extends BaseSpec {
  readonly kind: 'string';
  readonly default: string;
}

export interface EnumSpec<V extends string = string> extends BaseSpec {
  readonly kind: 'enum';
  readonly values: readonly V[];
  readonly fallback: V;
}

export interface NumberSpec<N extends boolean = boolean> extends BaseSpec {
  readonly kind: 'number';
  readonly nullable: N;
  readonly default: N extends true ? number | null : number;
  readonly min?: number;
  readonly max?: number;
  readonly integer: boolean;
}

export interface BooleanSpec extends BaseSpec {
  readonly kind: 'boolean';
  readonly default: boolean;
}

export interface ArraySpec<I extends FieldSpec = FieldSpec> extends BaseSpec {
  readonly kind: 'array';
  readonly items: I;
  /** A lone object where an array was expected becomes a one-element array */
  readonly wrapSingle: boolean;
  /** An object carrying the array under this key is unwrapped, e.g. {"metrics": [...]} */
  readonly unwrapKey?: string;
}

export interface ObjectSpec<F extends Record<string, FieldSpec> = Record<string, FieldSpec>> extends BaseSpec {
  readonly kind: 'object';
  readonly fields: F;
  /** A bare string where this object was expected is placed into the named field */
  readonly fromString?: keyof F & string;
}

/** Open JSON object: any keys, JSON values */
export interface RecordSpec extends BaseSpec {
  readonly kind: 'record';
}

export type FieldSpec =
  | StringSpec
  | EnumSpec
  | NumberSpec
  | BooleanSpec
  | ArraySpec
  | ObjectSpec
  | RecordSpec;

export type Infer<S> =
  S extends StringSpec ? string :
  S extends EnumSpec<infer V> ? V :
  S extends NumberSpec<infer N> ? (N extends true ? number | null : number) :
  S extends BooleanSpec ? boolean :
  S extends ArraySpec<infer I> ? Array<Infer<I>> :
  S extends ObjectSpec<infer F> ? { [K in keyof F]: Infer<F[K]> } :
  S extends RecordSpec ? JsonObject :
  never;

export interface AgentOutputSchema<S extends FieldSpec = FieldSpec> {
  readonly name: string;
  readonly root: S;
}

export type SchemaOutput<T> = T extends AgentOutputSchema<infer S> ? Infer<S> : never;

export function defineSchema<S extends FieldSpec>(name: string, root: S): AgentOutputSchema<S> {
  return Object.freeze({ name, root });
}

// ── Builders ────────────────────────────────────────────────────────

export function str(description?: string, defaultValue = ''): StringSpec {
  return { kind: 'string', default: defaultValue, description };
}

export function enumOf<V extends string>(
  values: readonly [V, ...V[]],
  fallback: V,
  description?: string,
): EnumSpec<V> {
  return { kind: 'enum', values, fallback, description };
}

interface NumberOptions {
  min?: number;
  max?: number;
  integer?: boolean;
  description?: string;
}

export function num(options: NumberOptions & { default?: number } = {}): NumberSpec<false> {
  return {
    kind: 'number',
    nullable: false,
    default: options.default ?? 0,
    min: options.min,
    max: options.max,
    integer: options.integer ?? false,
    description: options.description,
  };
}

export function nullableNum(options: NumberOptions = {}): NumberSpec<true> {
  return {
    kind: 'number',
    nullable: true,
    default: null,
    min: options.min,
    max: options.max,
    integer: options.integer ?? false,
    description: options.description,
  };
}

/** Score/confidence field: a number clamped into [0, 1], defaulting to 0.0 */
export function score(description?: string): NumberSpec<false> {
  return num({ min: 0, max: 1, default: 0, description });
}

export function bool(description?: string, defaultValue = false): BooleanSpec {
  return { kind: 'boolean', default: defaultValue, description };
}

export function arr<I extends FieldSpec>(
  items: I,
  options: { wrapSingle?: boolean; unwrapKey?: string; description?: string } = {},
): ArraySpec<I> {
  return {
    kind: 'array',
    items,
    wrapSingle: options.wrapSingle ?? false,
    unwrapKey: options.unwrapKey,
    description: options.description,
  };
}

export function obj<F extends Record<string, FieldSpec>>(
  fields: F,
  options: { fromString?: keyof F & string; description?: string } = {},
): ObjectSpec<F> {
  return { kind: 'object', fields, fromString: options.fromString, description: options.description };
}

export function record(description?: string): RecordSpec {
  return { kind: 'record', description };
}
