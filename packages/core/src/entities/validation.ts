import { ValidationError } from '../shared/errors.js';
import { isPlainObject, toFieldValue } from '../shared/types.js';
import type { FieldMap, FieldPatch } from '../shared/types.js';
import { comparePartialDates } from './dates.js';
import { descriptorFor } from './kinds.js';
import type { JsonSchema } from './kinds.js';
import type { EntityKind, FieldsOf } from './types.js';

interface AjvError {
  instancePath?: string;
  keyword?: string;
  message?: string;
  params?: Record<string, unknown>;
}

type AjvValidateFunction = ((data: unknown) => boolean) & { errors?: AjvError[] | null };

interface AjvInstance {
  compile(schema: JsonSchema): AjvValidateFunction;
}

// Lazy-initialized Ajv instance (avoids ESM/CJS import issues at module level)
let _ajv: AjvInstance | null = null;
async function getAjv(): Promise<AjvInstance> {
  if (_ajv) return _ajv;
  // Dynamic import handles ESM/CJS interop correctly
  const mod = await import('ajv');
  const AjvClass = mod.default ?? mod;
  _ajv = new (AjvClass as unknown as { new(opts: { allErrors: boolean }): AjvInstance })({ allErrors: true });
  return _ajv;
}

type SchemaMode = 'create' | 'patch';
const compiled = new Map<string, AjvValidateFunction>();

async function validatorFor(kind: EntityKind, mode: SchemaMode): Promise<AjvValidateFunction> {
  const key = `${kind}:${mode}`;
  const cached = compiled.get(key);
  if (cached) return cached;

  const descriptor = descriptorFor(kind);
  const schema: JsonSchema = {
    type: 'object',
    additionalProperties: false,
    properties: descriptor.properties,
    ...(mode === 'create' && descriptor.required.length > 0 ? { required: [...descriptor.required] } : {}),
  };
  const validate = (await getAjv()).compile(schema);
  compiled.set(key, validate);
  return validate;
}

function offendingField(error: AjvError): string | undefined {
  const params = error.params ?? {};
  if (error.keyword === 'additionalProperties' && typeof params.additionalProperty === 'string') {
    return params.additionalProperty;
  }
  if (error.keyword === 'required' && typeof params.missingProperty === 'string') {
    return params.missingProperty;
  }
  const path = error.instancePath?.replace(/^\//, '');
  return path ? path.split('/')[0] : undefined;
}

function describe(error: AjvError): string {
  const field = offendingField(error);
  if (error.keyword === 'additionalProperties') return `unknown field "${field}"`;
  return field ? `${field} ${error.message ?? 'is invalid'}` : error.message ?? 'is invalid';
}

async function validateAgainst(kind: EntityKind, mode: SchemaMode, input: unknown): Promise<FieldPatch> {
  if (!isPlainObject(input)) {
    throw new ValidationError(`Input for ${kind} must be an object`);
  }

  const validate = await validatorFor(kind, mode);
  if (!validate(input)) {
    const errors = validate.errors ?? [];
    const first = errors[0];
    throw new ValidationError(
      `Invalid ${kind} input: ${errors.map(describe).join('; ')}`,
      first ? offendingField(first) : undefined,
      { schema_errors: errors },
    );
  }

  const patch: FieldPatch = {};
  for (const [field, value] of Object.entries(input)) {
    if (value === undefined) continue;
    patch[field] = toFieldValue(value, field);
  }
  return patch;
}

/** Schema-checks a create payload; defaults are applied by `decode`. */
export function validateCreateInput(kind: EntityKind, input: unknown): Promise<FieldPatch> {
  return validateAgainst(kind, 'create', input);
}

/** Schema-checks a partial patch (also used for list filters). */
export function validatePatchInput(kind: EntityKind, input: unknown): Promise<FieldPatch> {
  return validateAgainst(kind, 'patch', input);
}

/**
 * Rejects a patch that would change a column fixed at creation time.
 * Re-sending the current value is allowed.
 */
export function assertMutableFields(kind: EntityKind, current: FieldMap, patch: FieldPatch): void {
  for (const field of descriptorFor(kind).immutable) {
    if (field in patch && patch[field] !== current[field]) {
      throw new ValidationError(`${field} cannot be changed after creation`, field);
    }
  }
}

function assertOrdered(
  start: string | null,
  end: string | null,
  startField: string,
  endField: string,
): void {
  if (start !== null && end !== null && comparePartialDates(end, start) < 0) {
    throw new ValidationError(`${endField} cannot precede ${startField}`, endField);
  }
}

/** Cross-field rules the per-field schema cannot express. */
export function assertFieldConsistency<K extends EntityKind>(kind: K, fields: FieldsOf<K>): void {
  const values: FieldMap = fields;
  const text = (field: string) => {
    const value = values[field];
    return typeof value === 'string' ? value : null;
  };

  if (kind === 'person') {
    assertOrdered(text('birth_date'), text('death_date'), 'birth_date', 'death_date');
  } else if (kind === 'relationship') {
    assertOrdered(text('start_date'), text('end_date'), 'start_date', 'end_date');
  }
}
