import { toJSONSchema } from 'zod';
import type { ZodType } from 'zod';
import { isOptional, needName, type Operation } from '@opgraph/core';
import type { OperationInputFieldSchema, OperationInputFieldType, OperationInputSchema } from './types.js';

type JsonSchema = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonSchema {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON Schema properties of a zod object schema, keyed by name
 */
function schemaProperties(schema: ZodType | undefined): Map<string, JsonSchema> {
  const properties = new Map<string, JsonSchema>();
  if (!schema) return properties;

  let json: unknown;
  try {
    json = toJSONSchema(schema, { io: 'input', unrepresentable: 'any' });
  } catch (err) {
    // Transforms and custom types have no JSON Schema form; fields fall back to json
    if (err instanceof Error) return properties;
    throw err;
  }
  const props = isJsonObject(json) ? json.properties : undefined;
  if (!isJsonObject(props)) return properties;

  for (const [key, prop] of Object.entries(props)) {
    if (isJsonObject(prop)) properties.set(key, prop);
  }
  return properties;
}

function fieldType(prop: JsonSchema | undefined): OperationInputFieldType {
  if (!prop) return 'json';
  if (Array.isArray(prop.enum)) return 'enum';
  switch (prop.type) {
    case 'string':
      return 'string';
    case 'boolean':
      return 'boolean';
    case 'integer':
    case 'number':
      return 'number';
    default:
      return 'json';
  }
}

/**
 * One field per need of the operation, in declaration order.
 * Optional needs are not required; types, descriptions and defaults come
 * from the zod schema where it describes the need.
 */
export function describeOperationInputs(op: Operation, schema?: ZodType): OperationInputSchema {
  const properties = schemaProperties(schema);

  const fields = op.needs.map((need) => {
    const key = needName(need);
    const prop = properties.get(key);
    const field: OperationInputFieldSchema = { key, type: fieldType(prop), required: !isOptional(need) };
    if (!prop) return field;

    if (typeof prop.description === 'string' && prop.description.trim()) {
      field.description = prop.description;
    }
    if (Object.prototype.hasOwnProperty.call(prop, 'default')) {
      field.defaultValue = prop.default;
    }
    if (field.type === 'enum' && Array.isArray(prop.enum)) {
      field.enumValues = prop.enum.filter((value): value is string => typeof value === 'string');
    }
    return field;
  });

  return { type: 'object', fields };
}
