/**
 * Tool Argument Validation
 *
 * Validates tool invocation arguments against the catalogue's declared
 * parameter schema (a JSON Schema subset):
 * - Required arguments present
 * - Unknown arguments rejected when additionalProperties=false
 * - Argument types, enums and numeric/string bounds
 * - String length limit (default: 10,000 chars)
 */

export type ToolInputSchema = {
  type: 'object';
  properties?: Record<string, SchemaProperty>;
  required?: string[];
  additionalProperties?: boolean;
};

export interface SchemaProperty {
  type: string | string[];
  description?: string;
  enum?: unknown[];
  items?: SchemaProperty;
  properties?: Record<string, SchemaProperty>;
  minLength?: number;
  maxLength?: number;
  minimum?: number;
  maximum?: number;
  default?: unknown;
}

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

/**
 * Default maximum string length for tool arguments
 */
const DEFAULT_MAX_STRING_LENGTH = 10000;

/**
 * Validate tool arguments against schema
 */
export function validateToolArguments(
  args: Record<string, unknown>,
  schema: ToolInputSchema,
  maxStringLength: number = DEFAULT_MAX_STRING_LENGTH
): ValidationResult {
  const properties = schema.properties || {};
  const required = schema.required || [];
  const additionalProperties = schema.additionalProperties ?? true;

  for (const requiredArg of required) {
    if (!(requiredArg in args)) {
      return {
        valid: false,
        error: `Missing required argument: ${requiredArg}`,
      };
    }
  }

  for (const [argName, argValue] of Object.entries(args)) {
    const propSchema = properties[argName];
    if (!propSchema) {
      if (additionalProperties) {
        continue;
      }
      return {
        valid: false,
        error: `Unknown argument: ${argName}`,
      };
    }

    const typeValidation = validateType(argValue, propSchema, maxStringLength);
    if (!typeValidation.valid) {
      return {
        valid: false,
        error: `Argument '${argName}': ${typeValidation.error}`,
      };
    }
  }

  return { valid: true };
}

function checkBounds(value: number, schema: SchemaProperty, label: string): ValidationResult {
  if (schema.minimum !== undefined && value < schema.minimum) {
    return { valid: false, error: `${label} less than minimum of ${schema.minimum}` };
  }
  if (schema.maximum !== undefined && value > schema.maximum) {
    return { valid: false, error: `${label} exceeds maximum of ${schema.maximum}` };
  }
  return { valid: true };
}

/**
 * Validate value against schema property
 */
function validateType(value: unknown, schema: SchemaProperty, maxStringLength: number): ValidationResult {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  let matched: ValidationResult | undefined;

  for (const type of types) {
    if (type === 'string' && typeof value === 'string') {
      if (value.length > maxStringLength) {
        matched = { valid: false, error: `String exceeds maximum length of ${maxStringLength} characters` };
      } else if (schema.minLength !== undefined && value.length < schema.minLength) {
        matched = { valid: false, error: `String shorter than minimum length of ${schema.minLength}` };
      } else if (schema.maxLength !== undefined && value.length > schema.maxLength) {
        matched = { valid: false, error: `String exceeds maximum length of ${schema.maxLength}` };
      } else {
        matched = { valid: true };
      }
      break;
    } else if (type === 'number' && typeof value === 'number' && Number.isFinite(value)) {
      matched = checkBounds(value, schema, 'Number');
      break;
    } else if (type === 'integer' && typeof value === 'number' && Number.isInteger(value)) {
      matched = checkBounds(value, schema, 'Integer');
      break;
    } else if (type === 'boolean' && typeof value === 'boolean') {
      matched = { valid: true };
      break;
    } else if (type === 'null' && value === null) {
      matched = { valid: true };
      break;
    } else if (type === 'array' && Array.isArray(value)) {
      matched = { valid: true };
      if (schema.items) {
        for (let i = 0; i < value.length; i++) {
          const itemValidation = validateType(value[i], schema.items, maxStringLength);
          if (!itemValidation.valid) {
            matched = { valid: false, error: `Array item ${i}: ${itemValidation.error}` };
            break;
          }
        }
      }
      break;
    } else if (type === 'object' && typeof value === 'object' && value !== null && !Array.isArray(value)) {
      matched = { valid: true };
      if (schema.properties) {
        for (const [propName, propValue] of Object.entries(value)) {
          const propSchema = schema.properties[propName];
          if (propSchema) {
            const propValidation = validateType(propValue, propSchema, maxStringLength);
            if (!propValidation.valid) {
              matched = { valid: false, error: `Property '${propName}': ${propValidation.error}` };
              break;
            }
          }
        }
      }
      break;
    }
  }

  if (!matched) {
    return {
      valid: false,
      error: `Type mismatch: expected ${types.join(' or ')}, got ${value === null ? 'null' : typeof value}`,
    };
  }
  if (!matched.valid) {
    return matched;
  }

  if (schema.enum && !schema.enum.includes(value)) {
    return {
      valid: false,
      error: `Value not in allowed enum: ${JSON.stringify(schema.enum)}`,
    };
  }

  return { valid: true };
}

/**
 * Redact sensitive fields (recursively) before arguments reach a log line
 */
export function redactFields(value: unknown, redactFieldNames: readonly string[]): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactFields(item, redactFieldNames));
  }

  if (typeof value === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      redacted[key] = redactFieldNames.includes(key) ? '[REDACTED]' : redactFields(val, redactFieldNames);
    }
    return redacted;
  }

  return value;
}
