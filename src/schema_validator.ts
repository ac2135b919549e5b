/**
 * Schema Validator - structural validation for the JSON documents the kernel
 * reads back from disk (state records, job configuration).
 */

export interface ValidationError {
    path: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationError[];
}

export type JsonType = 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean' | 'null';

export interface JsonSchema {
    type: JsonType | JsonType[];
    properties?: Record<string, JsonSchema>;
    /** Schema applied to every key not named in `properties`. */
    additionalProperties?: JsonSchema;
    required?: string[];
    items?: JsonSchema;
    minItems?: number;
    enum?: ReadonlyArray<string | number | boolean | null>;
    pattern?: string;
    minimum?: number;
    maximum?: number;
}

function hasOwn(obj: object, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(obj, key);
}

export class SchemaValidator {
    private schemas: Map<string, JsonSchema> = new Map();

    registerSchema(schemaId: string, schema: JsonSchema): void {
        this.schemas.set(schemaId, schema);
    }

    validate(document: unknown, schemaId: string): ValidationResult {
        const schema = this.schemas.get(schemaId);
        if (!schema) {
            return {
                valid: false,
                errors: [{ path: '', message: `Schema not found: ${schemaId}` }],
            };
        }

        const errors: ValidationError[] = [];
        this.validateValue(document, schema, '', errors);

        return {
            valid: errors.length === 0,
            errors,
        };
    }

    private validateValue(
        value: unknown,
        schema: JsonSchema,
        path: string,
        errors: ValidationError[]
    ): void {
        const allowed = Array.isArray(schema.type) ? schema.type : [schema.type];
        const actualType = this.getType(value);
        const typeOk = allowed.some((t) => t === actualType || (t === 'number' && actualType === 'integer'));
        if (!typeOk) {
            errors.push({
                path,
                message: `Expected type ${allowed.join('|')}, got ${actualType}`,
            });
            return;
        }

        if (actualType === 'object' && typeof value === 'object' && value !== null) {
            const record = value as Record<string, unknown>;

            for (const req of schema.required ?? []) {
                if (!hasOwn(record, req)) {
                    errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                }
            }

            for (const [key, child] of Object.entries(record)) {
                const named = schema.properties && hasOwn(schema.properties, key) ? schema.properties[key] : undefined;
                const propSchema = named ?? schema.additionalProperties;
                if (propSchema) {
                    this.validateValue(child, propSchema, `${path}.${key}`, errors);
                }
            }
        }

        if (Array.isArray(value)) {
            if (schema.minItems !== undefined && value.length < schema.minItems) {
                errors.push({ path, message: `Expected at least ${schema.minItems} items` });
            }
            if (schema.items) {
                for (let i = 0; i < value.length; i++) {
                    this.validateValue(value[i], schema.items, `${path}[${i}]`, errors);
                }
            }
        }

        if (schema.enum && !schema.enum.some((e) => e === value)) {
            errors.push({
                path,
                message: `Value must be one of: ${schema.enum.join(', ')}`,
            });
        }

        if (schema.pattern && typeof value === 'string') {
            const regex = new RegExp(schema.pattern);
            if (!regex.test(value)) {
                errors.push({ path, message: `Value does not match pattern: ${schema.pattern}` });
            }
        }

        if (typeof value === 'number') {
            if (schema.minimum !== undefined && value < schema.minimum) {
                errors.push({ path, message: `Value ${value} < minimum ${schema.minimum}` });
            }
            if (schema.maximum !== undefined && value > schema.maximum) {
                errors.push({ path, message: `Value ${value} > maximum ${schema.maximum}` });
            }
        }
    }

    private getType(value: unknown): JsonType | 'undefined' | 'other' {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        switch (typeof value) {
            case 'number':
                return Number.isInteger(value) ? 'integer' : 'number';
            case 'string':
                return 'string';
            case 'boolean':
                return 'boolean';
            case 'object':
                return 'object';
            case 'undefined':
                return 'undefined';
            default:
                return 'other';
        }
    }
}
