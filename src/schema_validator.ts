/**
 * Schema Validator - JSON schema subset used for configuration files,
 * conversation snapshots and verification verdicts.
 */

export interface SchemaViolation {
    path: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: SchemaViolation[];
}

export type SchemaType = 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean' | 'null';

export interface JsonSchema {
    type: SchemaType;
    properties?: Record<string, JsonSchema>;
    /** Schema applied to keys not listed in `properties`. */
    additionalProperties?: JsonSchema;
    required?: string[];
    items?: JsonSchema;
    enum?: ReadonlyArray<string | number | boolean>;
    pattern?: string;
    minimum?: number;
    maximum?: number;
    minLength?: number;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SchemaValidator {
    private schemas: Map<string, JsonSchema> = new Map();

    registerSchema(schemaId: string, schema: JsonSchema): void {
        this.schemas.set(schemaId, schema);
    }

    validate(value: unknown, schemaId: string): ValidationResult {
        const schema = this.schemas.get(schemaId);
        if (!schema) {
            return {
                valid: false,
                errors: [{ path: '', message: `Schema not found: ${schemaId}` }],
            };
        }

        const errors: SchemaViolation[] = [];
        this.validateValue(value, schema, '', errors);

        return {
            valid: errors.length === 0,
            errors,
        };
    }

    private validateValue(
        value: unknown,
        schema: JsonSchema,
        path: string,
        errors: SchemaViolation[]
    ): void {
        const actualType = this.getType(value);
        const typeMatches = schema.type === 'integer'
            ? typeof value === 'number' && Number.isInteger(value)
            : actualType === schema.type;
        if (!typeMatches) {
            errors.push({
                path,
                message: `Expected type ${schema.type}, got ${actualType}`,
            });
            return;
        }

        if (isRecord(value)) {
            if (schema.required) {
                for (const req of schema.required) {
                    if (!(req in value)) {
                        errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                    }
                }
            }

            const known = schema.properties ?? {};
            for (const [key, child] of Object.entries(value)) {
                const propSchema = known[key] ?? schema.additionalProperties;
                if (propSchema) {
                    this.validateValue(child, propSchema, `${path}.${key}`, errors);
                }
            }
        }

        if (Array.isArray(value) && schema.items) {
            for (let i = 0; i < value.length; i++) {
                this.validateValue(value[i], schema.items, `${path}[${i}]`, errors);
            }
        }

        if (schema.enum && (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean')) {
            if (!schema.enum.includes(value)) {
                errors.push({
                    path,
                    message: `Value must be one of: ${schema.enum.join(', ')}`,
                });
            }
        }

        if (typeof value === 'string') {
            if (schema.pattern && !new RegExp(schema.pattern).test(value)) {
                errors.push({ path, message: `Value does not match pattern: ${schema.pattern}` });
            }
            if (schema.minLength !== undefined && value.length < schema.minLength) {
                errors.push({ path, message: `Length ${value.length} < minLength ${schema.minLength}` });
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

    private getType(value: unknown): string {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        return typeof value;
    }
}

export function formatViolations(result: ValidationResult): string {
    return result.errors.map(e => `${e.path || '<root>'}: ${e.message}`).join('; ');
}
