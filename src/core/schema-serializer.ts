/**
 * Schema Serializer - plain JSON view of an ApiSchema for downstream generators
 */

import type { ApiSchema, Field, Parameter } from '../types/schema.js';

export interface SerializedType {
  name: string;
  description: string;
  fields: Field[];
}

export interface SerializedMethod {
  name: string;
  description: string;
  parameters: Parameter[];
}

export interface SerializedSchema {
  types: SerializedType[];
  methods: SerializedMethod[];
}

export interface SchemaSummary {
  types: number;
  methods: number;
  fields: number;
  parameters: number;
}

export function serializeSchema(schema: ApiSchema): SerializedSchema {
  return {
    types: schema.types.map((type) => ({
      name: type.name,
      description: type.description,
      fields: type.fields.map((field) => ({ ...field })),
    })),
    methods: schema.methods.map((method) => ({
      name: method.name,
      description: method.description,
      parameters: method.parameters.map((parameter) => ({ ...parameter })),
    })),
  };
}

export function schemaToJson(schema: ApiSchema, indent = 2): string {
  return JSON.stringify(serializeSchema(schema), null, indent);
}

export function summarizeSchema(schema: ApiSchema): SchemaSummary {
  return {
    types: schema.types.length,
    methods: schema.methods.length,
    fields: schema.types.reduce((sum, type) => sum + type.fields.length, 0),
    parameters: schema.methods.reduce((sum, method) => sum + method.parameters.length, 0),
  };
}
