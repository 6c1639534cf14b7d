import { SchemaType, type ResponseSchema } from '@google/generative-ai';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ExtractionResultSchema } from './extraction';

interface JsonSchemaNode {
  type?: string;
  description?: string;
  nullable?: boolean;
  enum?: string[];
  properties?: Record<string, JsonSchemaNode>;
  required?: string[];
  items?: JsonSchemaNode;
}

// Keys Gemini rejects (additionalProperties, minimum, ...) are not listed, so
// parsing drops them.
const JsonSchemaNodeSchema: z.ZodType<JsonSchemaNode> = z.lazy(() =>
  z.object({
    type: z.string().optional(),
    description: z.string().optional(),
    nullable: z.boolean().optional(),
    enum: z.array(z.string()).optional(),
    properties: z.record(z.string(), JsonSchemaNodeSchema).optional(),
    required: z.array(z.string()).optional(),
    items: JsonSchemaNodeSchema.optional(),
  })
);

function convertNode(node: JsonSchemaNode, path: string): ResponseSchema {
  const base = {
    ...(node.description ? { description: node.description } : {}),
    ...(node.nullable ? { nullable: true } : {}),
  };

  switch (node.type) {
    case 'object': {
      const properties: Record<string, ResponseSchema> = {};
      for (const [key, child] of Object.entries(node.properties ?? {})) {
        properties[key] = convertNode(child, `${path}.${key}`);
      }
      return {
        ...base,
        type: SchemaType.OBJECT,
        properties,
        ...(node.required && node.required.length > 0 ? { required: node.required } : {}),
      };
    }
    case 'array': {
      if (!node.items) {
        throw new Error(`Array schema at ${path} has no item schema`);
      }
      return { ...base, type: SchemaType.ARRAY, items: convertNode(node.items, `${path}[]`) };
    }
    case 'string':
      return node.enum
        ? { ...base, type: SchemaType.STRING, format: 'enum', enum: node.enum }
        : { ...base, type: SchemaType.STRING };
    case 'integer':
      return { ...base, type: SchemaType.INTEGER };
    case 'number':
      return { ...base, type: SchemaType.NUMBER };
    case 'boolean':
      return { ...base, type: SchemaType.BOOLEAN };
    default:
      throw new Error(`Unsupported schema node type "${node.type ?? 'none'}" at ${path}`);
  }
}

export function toResponseSchema(schema: z.ZodTypeAny): ResponseSchema {
  // Nested schema types hit TS2589 inside zodToJsonSchema's generics.
  const jsonSchema = zodToJsonSchema(schema as any, { target: 'openApi3', $refStrategy: 'none' });
  return convertNode(JsonSchemaNodeSchema.parse(jsonSchema), '$');
}

let cached: ResponseSchema | null = null;

export function buildResponseSchema(): ResponseSchema {
  if (!cached) {
    cached = toResponseSchema(ExtractionResultSchema);
  }
  return cached;
}
