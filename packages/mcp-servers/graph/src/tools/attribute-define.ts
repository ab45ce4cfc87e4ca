/**
 * attribute_define tool
 *
 * Declare an attribute key on a type.
 */

import { z } from 'zod';
import { AttributeConstraints, ValueType } from '@graphdoc/shared';
import { registerTool } from '../tool-registry.js';
import { getService } from '../graph-service.js';

export const AttributeDefineInput = z.object({
  type: z.string().min(1).describe('Name of the base type or trait declaring the key'),
  key: z.string().min(1).describe('Attribute key, unique within the type'),
  valueType: ValueType.describe('Value type every value of this key must have'),
  required: z.boolean().optional().describe('Informational; not enforced on writes'),
  constraints: AttributeConstraints.optional().describe('Length, pattern, enum, range or dimension limits'),
});

export async function attributeDefineTool(input: z.infer<typeof AttributeDefineInput>) {
  const service = getService();
  const type = service.types.getTypeByName(input.type);

  service.defineAttribute({
    typeId: type.id,
    key: input.key,
    valueType: input.valueType,
    required: input.required,
    constraints: input.constraints,
  });

  return {
    success: true,
    attribute: service.types.getAttributeDefinition(type.id, input.key),
  };
}

registerTool({
  name: 'attribute_define',
  description: `Declare an attribute key on a type, with its value type and optional constraints.`,
  inputSchema: AttributeDefineInput,
  handler: attributeDefineTool,
});
