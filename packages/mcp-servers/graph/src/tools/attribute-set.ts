/**
 * attribute_set tool
 *
 * Add a value for an attribute key. Keys can hold several values; the
 * materialized view shows the most recent one.
 */

import { z } from 'zod';
import { registerTool } from '../tool-registry.js';
import { getService } from '../graph-service.js';
import { ToolValue } from './model-create.js';

export const AttributeSetInput = z.object({
  modelId: z.number().int().positive().describe('Entity receiving the value'),
  key: z.string().min(1).describe('Key declared by the entity\'s base type or one of its traits'),
  value: ToolValue.describe('Value matching the key\'s declared type'),
});

export async function attributeSetTool(input: z.infer<typeof AttributeSetInput>) {
  const service = getService();

  const attributeId = service.setAttribute(input.modelId, input.key, input.value);

  return {
    success: true,
    attributeId,
    values: service.getAttributeValues(input.modelId, input.key).map(attribute => attribute.value.value),
  };
}

registerTool({
  name: 'attribute_set',
  description: `Add an attribute value to an entity.

The value is checked against the key's declared type and constraints.
Setting the same value twice is rejected.`,
  inputSchema: AttributeSetInput,
  handler: attributeSetTool,
});
