/**
 * model_create tool
 *
 * Create an entity, optionally with traits and initial attribute values,
 * and return its materialized form.
 */

import { z } from 'zod';
import { registerTool } from '../tool-registry.js';
import { getService } from '../graph-service.js';

/**
 * Attribute value as it arrives over JSON; datetimes are ISO strings
 */
export const ToolValue = z.union([z.string(), z.number(), z.boolean(), z.array(z.number())]);

export const ModelCreateInput = z.object({
  type: z.string().min(1).describe('Name of the base type'),
  title: z.string().min(1).describe('Entity title'),
  body: z.string().optional().describe('Free-form body text'),
  traits: z.array(z.string()).optional().describe('Names of traits to assign'),
  attributes: z.record(ToolValue).optional().describe('Initial attribute values by key'),
});

export async function modelCreateTool(input: z.infer<typeof ModelCreateInput>) {
  const service = getService();

  const id = service.transaction(() => {
    const entityId = service.createEntity({
      baseTypeId: service.types.getTypeByName(input.type).id,
      title: input.title,
      body: input.body,
    });

    for (const trait of input.traits ?? []) {
      service.assignTrait(entityId, service.types.getTypeByName(trait).id);
    }
    for (const [key, value] of Object.entries(input.attributes ?? {})) {
      service.setAttribute(entityId, key, value);
    }

    return entityId;
  });

  return {
    success: true,
    id,
    model: service.materialize(id),
  };
}

registerTool({
  name: 'model_create',
  description: `Create an entity of a base type.

Traits are assigned before attributes are set, so trait keys can be used
in the same call. Nothing is created if any step fails.`,
  inputSchema: ModelCreateInput,
  handler: modelCreateTool,
});
