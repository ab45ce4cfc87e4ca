/**
 * trait_assign tool
 */

import { z } from 'zod';
import { registerTool } from '../tool-registry.js';
import { getService } from '../graph-service.js';

export const TraitAssignInput = z.object({
  modelId: z.number().int().positive().describe('Entity to extend'),
  trait: z.string().min(1).describe('Name of the trait type'),
});

export async function traitAssignTool(input: z.infer<typeof TraitAssignInput>) {
  const service = getService();

  service.assignTrait(input.modelId, service.types.getTypeByName(input.trait).id);
  const composition = service.getTypeComposition(input.modelId);

  return {
    success: true,
    modelId: input.modelId,
    traits: composition.traits.map(trait => trait.name),
  };
}

registerTool({
  name: 'trait_assign',
  description: 'Assign a trait to an entity, making the trait\'s attribute keys available to it.',
  inputSchema: TraitAssignInput,
  handler: traitAssignTool,
});
