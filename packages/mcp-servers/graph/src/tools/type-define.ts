/**
 * type_define tool
 *
 * Declare a base type or a trait.
 */

import { z } from 'zod';
import { TypeKind } from '@graphdoc/shared';
import { registerTool } from '../tool-registry.js';
import { getService } from '../graph-service.js';

export const TypeDefineInput = z.object({
  name: z.string().min(1).describe('Unique type name, e.g. "Person" or "Employee"'),
  kind: TypeKind.describe('"base" for an entity\'s primary type, "trait" for an additive one'),
  parent: z.string().optional().describe('Name of the parent type'),
  description: z.string().optional().describe('What this type represents'),
});

export async function typeDefineTool(input: z.infer<typeof TypeDefineInput>) {
  const service = getService();

  const parentId = input.parent === undefined ? undefined : service.types.getTypeByName(input.parent).id;
  const id = service.defineType({
    name: input.name,
    kind: input.kind,
    parentId,
    description: input.description,
  });

  return {
    success: true,
    type: service.types.getType(id),
  };
}

registerTool({
  name: 'type_define',
  description: `Declare a new type.

Base types classify entities (every entity has exactly one).
Traits are added to entities to give them extra attribute keys.`,
  inputSchema: TypeDefineInput,
  handler: typeDefineTool,
});
