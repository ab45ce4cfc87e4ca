/**
 * relationship_type_define tool
 *
 * Declare a named, directed relationship between two base types.
 */

import { z } from 'zod';
import { Multiplicity } from '@graphdoc/shared';
import { registerTool } from '../tool-registry.js';
import { getService } from '../graph-service.js';

export const RelationshipTypeDefineInput = z.object({
  from: z.string().min(1).describe('Base type at the start of the relation'),
  to: z.string().min(1).describe('Base type at the end of the relation'),
  name: z.string().min(1).describe('Relation name, e.g. "works_for"'),
  multiplicity: Multiplicity.optional().describe('Informational cardinality (default: many)'),
  description: z.string().optional(),
});

export async function relationshipTypeDefineTool(input: z.infer<typeof RelationshipTypeDefineInput>) {
  const service = getService();

  const id = service.defineRelationshipType({
    fromTypeId: service.types.getTypeByName(input.from).id,
    toTypeId: service.types.getTypeByName(input.to).id,
    name: input.name,
    multiplicity: input.multiplicity,
    description: input.description,
  });

  return {
    success: true,
    relationshipType: service.types.getRelationshipType(id),
  };
}

registerTool({
  name: 'relationship_type_define',
  description: `Declare a relationship type between two base types.

Relations of this type may only connect entities whose base types match.`,
  inputSchema: RelationshipTypeDefineInput,
  handler: relationshipTypeDefineTool,
});
