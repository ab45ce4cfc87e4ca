/**
 * model_get tool
 *
 * Fetch an entity with its types, attributes and immediate neighbours.
 */

import { z } from 'zod';
import { isGraphError } from '@graphdoc/shared';
import { registerTool } from '../tool-registry.js';
import { getService } from '../graph-service.js';

export const ModelGetInput = z.object({
  id: z.number().int().positive().describe('Entity ID'),
  strategy: z.enum(['walk', 'query']).optional().describe('Materialization strategy (default: server setting)'),
});

export async function modelGetTool(input: z.infer<typeof ModelGetInput>) {
  const service = getService();

  try {
    return {
      success: true,
      model: service.materialize(input.id, input.strategy),
    };
  } catch (error) {
    if (isGraphError(error, 'EntityNotFound')) {
      return {
        success: false,
        error: 'Model not found',
        message: `No model found with ID ${input.id}`,
      };
    }
    throw error;
  }
}

registerTool({
  name: 'model_get',
  description: `Get an entity in full: its base type and traits, its attributes
(most recent value per key) and every relation in either direction with
the entity at the other end.`,
  inputSchema: ModelGetInput,
  handler: modelGetTool,
});
