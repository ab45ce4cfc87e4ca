/**
 * person_add tool
 *
 * Add a Person entity, creating the Person base type on first use.
 */

import { z } from 'zod';
import { createLogger } from '@graphdoc/shared';
import { registerTool } from '../tool-registry.js';
import { getService } from '../graph-service.js';
import { PERSON_TYPE } from './people-list.js';

const log = createLogger('person_add');

export const PersonAddInput = z.object({
  name: z.string().trim().min(1).describe('The person\'s name'),
  description: z.string().trim().optional().describe('Short description of the person'),
});

export async function personAddTool(input: z.infer<typeof PersonAddInput>) {
  const service = getService();

  return service.transaction(() => {
    let personType = service.types.findTypeByName(PERSON_TYPE);
    if (!personType) {
      const id = service.defineType({ name: PERSON_TYPE, kind: 'base', description: 'A human person' });
      personType = service.types.getType(id);
      log.info(`Created ${PERSON_TYPE} type`);
    }

    const [existing] = service.listEntities({ typeName: PERSON_TYPE, title: input.name, limit: 1 });
    if (existing) {
      return {
        success: false,
        error: 'Person already exists',
        message: `A person named '${input.name}' already exists`,
        existing_person: {
          id: existing.id,
          name: existing.title,
          description: existing.body ?? 'No description',
        },
      };
    }

    const id = service.createEntity({
      baseTypeId: personType.id,
      title: input.name,
      body: input.description || undefined,
    });

    return {
      success: true,
      person: {
        id,
        name: input.name,
        description: input.description || 'No description',
      },
      message: `Added '${input.name}'`,
    };
  });
}

registerTool({
  name: 'person_add',
  description: `Add a person by name, with an optional description.

Names are unique among people; adding an existing name returns the
existing person instead.`,
  inputSchema: PersonAddInput,
  handler: personAddTool,
});
