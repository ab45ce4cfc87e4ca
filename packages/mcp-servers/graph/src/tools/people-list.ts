/**
 * people_list tool
 */

import { z } from 'zod';
import { registerTool } from '../tool-registry.js';
import { getService } from '../graph-service.js';

export const PERSON_TYPE = 'Person';

export const PeopleListInput = z.object({
  limit: z.number().int().positive().optional().describe('Maximum number of people to return'),
});

export async function peopleListTool(input: z.infer<typeof PeopleListInput>) {
  const service = getService();

  const personType = service.types.findTypeByName(PERSON_TYPE);
  if (!personType || personType.kind !== 'base') {
    return {
      people: [],
      count: 0,
      message: `No ${PERSON_TYPE} type found. Define it or add a person first.`,
    };
  }

  const people = service.listEntities({ typeName: PERSON_TYPE, limit: input.limit }).map(person => ({
    id: person.id,
    name: person.title,
    description: person.body ?? 'No description available',
  }));

  return {
    people,
    count: people.length,
    message: `Found ${people.length} people`,
  };
}

registerTool({
  name: 'people_list',
  description: 'List every entity whose base type is Person, with its name and description.',
  inputSchema: PeopleListInput,
  handler: peopleListTool,
});
