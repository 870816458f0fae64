import { z } from 'zod'
import { EntitySchema, type KnowledgeGraph, RelationSchema } from '../../memory/knowledge-graph.js'
import type { AnyTool, ResourceScope, Tool } from '../types.js'

const MEMORY_READ: ResourceScope[] = [{ key: 'memory', mode: 'read' }]
const MEMORY_WRITE: ResourceScope[] = [{ key: 'memory', mode: 'write' }]

const ObservationPatchSchema = z.object({
    entityName: z.string().describe('Entity the observations belong to'),
    contents: z.array(z.string()).describe('Observation texts'),
})

const json = (value: unknown) => JSON.stringify(value, null, 2)

function memoryTool<T>(
    name: string,
    description: string,
    parameters: z.ZodSchema<T>,
    mutating: boolean,
    run: (input: T) => Promise<string>
): Tool<T> {
    return {
        name,
        description,
        parameters,
        riskClass: mutating ? 'mutating' : 'safe',
        resourceScope: () => (mutating ? MEMORY_WRITE : MEMORY_READ),
        execute: (input) => run(input),
    }
}

/** Knowledge-graph tools, all backed by the same graph. */
export function createMemoryTools(graph: KnowledgeGraph): AnyTool[] {
    return [
        memoryTool(
            'memory_create_entities',
            'Create entities in the knowledge graph. Entities whose name already exists are skipped',
            z.object({ entities: z.array(EntitySchema) }),
            true,
            async (input) => json(await graph.createEntities(input.entities))
        ),
        memoryTool(
            'memory_create_relations',
            'Create directed relations between entities, phrased in active voice (from → relationType → to)',
            z.object({ relations: z.array(RelationSchema) }),
            true,
            async (input) => json(await graph.createRelations(input.relations))
        ),
        memoryTool(
            'memory_add_observations',
            'Add observations to existing entities',
            z.object({ observations: z.array(ObservationPatchSchema) }),
            true,
            async (input) => json(await graph.addObservations(input.observations))
        ),
        memoryTool(
            'memory_delete_entities',
            'Delete entities and every relation touching them',
            z.object({ entityNames: z.array(z.string()) }),
            true,
            async (input) => {
                await graph.deleteEntities(input.entityNames)
                return 'Entities deleted'
            }
        ),
        memoryTool(
            'memory_delete_observations',
            'Delete specific observations from entities',
            z.object({ deletions: z.array(ObservationPatchSchema) }),
            true,
            async (input) => {
                await graph.deleteObservations(input.deletions)
                return 'Observations deleted'
            }
        ),
        memoryTool(
            'memory_delete_relations',
            'Delete relations from the knowledge graph',
            z.object({ relations: z.array(RelationSchema) }),
            true,
            async (input) => {
                await graph.deleteRelations(input.relations)
                return 'Relations deleted'
            }
        ),
        memoryTool('memory_read_graph', 'Read the entire knowledge graph', z.object({}), false, async () =>
            json(await graph.read())
        ),
        memoryTool(
            'memory_search_nodes',
            'Search entities by name, type or observation text',
            z.object({ query: z.string() }),
            false,
            async (input) => json(await graph.search(input.query))
        ),
        memoryTool(
            'memory_open_nodes',
            'Open entities by name, with the relations between them',
            z.object({ names: z.array(z.string()) }),
            false,
            async (input) => json(await graph.open(input.names))
        ),
    ]
}
