import { z } from 'zod'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'

export const EntitySchema = z.object({
    name: z.string().min(1),
    entityType: z.string().min(1),
    observations: z.array(z.string()),
})

export const RelationSchema = z.object({
    from: z.string().min(1),
    to: z.string().min(1),
    relationType: z.string().min(1),
})

const GraphSchema = z.object({
    entities: z.array(EntitySchema),
    relations: z.array(RelationSchema),
})

export type Entity = z.infer<typeof EntitySchema>
export type Relation = z.infer<typeof RelationSchema>
export type Graph = z.infer<typeof GraphSchema>

export interface ObservationPatch {
    entityName: string
    contents: string[]
}

function sameRelation(a: Relation, b: Relation): boolean {
    return a.from === b.from && a.to === b.to && a.relationType === b.relationType
}

/** Returns the entities plus only the relations running between them. */
function subgraph(graph: Graph, entities: Entity[]): Graph {
    const names = new Set(entities.map((e) => e.name))
    return {
        entities,
        relations: graph.relations.filter((r) => names.has(r.from) && names.has(r.to)),
    }
}

/**
 * Long-term memory as a graph of named entities carrying free-text observations,
 * persisted to a single JSON file. Loaded lazily and written after every mutation.
 */
export class KnowledgeGraph {
    private graph: Graph | null = null

    constructor(
        private fs: FileSystem,
        private filePath: string,
        private logger: Logger
    ) {}

    async read(): Promise<Graph> {
        if (this.graph) return this.graph

        this.graph = { entities: [], relations: [] }
        if (await this.fs.exists(this.filePath)) {
            try {
                this.graph = GraphSchema.parse(await this.fs.readJSON<unknown>(this.filePath))
            } catch (error) {
                this.logger.warn({ error, file: this.filePath }, 'Failed to load memory graph, starting empty')
            }
        }
        return this.graph
    }

    async createEntities(entities: Entity[]): Promise<Entity[]> {
        const graph = await this.read()
        const created: Entity[] = []
        for (const entity of entities) {
            if (graph.entities.some((existing) => existing.name === entity.name)) continue
            graph.entities.push(entity)
            created.push(entity)
        }
        await this.save()
        return created
    }

    async createRelations(relations: Relation[]): Promise<Relation[]> {
        const graph = await this.read()
        const created: Relation[] = []
        for (const relation of relations) {
            if (graph.relations.some((existing) => sameRelation(existing, relation))) continue
            graph.relations.push(relation)
            created.push(relation)
        }
        await this.save()
        return created
    }

    async addObservations(patches: ObservationPatch[]): Promise<ObservationPatch[]> {
        const graph = await this.read()
        // every target must exist before any of them changes
        const targets = patches.map((patch) => {
            const entity = graph.entities.find((e) => e.name === patch.entityName)
            if (!entity) throw new Error(`Entity '${patch.entityName}' not found`)
            return { entity, patch }
        })
        const added = targets.map(({ entity, patch }) => {
            const contents = [...new Set(patch.contents)].filter((c) => !entity.observations.includes(c))
            entity.observations.push(...contents)
            return { entityName: patch.entityName, contents }
        })
        await this.save()
        return added
    }

    async deleteEntities(names: string[]): Promise<void> {
        const graph = await this.read()
        const doomed = new Set(names)
        graph.entities = graph.entities.filter((e) => !doomed.has(e.name))
        graph.relations = graph.relations.filter((r) => !doomed.has(r.from) && !doomed.has(r.to))
        await this.save()
    }

    async deleteObservations(patches: ObservationPatch[]): Promise<void> {
        const graph = await this.read()
        for (const patch of patches) {
            const entity = graph.entities.find((e) => e.name === patch.entityName)
            if (entity) entity.observations = entity.observations.filter((o) => !patch.contents.includes(o))
        }
        await this.save()
    }

    async deleteRelations(relations: Relation[]): Promise<void> {
        const graph = await this.read()
        graph.relations = graph.relations.filter((r) => !relations.some((doomed) => sameRelation(doomed, r)))
        await this.save()
    }

    /** Case-insensitive match over names, types and observations. */
    async search(query: string): Promise<Graph> {
        const graph = await this.read()
        const needle = query.toLowerCase()
        const matches = graph.entities.filter(
            (e) =>
                e.name.toLowerCase().includes(needle) ||
                e.entityType.toLowerCase().includes(needle) ||
                e.observations.some((o) => o.toLowerCase().includes(needle))
        )
        return subgraph(graph, matches)
    }

    async open(names: string[]): Promise<Graph> {
        const graph = await this.read()
        return subgraph(
            graph,
            graph.entities.filter((e) => names.includes(e.name))
        )
    }

    private async save(): Promise<void> {
        if (!this.graph) return
        await this.fs.writeJSON(this.filePath, this.graph)
    }
}
