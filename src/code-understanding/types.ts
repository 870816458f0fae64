export type DefinitionKind = 'function' | 'class' | 'method' | 'interface' | 'type' | 'enum' | 'module'

export interface Definition {
    name: string
    kind: DefinitionKind
    /** 1-based */
    line: number
    /** Declaration head: its first line up to the opening brace. */
    signature: string
}

export interface FileDefinitions {
    filePath: string
    language: string
    definitions: Definition[]
}
