import { createRequire } from 'node:module'
import path from 'node:path'
import Parser from 'web-tree-sitter'
import type { Definition, DefinitionKind, FileDefinitions } from './types.js'

const require = createRequire(import.meta.url)

let initialized: Promise<void> | null = null
const languages = new Map<string, Promise<Parser.Language>>()

const GRAMMAR_FILES: Record<string, string> = {
    '.ts': 'tree-sitter-typescript.wasm',
    '.mts': 'tree-sitter-typescript.wasm',
    '.cts': 'tree-sitter-typescript.wasm',
    '.tsx': 'tree-sitter-tsx.wasm',
    '.js': 'tree-sitter-javascript.wasm',
    '.jsx': 'tree-sitter-javascript.wasm',
    '.mjs': 'tree-sitter-javascript.wasm',
    '.cjs': 'tree-sitter-javascript.wasm',
    '.py': 'tree-sitter-python.wasm',
    '.rs': 'tree-sitter-rust.wasm',
    '.go': 'tree-sitter-go.wasm',
    '.java': 'tree-sitter-java.wasm',
    '.c': 'tree-sitter-c.wasm',
    '.h': 'tree-sitter-c.wasm',
    '.cpp': 'tree-sitter-cpp.wasm',
    '.cc': 'tree-sitter-cpp.wasm',
    '.hpp': 'tree-sitter-cpp.wasm',
    '.cs': 'tree-sitter-c_sharp.wasm',
    '.rb': 'tree-sitter-ruby.wasm',
    '.php': 'tree-sitter-php.wasm',
}

export function isSupportedExtension(ext: string): boolean {
    return ext in GRAMMAR_FILES
}

function grammarPath(wasmFile: string): string {
    return path.join(path.dirname(require.resolve('tree-sitter-wasms/package.json')), 'out', wasmFile)
}

function loadLanguage(wasmFile: string): Promise<Parser.Language> {
    let language = languages.get(wasmFile)
    if (!language) {
        initialized ??= Parser.init()
        language = initialized.then(() => Parser.Language.load(grammarPath(wasmFile)))
        languages.set(wasmFile, language)
    }
    return language
}

/** Top-level definitions of one source file, or null when no grammar covers its extension. */
export async function parseDefinitions(filePath: string, source: string): Promise<FileDefinitions | null> {
    const ext = path.extname(filePath)
    const wasmFile = GRAMMAR_FILES[ext]
    if (!wasmFile) return null

    const parser = new Parser()
    parser.setLanguage(await loadLanguage(wasmFile))
    const tree = parser.parse(source)
    try {
        const lines = source.split('\n')
        const definitions: Definition[] = []
        for (let i = 0; i < tree.rootNode.childCount; i++) {
            const child = tree.rootNode.child(i)
            if (child) collect(child, definitions, lines)
        }
        return { filePath, language: ext.slice(1), definitions }
    } finally {
        tree.delete()
        parser.delete()
    }
}

const NODE_KINDS: Record<string, DefinitionKind> = {
    function_declaration: 'function', // JS/TS, Go
    generator_function_declaration: 'function',
    function_definition: 'function', // Python, C, C++, PHP
    function_item: 'function', // Rust
    method_declaration: 'method', // Go receivers, Java
    class_declaration: 'class', // JS/TS, Java, C#, PHP
    abstract_class_declaration: 'class', // TS
    class_definition: 'class', // Python
    class: 'class', // Ruby
    struct_item: 'class', // Rust
    struct_specifier: 'class', // C, C++
    struct_declaration: 'class', // C#
    class_specifier: 'class', // C++
    impl_item: 'class', // Rust
    interface_declaration: 'interface', // TS, Java, C#, PHP
    trait_item: 'interface', // Rust
    type_alias_declaration: 'type', // TS
    type_item: 'type', // Rust
    type_spec: 'type', // Go
    enum_declaration: 'enum', // TS, Java, C#
    enum_item: 'enum', // Rust
    mod_item: 'module', // Rust
    module: 'module', // Ruby
    namespace_declaration: 'module', // C#
    internal_module: 'module', // TS namespace
}

const MEMBER_KINDS = new Set([
    'method_definition', // JS/TS
    'method', // Ruby
    'method_declaration', // Java, C#, PHP
    'function_definition', // Python, C++
    'function_item', // Rust impl
    'constructor_declaration', // Java, C#
])

// Wrappers whose interesting child sits under a field
const WRAPPER_FIELDS: Record<string, string> = {
    export_statement: 'declaration', // JS/TS
    decorated_definition: 'definition', // Python
}

// Nodes that group several declarations of the same shape
const GROUP_NODES = new Set(['type_declaration', 'declaration_list', 'namespace_definition'])

function collect(node: Parser.SyntaxNode, out: Definition[], lines: string[]): void {
    const field = WRAPPER_FIELDS[node.type]
    if (field) {
        const inner = node.childForFieldName(field)
        if (inner) collect(inner, out, lines)
        return
    }

    if (GROUP_NODES.has(node.type)) {
        for (let i = 0; i < node.namedChildCount; i++) {
            const child = node.namedChild(i)
            if (child) collect(child, out, lines)
        }
        return
    }

    if (node.type === 'lexical_declaration' || node.type === 'variable_declaration') {
        collectFunctionValues(node, out, lines)
        return
    }

    const kind = NODE_KINDS[node.type]
    if (!kind) return
    const name = definitionName(node)
    if (!name) return

    out.push({ name, kind, line: node.startPosition.row + 1, signature: signature(node, lines) })
    if (kind === 'class' || kind === 'interface' || kind === 'module') {
        collectMembers(node, out, lines)
    }
}

// `const handler = () => {}` defines a function as far as a reader is concerned
function collectFunctionValues(node: Parser.SyntaxNode, out: Definition[], lines: string[]): void {
    for (let i = 0; i < node.namedChildCount; i++) {
        const declarator = node.namedChild(i)
        if (declarator?.type !== 'variable_declarator') continue
        const value = declarator.childForFieldName('value')
        const name = declarator.childForFieldName('name')
        if (!name || !value) continue
        if (value.type !== 'arrow_function' && value.type !== 'function_expression' && value.type !== 'function') continue
        out.push({ name: name.text, kind: 'function', line: declarator.startPosition.row + 1, signature: signature(node, lines) })
    }
}

function collectMembers(node: Parser.SyntaxNode, out: Definition[], lines: string[]): void {
    const body = node.childForFieldName('body')
    if (!body) return

    for (let i = 0; i < body.namedChildCount; i++) {
        let member = body.namedChild(i)
        if (member?.type === 'decorated_definition') member = member.childForFieldName('definition')
        if (!member || !MEMBER_KINDS.has(member.type)) continue
        const name = definitionName(member)
        if (!name) continue
        out.push({ name, kind: 'method', line: member.startPosition.row + 1, signature: signature(member, lines) })
    }
}

function definitionName(node: Parser.SyntaxNode): string | null {
    const named = node.childForFieldName('name')
    if (named) return named.text
    // `impl Display for Point` is named by the type it implements for
    if (node.type === 'impl_item') return node.childForFieldName('type')?.text ?? null

    // C and C++ keep the name inside the declarator chain
    let declarator = node.childForFieldName('declarator')
    while (declarator) {
        const inner = declarator.childForFieldName('declarator')
        if (!inner) return declarator.text
        declarator = inner
    }
    return null
}

function signature(node: Parser.SyntaxNode, lines: string[]): string {
    const first = lines[node.startPosition.row] ?? ''
    const brace = first.indexOf('{')
    return (brace === -1 ? first : first.slice(0, brace)).trim()
}
