import { AstNode, StructuredDocumentation, VariableDeclaration } from '../types/ast';
import { ASTTraverser } from '../parser/astTraverser';
import { AnalysisUnit } from './analysisUnit';
import { DocTag } from './annotations';
import { Candidate } from './declarationContainer';

type DocumentedKind =
    | 'contracts'
    | 'functions'
    | 'modifiers'
    | 'events'
    | 'errors'
    | 'public state variables'
    | 'non-public state variables';

const VALID_TAGS: Record<DocumentedKind, ReadonlySet<string>> = {
    contracts: new Set(['author', 'title', 'dev', 'notice']),
    functions: new Set(['author', 'dev', 'notice', 'return', 'param', 'inheritdoc']),
    modifiers: new Set(['author', 'dev', 'notice', 'param', 'inheritdoc']),
    events: new Set(['author', 'dev', 'notice', 'return', 'param']),
    errors: new Set(['dev', 'notice', 'param']),
    'public state variables': new Set(['dev', 'notice', 'return', 'inheritdoc']),
    'non-public state variables': new Set(['dev', 'notice', 'inheritdoc'])
};

const CUSTOM_TAG_NAME = /^[a-z][a-z-]*$/;

/**
 * Splits NatSpec comments into tags and checks that each tag is allowed on
 * the node it documents.
 */
export class DocStringTagParser {
    constructor(private readonly unit: AnalysisUnit) {}

    parseDocStrings(): void {
        new ASTTraverser().traverse(this.unit.sourceUnit, {
            enter: node => {
                const documented = documentedKind(node);
                const documentation = documentationOf(node);
                if (!documented || !documentation) {
                    return;
                }
                const tags = this.parseTags(documentation);
                for (const tag of tags) {
                    this.checkTag(tag, documented, documentation);
                }
                this.unit.annotations.docTags.set(node.id, tags);
            }
        });
    }

    /**
     * Second pass once declarations are typed: return tags against return
     * parameters, inheritdoc against contract names
     */
    validateDocStringsUsingTypes(): void {
        for (const [id, tags] of this.unit.annotations.docTags) {
            const node = this.unit.node(id);
            const documentation = documentationOf(node);
            if (!documentation) continue;
            this.checkReturnTags(node, tags, documentation);
            this.checkInheritdoc(node, tags, documentation);
        }
    }

    private parseTags(documentation: StructuredDocumentation): DocTag[] {
        const tags: DocTag[] = [];
        let current: DocTag | null = null;
        for (const rawLine of documentation.text.split('\n')) {
            const line = rawLine.trim();
            const match = /^@(\S+)\s*(.*)$/.exec(line);
            if (match) {
                const name = match[1];
                const rest = match[2].trim();
                if (name === 'param') {
                    const [paramName, ...words] = rest.split(/\s+/);
                    if (!paramName) {
                        this.unit.sink.report('DocstringParsingError', 'End of tag @param not found.', documentation.src);
                        current = null;
                        continue;
                    }
                    current = { name, content: words.join(' '), paramName };
                } else {
                    current = { name, content: rest, paramName: null };
                }
                tags.push(current);
            } else if (current) {
                if (line !== '') {
                    current.content = current.content === '' ? line : `${current.content}\n${line}`;
                }
            } else if (line !== '') {
                current = { name: 'notice', content: line, paramName: null };
                tags.push(current);
            }
        }
        return tags;
    }

    private checkTag(tag: DocTag, kind: DocumentedKind, documentation: StructuredDocumentation): void {
        if (tag.name.startsWith('custom:')) {
            const customName = tag.name.slice('custom:'.length);
            if (!CUSTOM_TAG_NAME.test(customName)) {
                this.unit.sink.report(
                    'DocstringParsingError',
                    `Invalid character in custom tag @${tag.name}. Only lowercase letters and "-" are permitted.`,
                    documentation.src
                );
            }
            return;
        }
        if (!VALID_TAGS[kind].has(tag.name)) {
            this.unit.sink.report(
                'DocstringParsingError',
                `Documentation tag @${tag.name} not valid for ${kind}.`,
                documentation.src
            );
        }
    }

    private checkReturnTags(node: AstNode, tags: DocTag[], documentation: StructuredDocumentation): void {
        let returnNames: string[];
        if (node.nodeType === 'FunctionDefinition') {
            returnNames = node.returnParameters.parameters.map(param => param.name);
        } else if (node.nodeType === 'VariableDeclaration' && node.visibility === 'public') {
            returnNames = getterReturnNames(this.unit, node);
        } else {
            return;
        }

        let index = 0;
        for (const tag of tags) {
            if (tag.name !== 'return') continue;
            if (index >= returnNames.length) {
                this.unit.sink.report(
                    'DocstringParsingError',
                    `Documentation tag "@return ${tag.content}" exceeds the number of return parameters.`,
                    documentation.src
                );
                return;
            }
            const expected = returnNames[index];
            const firstWord = tag.content.split(/\s+/)[0];
            if (expected !== '' && node.nodeType === 'FunctionDefinition' && firstWord !== expected) {
                this.unit.sink.report(
                    'DocstringParsingError',
                    `Documentation tag "@return ${tag.content}" does not contain the name of its return parameter.`,
                    documentation.src
                );
            }
            index++;
        }
    }

    private checkInheritdoc(node: AstNode, tags: DocTag[], documentation: StructuredDocumentation): void {
        const inheritdoc = tags.filter(tag => tag.name === 'inheritdoc');
        if (inheritdoc.length === 0) {
            return;
        }
        if (inheritdoc.length > 1) {
            this.unit.sink.report(
                'DocstringParsingError',
                'Documentation tag @inheritdoc can only be given once.',
                documentation.src
            );
            return;
        }
        const name = inheritdoc[0].content.trim();
        const target = resolveInheritdocTarget(this.unit, node, name);
        if (target === null) {
            this.unit.sink.report(
                'DocstringParsingError',
                `Documentation tag @inheritdoc references inexistent contract "${name}".`,
                documentation.src
            );
        } else if (target.nodeType !== 'ContractDefinition') {
            this.unit.sink.report(
                'DocstringParsingError',
                `Documentation tag @inheritdoc reference "${name}" is not a contract.`,
                documentation.src
            );
        }
    }
}

/**
 * Declaration an `@inheritdoc` tag on `node` names, looked up from the
 * scope of its contract
 */
export function resolveInheritdocTarget(unit: AnalysisUnit, node: AstNode, name: string): Candidate | null {
    const contract = unit.enclosing(node, 'ContractDefinition');
    const container = unit.containers.get(contract ? contract.id : unit.sourceUnit.id);
    const candidates = container ? container.resolveName(name, { recursive: true }) : [];
    return candidates.length === 1 ? candidates[0] : null;
}

function documentedKind(node: AstNode): DocumentedKind | null {
    switch (node.nodeType) {
        case 'ContractDefinition':
            return 'contracts';
        case 'FunctionDefinition':
            return 'functions';
        case 'ModifierDefinition':
            return 'modifiers';
        case 'EventDefinition':
            return 'events';
        case 'ErrorDefinition':
            return 'errors';
        case 'VariableDeclaration':
            if (!node.stateVariable) {
                return null;
            }
            return node.visibility === 'public' ? 'public state variables' : 'non-public state variables';
        default:
            return null;
    }
}

export function documentationOf(node: AstNode): StructuredDocumentation | null {
    switch (node.nodeType) {
        case 'ContractDefinition':
        case 'FunctionDefinition':
        case 'ModifierDefinition':
        case 'EventDefinition':
        case 'ErrorDefinition':
        case 'VariableDeclaration':
            return node.documentation;
        default:
            return null;
    }
}

function getterReturnNames(unit: AnalysisUnit, variable: VariableDeclaration): string[] {
    let typeName = variable.typeName;
    while (typeName.nodeType === 'Mapping' || typeName.nodeType === 'ArrayTypeName') {
        typeName = typeName.nodeType === 'Mapping' ? typeName.valueType : typeName.baseType;
    }
    if (typeName.nodeType === 'UserDefinedTypeName') {
        const id = unit.annotations.referencedDeclaration.get(typeName.pathNode.id);
        const struct = id === undefined ? null : unit.find(id, 'StructDefinition');
        if (struct) {
            return struct.members
                .filter(member => member.typeName.nodeType !== 'Mapping' && member.typeName.nodeType !== 'ArrayTypeName')
                .map(member => member.name);
        }
    }
    return [''];
}
