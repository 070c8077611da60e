import {
    AstNode,
    ContractDefinition,
    Declaration,
    FunctionDefinition,
    Identifier,
    IdentifierPath,
    TypeName,
    VariableDeclaration,
    isDeclaration,
    isScopeNode
} from '../types/ast';
import { ASTTraverser } from '../parser/astTraverser';
import { AnalysisUnit } from './analysisUnit';
import { Candidate, DeclarationContainer } from './declarationContainer';
import { InheritanceResolver } from './inheritanceResolver';
import { normaliseElementaryName } from './typeSystem';

interface HomonymCandidate {
    declaration: Declaration;
    shadowed: Candidate;
}

/**
 * Registers declarations into their scopes and binds every identifier to
 * the declaration it names.
 */
export class NameAndTypeResolver {
    private readonly globalContainer = new DeclarationContainer(null, null);
    private readonly homonymCandidates: HomonymCandidate[] = [];
    private readonly inheritance: InheritanceResolver;

    constructor(private readonly unit: AnalysisUnit) {
        this.inheritance = new InheritanceResolver(unit);
        for (const magic of unit.globals.declarations()) {
            this.globalContainer.registerDeclaration(magic);
        }
    }

    // ============ Registration ============

    /**
     * Create one container per scope node and insert every named
     * declaration into the container of its scope
     */
    registerDeclarations(): void {
        const traverser = new ASTTraverser();
        const stack: DeclarationContainer[] = [this.globalContainer];
        traverser.traverse(this.unit.sourceUnit, {
            enter: node => {
                if (isDeclaration(node)) {
                    this.registerDeclaration(node);
                }
                if (isScopeNode(node)) {
                    const container = new DeclarationContainer(node.id, stack[stack.length - 1]);
                    this.unit.containers.set(node.id, container);
                    stack.push(container);
                }
            },
            leave: node => {
                if (isScopeNode(node)) {
                    stack.pop();
                }
            }
        });

        for (const member of this.unit.sourceUnit.nodes) {
            if (!isDeclaration(member) || member.name === '') continue;
            const ids = this.unit.annotations.exportedSymbols.get(member.name) ?? [];
            ids.push(member.id);
            this.unit.annotations.exportedSymbols.set(member.name, ids);
        }
    }

    private registerDeclaration(declaration: Declaration): void {
        if (declaration.name === '') {
            return;
        }
        const scopeId = this.unit.annotations.scope.get(declaration.id);
        const container = scopeId === undefined ? undefined : this.unit.containers.get(scopeId);
        if (!container) {
            return;
        }

        const scopeNode = this.unit.node(container.scopeId ?? this.unit.sourceUnit.id);
        if (this.shouldWarnAboutShadowing(declaration, scopeNode)) {
            const shadowed = container.enclosing?.resolveName(declaration.name, { recursive: true, alsoInvisible: true }) ?? [];
            if (shadowed.length > 0) {
                this.homonymCandidates.push({ declaration, shadowed: shadowed[0] });
            }
        }

        const invisible = scopeNode.nodeType === 'Block' ||
            scopeNode.nodeType === 'UncheckedBlock' ||
            scopeNode.nodeType === 'ForStatement';
        const conflict = container.registerDeclaration(declaration, { invisible });
        if (conflict) {
            this.unit.sink.report('DeclarationError', 'Identifier already declared.', declaration.src);
        }
    }

    private shouldWarnAboutShadowing(declaration: Declaration, scopeNode: AstNode): boolean {
        if (declaration.nodeType !== 'VariableDeclaration' && declaration.nodeType !== 'ModifierDefinition') {
            return false;
        }
        switch (scopeNode.nodeType) {
            case 'StructDefinition':
            case 'EnumDefinition':
            case 'EventDefinition':
            case 'ErrorDefinition':
                return false;
            default:
                return true;
        }
    }

    // ============ Imports ============

    /**
     * Only the unit itself can be imported; any other path is missing
     */
    resolveImports(): void {
        for (const member of this.unit.sourceUnit.nodes) {
            if (member.nodeType !== 'ImportDirective') continue;
            if (normalizeImportPath(member.file) === normalizeImportPath(this.unit.sourceUnit.absolutePath)) continue;
            this.unit.sink.report(
                'DeclarationError',
                `Source "${member.file}" not found: File not supplied initially.`,
                member.src
            );
        }
    }

    // ============ Homonyms ============

    warnHomonymDeclarations(): void {
        for (const { declaration, shadowed } of this.homonymCandidates) {
            if (shadowed.nodeType === 'MagicVariableDeclaration') {
                this.unit.sink.warning('This declaration shadows a builtin symbol.', declaration.src);
            } else {
                this.unit.sink.warning('This declaration shadows an existing declaration.', declaration.src);
            }
        }
    }

    // ============ Resolution ============

    /**
     * Linearise every contract, import inherited members and bind all
     * references. Inheritance errors are fatal; unbound names are reported
     * and resolution continues with the rest of the unit.
     */
    resolveNamesAndTypes(): void {
        const sourceContainer = this.container(this.unit.sourceUnit.id);
        for (const member of this.unit.sourceUnit.nodes) {
            if (member.nodeType === 'ContractDefinition') {
                this.resolveContract(member, sourceContainer);
            } else {
                this.resolveReferences(member, sourceContainer);
            }
        }
    }

    private resolveContract(contract: ContractDefinition, enclosing: DeclarationContainer): void {
        let basesResolved = true;
        const directBases: ContractDefinition[] = [];
        for (const specifier of contract.baseContracts) {
            const declaration = this.resolvePath(specifier.baseName, enclosing);
            if (!declaration) {
                basesResolved = false;
                continue;
            }
            if (declaration.nodeType !== 'ContractDefinition') {
                throw this.unit.sink.fatal('TypeError', 'Contract expected.', specifier.baseName.src);
            }
            if (declaration.id === contract.id) {
                throw this.unit.sink.fatal('TypeError', 'Contract cannot inherit from itself.', specifier.baseName.src);
            }
            if (!this.unit.annotations.linearizedBaseContracts.has(declaration.id)) {
                throw this.unit.sink.fatal(
                    'TypeError',
                    'Definition of base has to precede definition of derived contract',
                    specifier.baseName.src
                );
            }
            directBases.push(declaration);
        }

        const container = this.container(contract.id);
        if (basesResolved) {
            const linearized = this.inheritance.linearize(contract, directBases);
            if (!linearized) {
                throw this.unit.sink.fatal('TypeError', 'Linearization of inheritance graph impossible', contract.src);
            }
            this.unit.annotations.linearizedBaseContracts.set(contract.id, linearized);
            for (const baseId of linearized.slice(1)) {
                this.importInheritedScope(container, this.unit.contract(baseId));
            }
        }

        const skip = new Set(contract.baseContracts.map(specifier => specifier.baseName.id));
        for (const child of ASTTraverser.childrenOf(contract)) {
            if (skip.has(child.id)) continue;
            this.resolveReferences(child, container, skip);
        }
    }

    private importInheritedScope(container: DeclarationContainer, base: ContractDefinition): void {
        const baseContainer = this.container(base.id);
        for (const [name, declarations] of baseContainer.entries()) {
            for (const declaration of declarations) {
                if (declaration.nodeType === 'MagicVariableDeclaration') continue;
                if (this.unit.annotations.scope.get(declaration.id) !== base.id) continue;
                if (!this.isVisibleInDerivedContracts(declaration)) continue;
                if (declaration.nodeType === 'FunctionDefinition' && this.isOverriddenIn(container, declaration)) continue;

                const conflict = container.registerDeclaration(declaration, { name });
                if (!conflict) continue;
                if (declaration.nodeType === 'ModifierDefinition' && conflict.nodeType === 'ModifierDefinition') continue;
                if (
                    declaration.nodeType === 'FunctionDefinition' &&
                    conflict.nodeType === 'VariableDeclaration' &&
                    conflict.stateVariable &&
                    conflict.visibility === 'public'
                ) continue;
                const later = conflict.nodeType !== 'MagicVariableDeclaration' && conflict.src.start > declaration.src.start
                    ? conflict
                    : declaration;
                this.unit.sink.report('DeclarationError', 'Identifier already declared.', later.src);
            }
        }
    }

    private isVisibleInDerivedContracts(declaration: Declaration): boolean {
        if (declaration.nodeType === 'FunctionDefinition' || declaration.nodeType === 'VariableDeclaration') {
            return declaration.visibility !== 'private';
        }
        return true;
    }

    /**
     * Whether a function with the same name and parameter types is already
     * visible in the derived scope
     */
    private isOverriddenIn(container: DeclarationContainer, function_: FunctionDefinition): boolean {
        const signature = syntacticSignature(function_);
        return container
            .resolveName(function_.name)
            .some(other => other.nodeType === 'FunctionDefinition' && syntacticSignature(other) === signature);
    }

    /**
     * Bind every identifier below `root`, switching containers at scope
     * nodes and activating locals at the end of their statements
     */
    private resolveReferences(root: AstNode, initial: DeclarationContainer, skip: ReadonlySet<number> = new Set()): void {
        const stack: DeclarationContainer[] = [initial];
        new ASTTraverser().traverse(root, {
            enter: node => {
                if (skip.has(node.id)) {
                    return false;
                }
                if (isScopeNode(node)) {
                    stack.push(this.container(node.id));
                }
                const current = stack[stack.length - 1];
                if (node.nodeType === 'Identifier') {
                    this.resolveIdentifier(node, current);
                } else if (node.nodeType === 'IdentifierPath') {
                    this.resolvePath(node, current);
                }
            },
            leave: node => {
                if (skip.has(node.id)) {
                    return;
                }
                if (isScopeNode(node)) {
                    stack.pop();
                }
                if (node.nodeType === 'VariableDeclarationStatement') {
                    const current = stack[stack.length - 1];
                    for (const declaration of node.declarations) {
                        if (declaration && declaration.name !== '') {
                            current.activateVariable(declaration.name);
                        }
                    }
                }
            }
        });
    }

    private resolveIdentifier(identifier: Identifier, container: DeclarationContainer): void {
        const candidates = container.resolveName(identifier.name, { recursive: true });
        if (candidates.length === 0) {
            const invisible = container.resolveName(identifier.name, { recursive: true, alsoInvisible: true });
            this.unit.sink.report(
                'DeclarationError',
                invisible.length > 0
                    ? `Undeclared identifier. "${identifier.name}" is not (or not yet) visible at this point.`
                    : 'Undeclared identifier.',
                identifier.src
            );
            return;
        }
        if (candidates.length === 1) {
            this.unit.annotations.referencedDeclaration.set(identifier.id, candidates[0].id);
            return;
        }
        if (isOverloadSet(candidates)) {
            this.unit.annotations.overloadedDeclarations.set(identifier.id, candidates.map(candidate => candidate.id));
            return;
        }
        this.unit.sink.report('DeclarationError', 'Identifier not found or not unique.', identifier.src);
    }

    /**
     * Resolve a possibly dotted path (`C.S`) to exactly one declaration
     */
    private resolvePath(path: IdentifierPath, container: DeclarationContainer): Declaration | null {
        const segments = path.name.split('.');
        let candidates = container.resolveName(segments[0], { recursive: true });
        for (const segment of segments.slice(1)) {
            const owner = candidates.length === 1 ? candidates[0] : null;
            const ownerContainer = owner && owner.nodeType !== 'MagicVariableDeclaration'
                ? this.unit.containers.get(owner.id)
                : undefined;
            candidates = ownerContainer ? ownerContainer.resolveName(segment) : [];
        }
        const [declaration] = candidates;
        if (candidates.length !== 1 || declaration.nodeType === 'MagicVariableDeclaration') {
            this.unit.sink.report('DeclarationError', 'Identifier not found or not unique.', path.src);
            return null;
        }
        this.unit.annotations.referencedDeclaration.set(path.id, declaration.id);
        return declaration;
    }

    private container(id: number): DeclarationContainer {
        const container = this.unit.containers.get(id);
        if (!container) {
            throw this.unit.sink.fatal('InternalCompilerError', `Scope ${id} was never registered.`);
        }
        return container;
    }
}

function isOverloadSet(candidates: Candidate[]): boolean {
    const functions = candidates.every(candidate =>
        candidate.nodeType === 'FunctionDefinition' ||
        (candidate.nodeType === 'MagicVariableDeclaration' && candidate.type?.category === 'function'));
    const events = candidates.every(candidate => candidate.nodeType === 'EventDefinition');
    return functions || events;
}

/**
 * Parameter types as written, for comparing overloads before types exist
 */
export function syntacticSignature(function_: FunctionDefinition): string {
    return function_.parameters.parameters.map(param => typeNameText(param)).join(',');
}

function typeNameText(variable: VariableDeclaration): string {
    return describeTypeName(variable.typeName);
}

function describeTypeName(typeName: TypeName): string {
    switch (typeName.nodeType) {
        case 'ElementaryTypeName':
            return normaliseElementaryName(typeName.name);
        case 'UserDefinedTypeName':
            return typeName.pathNode.name;
        case 'ArrayTypeName':
            return `${describeTypeName(typeName.baseType)}[${typeName.length ? '#' : ''}]`;
        case 'Mapping':
            return `mapping(${describeTypeName(typeName.keyType)}=>${describeTypeName(typeName.valueType)})`;
    }
}

function normalizeImportPath(path: string): string {
    return path.replace(/^(\.\/)+/, '');
}
