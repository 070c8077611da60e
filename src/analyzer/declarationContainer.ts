import { Declaration } from '../types/ast';
import { MagicVariableDeclaration } from './globalContext';

export type Candidate = Declaration | MagicVariableDeclaration;

export interface ResolveOptions {
    /** Continue into enclosing scopes when nothing is found here */
    recursive?: boolean;
    /** Also return locals whose declaration statement has not ended yet */
    alsoInvisible?: boolean;
}

/**
 * Name to declarations map of one scope. Functions and events may share a
 * name (overloading); every other pair of same-named declarations in one
 * scope conflicts.
 */
export class DeclarationContainer {
    // Map: name -> declarations visible under that name
    private declarations: Map<string, Candidate[]> = new Map();

    // Map: name -> locals registered but not yet in scope
    private invisibleDeclarations: Map<string, Candidate[]> = new Map();

    constructor(
        readonly scopeId: number | null,
        readonly enclosing: DeclarationContainer | null
    ) {}

    /**
     * Declaration already registered under `name` that `declaration`
     * would clash with, if any
     */
    conflictingDeclaration(declaration: Candidate, name: string = declaration.name): Candidate | null {
        const existing = [
            ...(this.declarations.get(name) ?? []),
            ...(this.invisibleDeclarations.get(name) ?? [])
        ].filter(other => other !== declaration);
        if (existing.length === 0) {
            return null;
        }
        if (declaration.nodeType === 'FunctionDefinition' || declaration.nodeType === 'EventDefinition') {
            return existing.find(other => other.nodeType !== declaration.nodeType) ?? null;
        }
        if (declaration.nodeType === 'MagicVariableDeclaration' && declaration.type?.category === 'function') {
            return existing.find(other => other.nodeType !== 'MagicVariableDeclaration' || other.type?.category !== 'function') ?? null;
        }
        return existing[0];
    }

    /**
     * Register a declaration. Returns the conflicting declaration instead
     * when the name is taken.
     */
    registerDeclaration(
        declaration: Candidate,
        options: { invisible?: boolean; name?: string } = {}
    ): Candidate | null {
        const name = options.name ?? declaration.name;
        const conflict = this.conflictingDeclaration(declaration, name);
        if (conflict) {
            return conflict;
        }
        const target = options.invisible ? this.invisibleDeclarations : this.declarations;
        const list = target.get(name) ?? [];
        if (!list.includes(declaration)) {
            list.push(declaration);
        }
        target.set(name, list);
        return null;
    }

    /**
     * Make a local visible once its declaration statement ends
     */
    activateVariable(name: string): void {
        const pending = this.invisibleDeclarations.get(name);
        if (!pending) {
            return;
        }
        this.invisibleDeclarations.delete(name);
        this.declarations.set(name, [...(this.declarations.get(name) ?? []), ...pending]);
    }

    isInvisible(name: string): boolean {
        return this.invisibleDeclarations.has(name);
    }

    resolveName(name: string, options: ResolveOptions = {}): Candidate[] {
        const found = [...(this.declarations.get(name) ?? [])];
        if (options.alsoInvisible) {
            found.push(...(this.invisibleDeclarations.get(name) ?? []));
        }
        if (found.length > 0) {
            return found;
        }
        if (options.recursive && this.enclosing) {
            return this.enclosing.resolveName(name, options);
        }
        return [];
    }

    /**
     * Declarations registered directly in this scope
     */
    entries(): [string, Candidate[]][] {
        return [...this.declarations.entries()];
    }
}
