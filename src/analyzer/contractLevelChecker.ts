import {
    ContractDefinition,
    EventDefinition,
    FunctionDefinition,
    ModifierDefinition,
    OverrideSpecifier,
    StateMutability,
    VariableDeclaration
} from '../types/ast';
import { AnalysisUnit } from './analysisUnit';
import { InheritanceResolver } from './inheritanceResolver';
import { SolType, typeString } from './typeSystem';

type Overriding = FunctionDefinition | ModifierDefinition | VariableDeclaration;

// Mutability an override may change to, per base mutability
const STRICTER_MUTABILITY: Record<StateMutability, ReadonlySet<StateMutability>> = {
    payable: new Set(['payable']),
    nonpayable: new Set(['nonpayable', 'view', 'pure']),
    view: new Set(['view', 'pure']),
    pure: new Set(['pure'])
};

/**
 * Rules that concern a contract as a whole: overloads, overrides,
 * abstractness and the restrictions of interfaces and libraries.
 */
export class ContractLevelChecker {
    private readonly inheritance: InheritanceResolver;

    constructor(private readonly unit: AnalysisUnit) {
        this.inheritance = new InheritanceResolver(unit);
    }

    check(): void {
        this.checkDuplicateFunctions(
            this.unit.sourceUnit.nodes.filter((node): node is FunctionDefinition => node.nodeType === 'FunctionDefinition')
        );
        for (const contract of this.unit.contracts()) {
            this.checkContract(contract);
        }
    }

    private checkContract(contract: ContractDefinition): void {
        const functions = contract.nodes.filter((node): node is FunctionDefinition => node.nodeType === 'FunctionDefinition');
        this.checkDuplicateFunctions(functions);
        this.checkDuplicateEvents(contract.nodes.filter((node): node is EventDefinition => node.nodeType === 'EventDefinition'));

        for (const member of contract.nodes) {
            switch (member.nodeType) {
                case 'FunctionDefinition':
                    if (member.kind === 'function') {
                        this.checkFunctionOverrides(contract, member);
                    }
                    break;
                case 'ModifierDefinition':
                    this.checkModifierOverrides(contract, member);
                    break;
                case 'VariableDeclaration':
                    if (member.visibility === 'public') {
                        this.checkStateVariableOverrides(contract, member);
                    }
                    break;
            }
        }

        this.checkAmbiguousOverrides(contract);
        if (contract.contractKind === 'interface') {
            this.checkInterface(contract);
        } else if (contract.contractKind === 'library') {
            this.checkLibrary(contract);
        }
        this.checkAbstract(contract, functions);
    }

    // ============ Overloads ============

    private checkDuplicateFunctions(functions: FunctionDefinition[]): void {
        const seen = new Set<string>();
        for (const function_ of functions) {
            if (function_.kind !== 'function' && function_.kind !== 'freeFunction') continue;
            const key = `${function_.name}(${this.inheritance.signatureOf(function_)})`;
            if (seen.has(key)) {
                this.unit.sink.report(
                    'DeclarationError',
                    'Function with same name and parameter types defined twice.',
                    function_.src
                );
            }
            seen.add(key);
        }
    }

    private checkDuplicateEvents(events: EventDefinition[]): void {
        const seen = new Set<string>();
        for (const event of events) {
            const key = `${event.name}(${this.parameterSignature(event.parameters.parameters)})`;
            if (seen.has(key)) {
                this.unit.sink.report(
                    'DeclarationError',
                    'Event with same name and parameter types defined twice.',
                    event.src
                );
            }
            seen.add(key);
        }
    }

    // ============ Overrides ============

    private checkFunctionOverrides(contract: ContractDefinition, function_: FunctionDefinition): void {
        const bases = this.nearestBaseFunctions(contract, function_.name, this.inheritance.signatureOf(function_));
        this.unit.annotations.baseFunctions.set(function_.id, bases.map(base => base.id));

        if (bases.length === 0) {
            if (function_.overrides) {
                this.unit.sink.report(
                    'TypeError',
                    'Function has override specified but does not override anything.',
                    function_.overrides.src
                );
            }
            return;
        }
        if (!function_.overrides) {
            this.unit.sink.report('TypeError', 'Overriding function is missing "override" specifier.', function_.src);
            return;
        }
        for (const base of bases) {
            this.checkOverride(function_, base);
        }
        this.checkOverrideList(function_.overrides, bases);
    }

    private checkOverride(function_: FunctionDefinition, base: FunctionDefinition): void {
        if (!this.isVirtual(base)) {
            this.unit.sink.report(
                'TypeError',
                'Trying to override non-virtual function. Did you forget to add "virtual"?',
                function_.src
            );
        }
        const visibilityChange = function_.visibility !== base.visibility;
        if (visibilityChange && !(base.visibility === 'external' && function_.visibility === 'public')) {
            this.unit.sink.report('TypeError', 'Overriding function visibility differs.', function_.src);
        }
        if (!STRICTER_MUTABILITY[base.stateMutability].has(function_.stateMutability)) {
            this.unit.sink.report(
                'TypeError',
                `Overriding function changes state mutability from "${base.stateMutability}" to "${function_.stateMutability}".`,
                function_.src
            );
        }
        if (this.parameterSignature(function_.returnParameters.parameters) !== this.parameterSignature(base.returnParameters.parameters)) {
            this.unit.sink.report('TypeError', 'Overriding function return types differ.', function_.src);
        }
    }

    /**
     * With several bases, the override specifier has to name each of
     * their contracts and nothing else
     */
    private checkOverrideList(specifier: OverrideSpecifier, bases: (FunctionDefinition | ModifierDefinition)[]): void {
        const expected = new Map<number, string>();
        for (const base of bases) {
            const owner = this.unit.enclosing(base, 'ContractDefinition');
            if (owner) {
                expected.set(owner.id, owner.name);
            }
        }
        const listed = new Set<number>();
        for (const path of specifier.overrides) {
            const id = this.unit.annotations.referencedDeclaration.get(path.id);
            if (id === undefined) continue;
            if (!expected.has(id)) {
                this.unit.sink.report('TypeError', `Invalid contract specified in override list: "${path.name}".`, path.src);
            }
            listed.add(id);
        }
        if (bases.length < 2) {
            return;
        }
        const missing = [...expected].filter(([id]) => !listed.has(id)).map(([, name]) => name);
        if (missing.length > 0) {
            this.unit.sink.report(
                'TypeError',
                `Function needs to specify overridden contracts ${quotedList(missing)}.`,
                specifier.src
            );
        }
    }

    private checkModifierOverrides(contract: ContractDefinition, modifier: ModifierDefinition): void {
        const bases: ModifierDefinition[] = [];
        for (const base of this.unit.linearization(contract).slice(1)) {
            const found = base.nodes.find(
                (member): member is ModifierDefinition => member.nodeType === 'ModifierDefinition' && member.name === modifier.name
            );
            if (found) {
                bases.push(found);
            }
        }
        const nearest = this.dropTransitivelyOverridden(bases);
        this.unit.annotations.baseFunctions.set(modifier.id, nearest.map(base => base.id));

        if (nearest.length === 0) {
            if (modifier.overrides) {
                this.unit.sink.report(
                    'TypeError',
                    'Modifier has override specified but does not override anything.',
                    modifier.overrides.src
                );
            }
            return;
        }
        if (!modifier.overrides) {
            this.unit.sink.report('TypeError', 'Overriding modifier is missing "override" specifier.', modifier.src);
            return;
        }
        for (const base of nearest) {
            if (!base.virtual) {
                this.unit.sink.report(
                    'TypeError',
                    'Trying to override non-virtual modifier. Did you forget to add "virtual"?',
                    modifier.src
                );
            }
            if (this.parameterSignature(base.parameters.parameters) !== this.parameterSignature(modifier.parameters.parameters)) {
                this.unit.sink.report('TypeError', 'Override changes modifier signature.', modifier.src);
            }
        }
        this.checkOverrideList(modifier.overrides, nearest);
    }

    private checkStateVariableOverrides(contract: ContractDefinition, variable: VariableDeclaration): void {
        const bases = this.nearestBaseFunctions(contract, variable.name, this.getterSignature(variable));
        this.unit.annotations.baseFunctions.set(variable.id, bases.map(base => base.id));

        if (bases.length === 0) {
            if (variable.overrides) {
                this.unit.sink.report(
                    'TypeError',
                    'Public state variable has override specified but does not override anything.',
                    variable.overrides.src
                );
            }
            return;
        }
        if (!variable.overrides) {
            this.unit.sink.report('TypeError', 'Overriding public state variable is missing "override" specifier.', variable.src);
            return;
        }
        for (const base of bases) {
            if (!this.isVirtual(base)) {
                this.unit.sink.report(
                    'TypeError',
                    'Trying to override non-virtual function. Did you forget to add "virtual"?',
                    variable.src
                );
            }
            if (base.visibility !== 'external') {
                this.unit.sink.report(
                    'TypeError',
                    'Public state variables can only override functions with external visibility.',
                    variable.src
                );
            }
        }
        this.checkOverrideList(variable.overrides, bases);
    }

    /**
     * Two inherited implementations of one signature that the contract does
     * not itself override
     */
    private checkAmbiguousOverrides(contract: ContractDefinition): void {
        const own = new Set<string>();
        for (const member of contract.nodes) {
            if (member.nodeType === 'FunctionDefinition' && member.kind === 'function') {
                own.add(`${member.name}(${this.inheritance.signatureOf(member)})`);
            } else if (member.nodeType === 'VariableDeclaration' && member.visibility === 'public') {
                own.add(`${member.name}(${this.getterSignature(member)})`);
            }
        }

        const reported = new Set<string>();
        for (const base of this.unit.linearization(contract).slice(1)) {
            for (const member of base.nodes) {
                if (member.nodeType !== 'FunctionDefinition' || member.kind !== 'function' || member.visibility === 'private') continue;
                const signature = this.inheritance.signatureOf(member);
                const key = `${member.name}(${signature})`;
                if (own.has(key) || reported.has(key)) continue;
                reported.add(key);
                if (this.nearestBaseFunctions(contract, member.name, signature).length > 1) {
                    this.unit.sink.report(
                        'TypeError',
                        `Derived contract must override function "${member.name}". Two or more base classes define function with same name and parameter types.`,
                        contract.src
                    );
                }
            }
        }
    }

    /**
     * Functions with the given signature in the bases of `contract`, minus
     * those another candidate already overrides
     */
    private nearestBaseFunctions(contract: ContractDefinition, name: string, signature: string): FunctionDefinition[] {
        const candidates: FunctionDefinition[] = [];
        for (const base of this.unit.linearization(contract).slice(1)) {
            for (const member of base.nodes) {
                if (member.nodeType !== 'FunctionDefinition' || member.kind !== 'function') continue;
                if (member.name !== name || member.visibility === 'private') continue;
                if (this.inheritance.signatureOf(member) === signature) {
                    candidates.push(member);
                }
            }
        }
        return this.dropTransitivelyOverridden(candidates);
    }

    private dropTransitivelyOverridden<T extends Overriding>(candidates: T[]): T[] {
        const covered = new Set<number>();
        const visit = (id: number) => {
            for (const baseId of this.unit.annotations.baseFunctions.get(id) ?? []) {
                if (covered.has(baseId)) continue;
                covered.add(baseId);
                visit(baseId);
            }
        };
        for (const candidate of candidates) {
            visit(candidate.id);
        }
        return candidates.filter(candidate => !covered.has(candidate.id));
    }

    private isVirtual(function_: FunctionDefinition): boolean {
        return function_.virtual || this.unit.enclosing(function_, 'ContractDefinition')?.contractKind === 'interface';
    }

    // ============ Contract kinds ============

    private checkInterface(contract: ContractDefinition): void {
        for (const specifier of contract.baseContracts) {
            const id = this.unit.annotations.referencedDeclaration.get(specifier.baseName.id);
            const base = id === undefined ? null : this.unit.find(id, 'ContractDefinition');
            if (base && base.contractKind !== 'interface') {
                this.unit.sink.report('TypeError', 'Interfaces can only inherit from other interfaces.', specifier.src);
            }
        }
        for (const member of contract.nodes) {
            if (member.nodeType === 'VariableDeclaration') {
                this.unit.sink.report('TypeError', 'Variables cannot be declared in interfaces.', member.src);
            } else if (member.nodeType === 'ModifierDefinition') {
                this.unit.sink.report('TypeError', 'Modifiers cannot be defined in interfaces.', member.src);
            } else if (member.nodeType === 'FunctionDefinition') {
                if (member.kind === 'constructor') {
                    this.unit.sink.report('TypeError', 'Constructor cannot be defined in interfaces.', member.src);
                    continue;
                }
                if (member.implemented) {
                    this.unit.sink.report('TypeError', 'Functions in interfaces cannot have an implementation.', member.src);
                }
                if (member.visibility !== 'external') {
                    this.unit.sink.report('TypeError', 'Functions in interfaces must be declared external.', member.src);
                }
                if (member.modifiers.length > 0) {
                    this.unit.sink.report('TypeError', 'Functions in interfaces cannot have modifiers.', member.src);
                }
            }
        }
    }

    private checkLibrary(contract: ContractDefinition): void {
        if (contract.baseContracts.length > 0) {
            this.unit.sink.report('TypeError', 'Library is not allowed to inherit.', contract.baseContracts[0].src);
        }
        for (const member of contract.nodes) {
            if (member.nodeType === 'VariableDeclaration' && !member.constant) {
                this.unit.sink.report('TypeError', 'Library cannot have non-constant state variables', member.src);
            } else if (member.nodeType === 'FunctionDefinition' && !member.implemented) {
                this.unit.sink.report('TypeError', 'Library functions must be implemented if declared.', member.src);
            }
        }
    }

    /**
     * Record whether every function along the linearisation has a body and
     * require `abstract` on contracts where one does not
     */
    private checkAbstract(contract: ContractDefinition, functions: FunctionDefinition[]): void {
        for (const specifier of contract.baseContracts) {
            const id = this.unit.annotations.referencedDeclaration.get(specifier.baseName.id);
            const base = id === undefined ? null : this.unit.find(id, 'ContractDefinition');
            if (base && base.contractKind === 'library') {
                this.unit.sink.report('TypeError', 'Libraries cannot be inherited from.', specifier.src);
            }
        }

        if (contract.contractKind === 'contract') {
            for (const function_ of functions) {
                if (!function_.implemented && !function_.virtual) {
                    this.unit.sink.report('TypeError', 'Functions without implementation must be marked virtual.', function_.src);
                }
            }
        }

        const decided = new Set<string>();
        let fullyImplemented = true;
        for (const base of this.unit.linearization(contract)) {
            for (const member of base.nodes) {
                let key: string;
                let implemented: boolean;
                if (member.nodeType === 'FunctionDefinition' && member.kind !== 'constructor') {
                    key = `${member.kind}:${member.name}(${this.inheritance.signatureOf(member)})`;
                    implemented = member.implemented;
                } else if (member.nodeType === 'VariableDeclaration' && member.visibility === 'public') {
                    key = `function:${member.name}(${this.getterSignature(member)})`;
                    implemented = true;
                } else if (member.nodeType === 'ModifierDefinition') {
                    key = `modifier:${member.name}`;
                    implemented = member.body !== null;
                } else {
                    continue;
                }
                if (decided.has(key)) continue;
                decided.add(key);
                fullyImplemented = fullyImplemented && implemented;
            }
        }
        this.unit.annotations.fullyImplemented.set(contract.id, fullyImplemented);

        if (contract.contractKind === 'contract' && !contract.abstract && !fullyImplemented) {
            this.unit.sink.report('TypeError', `Contract "${contract.name}" should be marked as abstract.`, contract.src);
        }
    }

    // ============ Signatures ============

    private parameterSignature(parameters: VariableDeclaration[]): string {
        return parameters
            .map(param => {
                const type = this.unit.annotations.typeOf(param.id);
                return type ? typeString(type, true) : '?';
            })
            .join(',');
    }

    /**
     * Parameter types of the getter a public state variable generates:
     * one per mapping key and one index per array level
     */
    private getterSignature(variable: VariableDeclaration): string {
        const parameters: string[] = [];
        let type: SolType | undefined = this.unit.annotations.typeOf(variable.id);
        while (type) {
            if (type.category === 'mapping') {
                parameters.push(typeString(type.key, true));
                type = type.value;
            } else if (type.category === 'array' && type.kind === 'array' && type.base) {
                parameters.push('uint256');
                type = type.base;
            } else {
                break;
            }
        }
        return parameters.join(',');
    }
}

function quotedList(names: string[]): string {
    const quoted = names.map(name => `"${name}"`);
    if (quoted.length === 1) {
        return quoted[0];
    }
    return `${quoted.slice(0, -1).join(', ')} and ${quoted[quoted.length - 1]}`;
}
