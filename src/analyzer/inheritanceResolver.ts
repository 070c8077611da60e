import { ContractDefinition, FunctionDefinition, ModifierDefinition } from '../types/ast';
import { AnalysisUnit } from './analysisUnit';
import { typeString } from './typeSystem';

/**
 * C3 linearisation of contract inheritance, plus lookups along the
 * resulting chains.
 */
export class InheritanceResolver {
    constructor(private readonly unit: AnalysisUnit) {}

    /**
     * Linearise a contract whose direct bases are already linearised.
     * Returns the chain most derived first, or null when no consistent
     * order exists.
     */
    linearize(contract: ContractDefinition, directBases: ContractDefinition[]): number[] | null {
        // Each input list is a base's own chain; the last one is the contract
        // followed by its direct bases, the later-mentioned base first
        const toMerge: number[][] = [];
        const direct: number[] = [];
        for (const base of directBases) {
            direct.unshift(base.id);
            toMerge.unshift([...(this.unit.annotations.linearizedBaseContracts.get(base.id) ?? [])]);
        }
        direct.unshift(contract.id);
        toMerge.push(direct);
        return cThreeMerge(toMerge);
    }

    /**
     * Implementation `function` resolves to when called virtually from
     * `mostDerived`: the first function along the chain with the same name
     * and parameter types that has a body.
     */
    resolveVirtualFunction(
        function_: FunctionDefinition,
        mostDerived: ContractDefinition,
        startAfter: ContractDefinition | null = null
    ): FunctionDefinition | null {
        const signature = this.signatureOf(function_);
        let searching = startAfter === null;
        for (const contract of this.unit.linearization(mostDerived)) {
            if (!searching) {
                searching = contract.id === startAfter?.id;
                continue;
            }
            for (const member of contract.nodes) {
                if (member.nodeType !== 'FunctionDefinition' || member.name !== function_.name || member.kind !== function_.kind) continue;
                if (this.signatureOf(member) !== signature) continue;
                if (member.implemented) {
                    return member;
                }
            }
        }
        return null;
    }

    /**
     * Modifier a virtual modifier invocation resolves to in `mostDerived`
     */
    resolveVirtualModifier(modifier: ModifierDefinition, mostDerived: ContractDefinition): ModifierDefinition {
        for (const contract of this.unit.linearization(mostDerived)) {
            for (const member of contract.nodes) {
                if (member.nodeType === 'ModifierDefinition' && member.name === modifier.name) {
                    return member;
                }
            }
        }
        return modifier;
    }

    /**
     * Parameter type identifiers of a function, joined
     */
    signatureOf(function_: FunctionDefinition): string {
        return function_.parameters.parameters
            .map(param => {
                const type = this.unit.annotations.typeOf(param.id);
                return type ? typeString(type, true) : '?';
            })
            .join(',');
    }
}

/**
 * Merge step of C3: repeatedly take the first list head that appears in no
 * other list's tail
 */
export function cThreeMerge<T>(lists: T[][]): T[] | null {
    let toMerge = lists.filter(list => list.length > 0).map(list => [...list]);
    const result: T[] = [];

    const appearsOnlyAtHead = (candidate: T): boolean =>
        toMerge.every(list => !list.slice(1).includes(candidate));

    while (toMerge.length > 0) {
        let candidate: T | undefined;
        for (const list of toMerge) {
            if (appearsOnlyAtHead(list[0])) {
                candidate = list[0];
                break;
            }
        }
        if (candidate === undefined) {
            return null;
        }
        result.push(candidate);
        const chosen = candidate;
        toMerge = toMerge
            .map(list => list.filter(item => item !== chosen))
            .filter(list => list.length > 0);
    }
    return result;
}
