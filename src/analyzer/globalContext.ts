import {
    ADDRESS,
    ADDRESS_PAYABLE,
    BOOL,
    SolType,
    UINT256,
    builtinFunction,
    bytesType,
    fixedBytes,
    integer,
    stringType
} from './typeSystem';

/**
 * Builtin symbol of the global scope. Ids are negative so they never clash
 * with node ids of the tree.
 */
export interface MagicVariableDeclaration {
    nodeType: 'MagicVariableDeclaration';
    id: number;
    name: string;
    /** Null for `this` and `super`, whose type depends on the contract */
    type: SolType | null;
}

export const THIS_ID = -28;
export const SUPER_ID = -25;

const BYTES_MEMORY = bytesType('memory');

const MAGIC_VARIABLES: MagicVariableDeclaration[] = [
    magic(-1, 'abi', { category: 'magic', kind: 'abi' }),
    magic(-2, 'addmod', builtinFunction('addmod', [UINT256, UINT256, UINT256], [UINT256], 'pure')),
    magic(-3, 'assert', builtinFunction('assert', [BOOL], [], 'pure')),
    magic(-4, 'block', { category: 'magic', kind: 'block' }),
    magic(-5, 'blockhash', builtinFunction('blockhash', [UINT256], [fixedBytes(32)], 'view')),
    magic(-6, 'ecrecover', builtinFunction('ecrecover', [fixedBytes(32), integer(false, 8), fixedBytes(32), fixedBytes(32)], [ADDRESS], 'pure')),
    magic(-7, 'gasleft', builtinFunction('gasleft', [], [UINT256], 'view')),
    magic(-8, 'keccak256', builtinFunction('keccak256', [BYTES_MEMORY], [fixedBytes(32)], 'pure')),
    magic(-15, 'msg', { category: 'magic', kind: 'message' }),
    magic(-16, 'mulmod', builtinFunction('mulmod', [UINT256, UINT256, UINT256], [UINT256], 'pure')),
    magic(-18, 'require', builtinFunction('require', [BOOL], [], 'pure')),
    magic(-19, 'require', builtinFunction('require', [BOOL, stringType('memory')], [], 'pure')),
    magic(-20, 'revert', builtinFunction('revert', [], [], 'pure')),
    magic(-21, 'revert', builtinFunction('revert', [stringType('memory')], [], 'pure')),
    magic(-22, 'sha256', builtinFunction('sha256', [BYTES_MEMORY], [fixedBytes(32)], 'pure')),
    magic(SUPER_ID, 'super', null),
    magic(-26, 'tx', { category: 'magic', kind: 'transaction' }),
    magic(THIS_ID, 'this', null)
];

function magic(id: number, name: string, type: SolType | null): MagicVariableDeclaration {
    return { nodeType: 'MagicVariableDeclaration', id, name, type };
}

export type MagicMemberTable = Record<'message' | 'block' | 'transaction', Record<string, SolType>>;

const MAGIC_MEMBERS: MagicMemberTable = {
    message: {
        sender: ADDRESS,
        value: UINT256,
        data: bytesType('calldata'),
        sig: fixedBytes(4)
    },
    block: {
        basefee: UINT256,
        chainid: UINT256,
        coinbase: ADDRESS_PAYABLE,
        difficulty: UINT256,
        gaslimit: UINT256,
        number: UINT256,
        prevrandao: UINT256,
        timestamp: UINT256
    },
    transaction: {
        origin: ADDRESS,
        gasprice: UINT256
    }
};

/**
 * Symbols visible in every source unit before any user declaration
 */
export class GlobalContext {
    private readonly byId = new Map<number, MagicVariableDeclaration>();

    constructor() {
        for (const variable of MAGIC_VARIABLES) {
            this.byId.set(variable.id, variable);
        }
    }

    declarations(): readonly MagicVariableDeclaration[] {
        return MAGIC_VARIABLES;
    }

    get(id: number): MagicVariableDeclaration | undefined {
        return this.byId.get(id);
    }

    magicMember(kind: keyof MagicMemberTable, member: string): SolType | null {
        const members = MAGIC_MEMBERS[kind];
        return Object.hasOwn(members, member) ? members[member] : null;
    }
}
