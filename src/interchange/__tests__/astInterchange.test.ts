import { describe, expect, it } from 'vitest';
import { parseSource } from '../../analyzer/__tests__/helpers';
import { AstExporter } from '../astExporter';
import { AstImporter, InterchangeError } from '../astImporter';

const COUNTER = `contract Counter {
    uint256 public count;
    /// @notice Adds to the counter
    function add(uint256 amount) public returns (uint256 total) {
        uint256 next = count + amount;
        count = next;
        return next;
    }
}`;

function parsedDocument(): string {
    return new AstExporter('Parsed').stringify(parseSource(COUNTER));
}

function parsedObject(): Record<string, unknown> {
    const value: unknown = JSON.parse(parsedDocument());
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw new Error('Export is not an object.');
    }
    return { ...value };
}

describe('AstExporter', () => {
    it('writes source locations as start:length:index strings', () => {
        const document = new AstExporter('Parsed').export(parseSource('contract C {}'));
        expect(document.src).toMatch(/^0:\d+:0$/);
        expect(document.nodeType).toBe('SourceUnit');
    });

    it('sorts keys so equal trees give equal documents', () => {
        const document = new AstExporter('Parsed').export(parseSource('contract C {}'));
        expect(Object.keys(document)).toEqual(['absolutePath', 'id', 'license', 'nodeType', 'nodes', 'src']);
    });

    it('leaves semantic annotations out of parsed documents', () => {
        expect(parsedDocument()).not.toContain('typeDescriptions');
        expect(parsedDocument()).not.toContain('referencedDeclaration');
    });
});

describe('AstImporter', () => {
    it('reads back exactly what was exported', () => {
        const document = parsedDocument();
        const imported = new AstImporter().import(document, 'Test.sol');
        expect(new AstExporter('Parsed').stringify(imported)).toBe(document);
    });

    it('takes the named unit out of a map of units', () => {
        const unit = JSON.parse(parsedDocument());
        const plain = new AstImporter().import(JSON.stringify({ 'Test.sol': unit }), 'Test.sol');
        const wrapped = new AstImporter().import(JSON.stringify({ 'Test.sol': { ast: unit } }), 'Test.sol');

        expect(plain.nodes).toHaveLength(2);
        expect(wrapped.absolutePath).toBe('Test.sol');
    });

    it('fails when the map has no entry for the name', () => {
        const json = JSON.stringify({ 'Other.sol': JSON.parse(parsedDocument()) });
        expect(() => new AstImporter().import(json, 'Test.sol')).toThrow('Document has no source unit named "Test.sol".');
    });

    it('drops semantic fields it is given', () => {
        const document = parsedObject();
        document.exportedSymbols = { Counter: [2] };
        document.typeDescriptions = { typeString: 'bogus' };

        const imported = new AstImporter().import(JSON.stringify(document), 'Test.sol');
        expect(Object.keys(imported).sort()).toEqual(['absolutePath', 'id', 'license', 'nodeType', 'nodes', 'src']);
    });

    it('rejects malformed JSON', () => {
        expect(() => new AstImporter().import('{"nodeType": ', 'Test.sol')).toThrow(InterchangeError);
        expect(() => new AstImporter().import('[1, 2]', 'Test.sol')).toThrow('Document must be a JSON object.');
    });

    it('rejects duplicate ids', () => {
        const json = parsedDocument().replace('"id": 3,', '"id": 2,');
        expect(() => new AstImporter().import(json, 'Test.sol')).toThrow('Duplicate node id 2.');
    });

    it('rejects ids beyond the safe integer range', () => {
        const document = parsedDocument();
        const json = document.replace('"id": 0,', '"id": 999999999999999999999,');

        expect(json).not.toBe(document);
        expect(() => new AstImporter().import(json, 'Test.sol')).toThrow(InterchangeError);
    });

    it('rejects unknown node types', () => {
        const json = parsedDocument().replace('"nodeType": "PragmaDirective"', '"nodeType": "InlineAssembly"');
        expect(() => new AstImporter().import(json, 'Test.sol')).toThrow(InterchangeError);
    });

    it('rejects a node of the wrong kind in a slot', () => {
        const json = parsedDocument().replace('"nodeType": "ParameterList"', '"nodeType": "PlaceholderStatement"');
        expect(() => new AstImporter().import(json, 'Test.sol')).toThrow(/expected ParameterList, found PlaceholderStatement\./);
    });

    it('rejects assignments that name no declaration of their statement', () => {
        const unit = parseSource(COUNTER);
        const document = new AstExporter('Parsed').stringify(unit);
        const json = document.replace(/"assignments": \[\s*(\d+)\s*\]/, '"assignments": [999]');

        expect(json).not.toBe(document);
        expect(() => new AstImporter().import(json, 'Test.sol')).toThrow(
            /VariableDeclarationStatement \d+: assignment 999 names no declaration of the statement\./
        );
    });
});
