export * from './ast';

/**
 * Stage an interchange document was written at. `Parsed` documents carry
 * syntax only; `AnalysisSuccessful` ones add the semantic annotations.
 */
export type ExportStage = 'Parsed' | 'AnalysisSuccessful';

export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

export interface JsonObject {
    [key: string]: JsonValue;
}
