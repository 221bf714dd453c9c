/** JSON-shaped value of a literal argument. */
export type LiteralJson =
  | string
  | number
  | boolean
  | null
  | LiteralJson[]
  | { [key: string]: LiteralJson };

export interface ExtractedRef {
  package?: string;
  name: string;
  version?: string | number;
}

export type ExtractedSource = [sourceName: string, tableName: string];

export type ExtractedConfig = [key: string, value: LiteralJson];

export interface ExtractionResult {
  refs: ExtractedRef[];
  sources: ExtractedSource[];
  configs: ExtractedConfig[];
}
