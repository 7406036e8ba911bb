/** Typing attributes declared for one column in the `<column properties>` block. */
export interface ColumnProperties {
  type: string;
  specialType?: string;
  parent?: string;
}

/** Column name → properties, in declaration order. */
export type ColumnPropertyMap = Map<string, ColumnProperties>;

export interface LocatedBody {
  header: string[] | null;
  dataRows: string[][];
}

/**
 * Segments a document body into a header row and data rows. The default is
 * the tab-count heuristic in `bodyLocator.ts`; stricter grammars can be
 * passed to the loaders in its place.
 */
export type BodyLocator = (content: string) => LocatedBody;

export type Cell = string | null;

export interface DwarTable {
  columns: string[];
  rows: Cell[][];
}

export interface DecodePlan {
  toDecode: string[];
  toRemove: string[];
}

export interface DwarInfo {
  version?: string;
  created?: string;
  rowcount: number;
  columns: Record<string, ColumnProperties>;
}

export const FILE_INFO_MARKER = '<datawarrior-fileinfo>';
export const COLUMN_PROPERTIES_OPEN = '<column properties>';
export const COLUMN_PROPERTIES_CLOSE = '</column properties>';
