// src/model/ColumnType.ts
import { CellValue } from './DataSheet';

export type ColumnType = 'int' | 'float' | 'string';

export const COLUMN_TYPES: readonly ColumnType[] = ['int', 'float', 'string'];

/** Inferred type per normalized column name, in master column order. */
export type ColumnTypeMap = Map<string, ColumnType>;

export interface CoercionFailure {
  column: string;
  reason: string;
}

export type CoercionResult =
  | { ok: true; values: CellValue[] }
  | { ok: false; failure: CoercionFailure };
