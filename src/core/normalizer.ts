import { CellValue, JsonObject, JsonValue, Table, TableJson, TableRow } from '../types';

export interface NormalizeOptions {
  /**
   * Fields whose object values are expanded one level into dotted columns,
   * e.g. `target` → `target.id`, `target.species`. Everything else stays
   * whole.
   */
  expand?: string[];
}

/** Column used for array elements that are not objects */
export const SCALAR_COLUMN = 'value';

const NULL_CELL: CellValue = { kind: 'null' };

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Wrap a JSON value in its tagged cell
 */
export function toCell(value: JsonValue | undefined): CellValue {
  if (value === null || value === undefined) return NULL_CELL;
  switch (typeof value) {
    case 'string':
      return { kind: 'string', value };
    case 'number':
      return { kind: 'number', value };
    case 'boolean':
      return { kind: 'boolean', value };
    default:
      return { kind: 'structured', value };
  }
}

export function fromCell(cell: CellValue): JsonValue {
  return cell.kind === 'null' ? null : cell.value;
}

function expandRecord(record: JsonObject, expand: readonly string[]): JsonObject {
  if (expand.length === 0) return record;

  const out: JsonObject = {};
  for (const [key, value] of Object.entries(record)) {
    if (expand.includes(key) && isJsonObject(value)) {
      for (const [inner, innerValue] of Object.entries(value)) {
        out[`${key}.${inner}`] = innerValue;
      }
    } else {
      out[key] = value;
    }
  }
  return out;
}

function buildTable(records: JsonObject[]): Table {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  const rows: TableRow[] = records.map((record) => {
    const row: Record<string, CellValue> = {};
    for (const column of columns) {
      row[column] = toCell(record[column]);
    }
    return Object.freeze(row);
  });

  return Object.freeze({
    columns: Object.freeze(columns),
    rows: Object.freeze(rows),
  });
}

/**
 * Turn an upstream JSON document into a table.
 *
 * An object becomes a single row. An array becomes one row per element in
 * source order, with the union of all keys as columns (first-seen order);
 * a key missing from an element is null in that row.
 */
export function normalize(json: JsonObject | JsonValue[], options: NormalizeOptions = {}): Table {
  const expand = options.expand || [];
  const elements: JsonValue[] = Array.isArray(json) ? json : [json];

  const records = elements.map((element) =>
    isJsonObject(element) ? expandRecord(element, expand) : { [SCALAR_COLUMN]: element }
  );

  return buildTable(records);
}

/**
 * New table holding only the rows matching `predicate`; columns are kept
 */
export function filterRows(table: Table, predicate: (row: TableRow, index: number) => boolean): Table {
  return Object.freeze({
    columns: table.columns,
    rows: Object.freeze(table.rows.filter(predicate)),
  });
}

export function tableToJson(table: Table): TableJson {
  return {
    columns: [...table.columns],
    rows: table.rows.map((row) => {
      const out: Record<string, JsonValue> = {};
      for (const column of table.columns) {
        out[column] = fromCell(row[column] ?? NULL_CELL);
      }
      return out;
    }),
  };
}
