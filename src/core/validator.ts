import {
  CellValue,
  ColumnType,
  Schema,
  SchemaRule,
  Table,
  ValidationIssue,
  ValidationReport,
} from '../types';

function describeCell(cell: CellValue): string {
  switch (cell.kind) {
    case 'null':
      return 'null';
    case 'structured':
      return Array.isArray(cell.value) ? 'array' : 'object';
    case 'number':
      return Number.isInteger(cell.value) ? `integer ${cell.value}` : `float ${cell.value}`;
    case 'string':
      return `string ${JSON.stringify(cell.value)}`;
    case 'boolean':
      return `boolean ${cell.value}`;
  }
}

/**
 * Whether a non-null cell has the runtime shape `type` asks for.
 * Structured cells never satisfy a scalar type.
 */
export function matchesType(cell: CellValue, type: ColumnType): boolean {
  switch (type) {
    case ColumnType.String:
      return cell.kind === 'string';
    case ColumnType.Integer:
      return cell.kind === 'number' && Number.isInteger(cell.value);
    case ColumnType.Float:
      return cell.kind === 'number' && Number.isFinite(cell.value);
    case ColumnType.Boolean:
      return cell.kind === 'boolean';
  }
}

function checkRule(table: Table, rule: SchemaRule, issues: ValidationIssue[]): void {
  if (!table.columns.includes(rule.column)) {
    if (rule.required) {
      issues.push({
        column: rule.column,
        rule: 'missing_column',
        rowIndex: 'schema-level',
        message: `missing column '${rule.column}'`,
      });
    }
    return;
  }

  table.rows.forEach((row, rowIndex) => {
    const cell: CellValue = row[rule.column] ?? { kind: 'null' };

    if (cell.kind === 'null') {
      if (!rule.nullable) {
        issues.push({
          column: rule.column,
          rule: 'nullable',
          rowIndex,
          message: `column '${rule.column}' is not nullable but row ${rowIndex} is null`,
        });
      }
      return;
    }

    if (!matchesType(cell, rule.type)) {
      issues.push({
        column: rule.column,
        rule: 'type',
        rowIndex,
        message: `expected ${rule.type} in column '${rule.column}', got ${describeCell(cell)}`,
      });
      return;
    }

    if (rule.range && cell.kind === 'number') {
      const { min, max } = rule.range;
      if (cell.value < min || cell.value > max) {
        issues.push({
          column: rule.column,
          rule: 'range',
          rowIndex,
          message: `value ${cell.value} in column '${rule.column}' is outside [${min}, ${max}]`,
        });
      }
    }
  });
}

/**
 * Check a table against a schema.
 *
 * Never throws: every violation becomes an issue in the report, which is
 * handed back as data. Columns the schema does not declare are ignored.
 */
export function validate(table: Table, schema: Schema): ValidationReport {
  const issues: ValidationIssue[] = [];

  if (!(schema.allowEmpty && table.rows.length === 0)) {
    for (const rule of schema.rules) {
      checkRule(table, rule, issues);
    }
  }

  return {
    schemaName: schema.name,
    passed: issues.length === 0,
    issues,
  };
}
