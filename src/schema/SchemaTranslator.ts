import { ColumnMetadata } from '../interfaces/SourceDatabase';
import { TranslationError } from '../errors/ReplicationError';
import { quoteIdentifier } from '../utils/naming';

/**
 * How a type name is qualified in a column definition
 */
export type TypeRenderRule = 'length' | 'precisionScale' | 'bare';

/**
 * Sentinel the catalog reports as maximum length of MAX columns
 */
export const UNBOUNDED_LENGTH = -1;

/**
 * Types that take a qualifier, keyed by lower-cased type name.
 * Anything not listed renders as the bare type name.
 */
export const TYPE_RENDER_RULES: Readonly<Record<string, TypeRenderRule>> = {
  char: 'length',
  varchar: 'length',
  nchar: 'length',
  nvarchar: 'length',
  binary: 'length',
  varbinary: 'length',
  decimal: 'precisionScale',
  numeric: 'precisionScale',
};

/**
 * Translated column: `qualifier` is '', '(N)', '(MAX)' or '(p,s)'
 */
export interface ColumnDef {
  name: string;
  baseTypeName: string;
  qualifier: string;
}

export function renderRuleFor(typeName: string): TypeRenderRule {
  const key = typeName.toLowerCase();
  return Object.prototype.hasOwnProperty.call(TYPE_RENDER_RULES, key) ? TYPE_RENDER_RULES[key] : 'bare';
}

export function translateColumn(column: ColumnMetadata): ColumnDef {
  const rule = renderRuleFor(column.typeName);

  switch (rule) {
    case 'length': {
      if (column.maxLength === null) {
        throw new TranslationError(`Column ${column.name} of type ${column.typeName} has no maximum length`);
      }
      const length = column.maxLength === UNBOUNDED_LENGTH ? 'MAX' : String(column.maxLength);
      return { name: column.name, baseTypeName: column.typeName, qualifier: `(${length})` };
    }

    case 'precisionScale': {
      if (column.precision === null || column.scale === null) {
        throw new TranslationError(`Column ${column.name} of type ${column.typeName} has no precision or scale`);
      }
      return {
        name: column.name,
        baseTypeName: column.typeName,
        qualifier: `(${column.precision},${column.scale})`,
      };
    }

    case 'bare':
      return { name: column.name, baseTypeName: column.typeName, qualifier: '' };
  }
}

export function renderColumnDefinition(column: ColumnDef): string {
  return `${quoteIdentifier(column.name)} ${column.baseTypeName}${column.qualifier}`;
}

/**
 * Build the CREATE TABLE statement for a remote target, one definition per
 * source column in catalog order.
 */
export function buildCreateTableStatement(targetTable: string, columns: ColumnMetadata[]): string {
  if (columns.length === 0) {
    throw new TranslationError(`Cannot create ${targetTable}: source table has no columns`, targetTable);
  }

  const definitions = columns.map(column => renderColumnDefinition(translateColumn(column)));

  return `CREATE TABLE ${quoteIdentifier(targetTable)} (${definitions.join(', ')})`;
}

/**
 * The driver's bulk load writes the target and column names inside [...]
 * without escaping, so names containing a bracket cannot be loaded.
 */
export function assertBulkLoadable(targetTable: string, columns: ColumnMetadata[]): void {
  const names = [targetTable, ...columns.map(column => column.name)];
  const unsafe = names.find(name => name.includes('[') || name.includes(']'));

  if (unsafe !== undefined) {
    throw new TranslationError(
      `Cannot bulk load into ${targetTable}: identifier ${unsafe} contains a square bracket`,
      targetTable
    );
  }
}
