import * as sql from 'mssql';
import { ColumnMetadata } from '../interfaces/SourceDatabase';
import { UNBOUNDED_LENGTH } from './SchemaTranslator';
import { quoteIdentifier } from '../utils/naming';

type SqlTypeFactory = (column: ColumnMetadata) => sql.ISqlType;

/**
 * Length of the text form of any decimal(38,s), money or smallmoney value
 */
export const EXACT_TEXT_LENGTH = 64;

/**
 * Exact numerics the driver would decode into a double. They are read with
 * CONVERT and loaded as varchar, which the server converts back exactly.
 * Style 2 keeps all four decimals of money.
 */
const EXACT_TEXT_STYLES: Readonly<Record<string, number | null>> = {
  decimal: null,
  numeric: null,
  money: 2,
  smallmoney: 2,
};

function lengthOf(column: ColumnMetadata): number {
  if (column.maxLength === null || column.maxLength === UNBOUNDED_LENGTH) {
    return sql.MAX;
  }
  return column.maxLength;
}

const withLength =
  (factory: sql.ISqlTypeFactoryWithLength): SqlTypeFactory =>
  column =>
    factory(lengthOf(column));

const plain =
  (factory: sql.ISqlTypeFactoryWithNoParams): SqlTypeFactory =>
  () =>
    factory();

const exactText: SqlTypeFactory = () => sql.VarChar(EXACT_TEXT_LENGTH);

/**
 * Driver types used to describe bulk-load columns, keyed by lower-cased catalog type name
 */
const BULK_COLUMN_TYPES: Readonly<Record<string, SqlTypeFactory>> = {
  char: withLength(sql.Char),
  varchar: withLength(sql.VarChar),
  nchar: withLength(sql.NChar),
  nvarchar: withLength(sql.NVarChar),
  // binary(N) values are loaded as varbinary(N)
  binary: withLength(sql.VarBinary),
  varbinary: withLength(sql.VarBinary),
  decimal: exactText,
  numeric: exactText,
  money: exactText,
  smallmoney: exactText,
  bigint: plain(sql.BigInt),
  int: plain(sql.Int),
  smallint: plain(sql.SmallInt),
  tinyint: plain(sql.TinyInt),
  bit: plain(sql.Bit),
  float: plain(sql.Float),
  real: plain(sql.Real),
  date: plain(sql.Date),
  datetime: plain(sql.DateTime),
  smalldatetime: plain(sql.SmallDateTime),
  datetime2: () => sql.DateTime2(7),
  datetimeoffset: () => sql.DateTimeOffset(7),
  time: () => sql.Time(7),
  uniqueidentifier: plain(sql.UniqueIdentifier),
  text: plain(sql.Text),
  ntext: plain(sql.NText),
  image: plain(sql.Image),
  xml: plain(sql.Xml),
};

function lookup<T>(table: Readonly<Record<string, T>>, typeName: string): T | undefined {
  const key = typeName.toLowerCase();
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

/**
 * Driver type for a column in a bulk load. Types the driver has no
 * dedicated mapping for travel as nvarchar(max).
 */
export function bulkColumnType(column: ColumnMetadata): sql.ISqlType {
  const factory = lookup(BULK_COLUMN_TYPES, column.typeName);

  return factory ? factory(column) : sql.NVarChar(sql.MAX);
}

/**
 * Select-list expression that reads a column in the form bulkColumnType loads
 */
export function selectExpression(column: ColumnMetadata): string {
  const name = quoteIdentifier(column.name);
  const style = lookup(EXACT_TEXT_STYLES, column.typeName);

  if (style === undefined) {
    return name;
  }
  return style === null
    ? `CONVERT(varchar(${EXACT_TEXT_LENGTH}), ${name})`
    : `CONVERT(varchar(${EXACT_TEXT_LENGTH}), ${name}, ${style})`;
}
