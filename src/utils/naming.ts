import { BackupDescriptor, TableRef } from '../interfaces/SourceDatabase';

/**
 * Format date to ddMMyyyy_HH_mm using the local clock
 */
export function formatBackupTimestamp(date: Date): string {
  const day = String(date.getDate()).padStart(2, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const year = String(date.getFullYear()).padStart(4, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');

  return `${day}${month}${year}_${hours}_${minutes}`;
}

/**
 * Build `<DatabaseName>_<ddMMyyyy>_<HH_mm>.bak` inside the given directory.
 * The directory is used as given; the backup itself reports a bad path.
 */
export function buildBackupDescriptor(
  databaseName: string,
  directory: string,
  timestamp: Date
): BackupDescriptor {
  const fileName = `${databaseName}_${formatBackupTimestamp(timestamp)}.bak`;

  return {
    fileName,
    fullPath: joinBackupPath(directory, fileName),
    timestamp,
  };
}

/**
 * Join a directory on the database server with a file name.
 * The server may run on another OS than this process, so the separator
 * comes from the directory itself rather than from node's path module.
 */
export function joinBackupPath(directory: string, fileName: string): string {
  if (directory === '') {
    return fileName;
  }

  if (directory.endsWith('/') || directory.endsWith('\\')) {
    return `${directory}${fileName}`;
  }

  const separator = directory.includes('\\') ? '\\' : '/';
  return `${directory}${separator}${fileName}`;
}

export function qualifiedName(table: TableRef): string {
  return `${table.schemaName}.${table.tableName}`;
}

/**
 * Remote table name: `schema.table` with every dot turned into an underscore, plus `_<suffix>`
 */
export function deriveTargetTableName(table: TableRef, suffix: string): string {
  return `${qualifiedName(table).replace(/\./g, '_')}_${suffix}`;
}

/**
 * Bracket-quote an identifier for T-SQL
 */
export function quoteIdentifier(name: string): string {
  return `[${name.replace(/]/g, ']]')}]`;
}
