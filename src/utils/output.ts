/**
 * Output Module
 * CLI 輸出與錯誤回報 - JSON（預設）或簡單表格
 */

import { ConfigError, HarnessError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

export type OutputFormat = 'json' | 'table';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table'];

/** 程序退出碼 */
export const ExitCode = {
  OK: 0,
  NOT_FOUND: 1,
  API_ERROR: 2,
  CONFIG_ERROR: 3,
} as const;

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface ColumnDef<T> {
  key: keyof T & string;
  label: string;
}

export function formatJSON(data: unknown, pretty: boolean = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * 以空白對齊的純文字表格
 */
export function formatTable<T>(rows: readonly T[], columns: readonly ColumnDef<T>[]): string {
  if (rows.length === 0) {
    return '';
  }

  const cell = (row: T, column: ColumnDef<T>): string => String(row[column.key] ?? '');
  const widths = columns.map((column) =>
    Math.max(column.label.length, ...rows.map((row) => cell(row, column).length))
  );

  const line = (cells: string[]): string =>
    cells
      .map((value, i) => value.padEnd(widths[i]))
      .join('  ')
      .trimEnd();

  return [
    line(columns.map((column) => column.label)),
    line(widths.map((width) => '-'.repeat(width))),
    ...rows.map((row) => line(columns.map((column) => cell(row, column)))),
  ].join('\n');
}

/**
 * 依錯誤種類輸出訊息並設定退出碼
 * - ConfigError → 3
 * - AuthError 與其他錯誤 → 2
 */
export function reportError(error: unknown, action: string): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`錯誤：${action}失敗 - ${message}`);

  if (error instanceof HarnessError && Object.keys(error.details).length > 0) {
    loggers.cli.debug(`${action} failed`, { code: error.code, details: error.details });
  }

  process.exitCode = error instanceof ConfigError ? ExitCode.CONFIG_ERROR : ExitCode.API_ERROR;
}
