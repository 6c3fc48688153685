/**
 * Config Command
 * 檢視分層設定、更新 env.ini 的 base 段落
 */

import { Command } from 'commander';
import { maskSecret } from '../lib/logger.js';
import { ExitCode, formatJSON, formatTable, reportError } from '../utils/output.js';
import type { HarnessContext } from '../lib/harness-context.js';
import type { ConfigNamespace } from '../types/config.js';

const SENSITIVE_KEY_PATTERN = /password|secret|token/i;

/**
 * 遮蔽密碼、secret、token 類的鍵值
 */
export function maskNamespace(namespace: ConfigNamespace): ConfigNamespace {
  const masked: ConfigNamespace = {};
  for (const [section, values] of Object.entries(namespace)) {
    masked[section] = Object.fromEntries(
      Object.entries(values).map(([key, value]) => [
        key,
        SENSITIVE_KEY_PATTERN.test(key) ? maskSecret(value) : value,
      ])
    );
  }
  return masked;
}

interface ConfigRow {
  section: string;
  key: string;
  value: string;
}

function toRows(namespace: ConfigNamespace): ConfigRow[] {
  return Object.entries(namespace).flatMap(([section, values]) =>
    Object.entries(values).map(([key, value]) => ({ section, key, value }))
  );
}

function printNamespace(namespace: ConfigNamespace, format: string): void {
  if (format === 'table') {
    console.log(
      formatTable(toRows(namespace), [
        { key: 'section', label: 'SECTION' },
        { key: 'key', label: 'KEY' },
        { key: 'value', label: 'VALUE' },
      ])
    );
    return;
  }
  console.log(formatJSON(namespace));
}

export function createConfigCommand(getContext: () => HarnessContext): Command {
  const configCommand = new Command('config').description('檢視與管理測試環境設定');

  /**
   * qah config show
   */
  configCommand
    .command('show')
    .description('顯示合併後的設定')
    .option('-s, --section <section>', '只顯示指定段落')
    .option('--reveal', '顯示敏感值')
    .action((options: { section?: string; reveal?: boolean }, cmd: Command) => {
      try {
        const { format } = cmd.optsWithGlobals<{ format: string }>();
        const snapshot = getContext().getConfig().snapshot();
        const namespace = options.reveal ? snapshot : maskNamespace(snapshot);

        if (options.section) {
          const section = namespace[options.section];
          if (!section) {
            console.error(`錯誤：找不到段落 ${options.section}`);
            process.exitCode = ExitCode.NOT_FOUND;
            return;
          }
          if (format === 'table') {
            printNamespace({ [options.section]: section }, format);
            return;
          }
          console.log(formatJSON(section));
          return;
        }
        printNamespace(namespace, format);
      } catch (error) {
        reportError(error, '讀取設定');
      }
    });

  /**
   * qah config get <key>
   */
  configCommand
    .command('get <key>')
    .description('取得單一設定值')
    .option('-s, --section <section>', '段落名稱', 'default')
    .action((key: string, options: { section: string }) => {
      try {
        const value = getContext().getConfig().get(options.section, key);
        if (value === undefined) {
          console.error(`錯誤：[${options.section}] 沒有 ${key}`);
          process.exitCode = ExitCode.NOT_FOUND;
          return;
        }
        console.log(value);
      } catch (error) {
        reportError(error, '讀取設定');
      }
    });

  /**
   * qah config zone-env
   */
  configCommand
    .command('zone-env')
    .description('顯示目前的 <zone>_<env>')
    .action(() => {
      try {
        console.log(getContext().getConfig().getZoneEnv());
      } catch (error) {
        reportError(error, '讀取設定');
      }
    });

  /**
   * qah config set-base <key> <value>
   */
  configCommand
    .command('set-base <key> <value>')
    .description('更新 env.ini 的 [base] 段落（zone / product / env）')
    .action((key: string, value: string) => {
      try {
        getContext().createResolver().updateBase(key, value);
        console.log(`✓ base.${key.toLowerCase()} = ${value}`);
      } catch (error) {
        reportError(error, '更新設定');
      }
    });

  return configCommand;
}
