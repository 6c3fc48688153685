import { Command, InvalidArgumentError, Option } from 'commander';
import { createConfigCommand } from './commands/config.js';
import { createAuthCommand } from './commands/auth.js';
import { createApiCommand } from './commands/api.js';
import { HarnessContext } from './lib/harness-context.js';
import { setLogLevel } from './lib/logger.js';
import { OUTPUT_FORMATS, isOutputFormat, type OutputFormat } from './utils/output.js';

export const DEFAULT_CONFIG_DIR = './config/env';

interface GlobalOptions {
  configDir: string;
  format: OutputFormat;
  verbose?: boolean;
}

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError(`Allowed formats: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return value;
}

export interface CreateCliOptions {
  /** 讀取 customized_config 的環境變數來源 */
  env?: NodeJS.ProcessEnv;
}

/**
 * 建立 CLI 程式；每次呼叫都是獨立的 Command 與 context
 */
export function createCli(options: CreateCliOptions = {}): Command {
  const cli = new Command();
  let context: HarnessContext | null = null;

  const getContext = (): HarnessContext => {
    if (!context) {
      const { configDir } = cli.opts<GlobalOptions>();
      context = new HarnessContext({ configDir, env: options.env });
    }
    return context;
  };

  cli
    .name('qah')
    .description('Layered QA harness: config resolution, token cache and API calls')
    .version('0.1.0');

  // 全域選項
  cli
    .option('--config-dir <dir>', '設定檔根目錄', DEFAULT_CONFIG_DIR)
    .addOption(
      new Option('-f, --format <format>', '輸出格式: json (default) | table')
        .argParser(parseFormat)
        .default('json')
    )
    .option('-v, --verbose', '詳細模式（debug 日誌）');

  cli.hook('preAction', () => {
    setLogLevel(cli.opts<GlobalOptions>().verbose ? 'debug' : 'warn');
  });

  // 註冊指令
  cli.addCommand(createConfigCommand(getContext));
  cli.addCommand(createAuthCommand(getContext));
  cli.addCommand(createApiCommand(getContext));

  return cli;
}
