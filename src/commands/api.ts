/**
 * API Command
 * 列出已註冊的端點、以目前的 token 呼叫端點
 */

import { Command, InvalidArgumentError } from 'commander';
import { HttpClientError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { ExitCode, formatJSON, formatTable, reportError } from '../utils/output.js';
import type { HarnessContext } from '../lib/harness-context.js';
import type { JsonBody } from '../types/api.js';

/**
 * 解析重複的 -p key=value 選項
 */
export function collectParam(value: string, previous: Record<string, string>): Record<string, string> {
  const index = value.indexOf('=');
  if (index <= 0) {
    throw new InvalidArgumentError(`Invalid path parameter "${value}", expected key=value`);
  }
  return { ...previous, [value.slice(0, index).trim()]: value.slice(index + 1) };
}

/**
 * 將 -d 的字串解析為 JSON 物件或陣列
 */
export function parseJsonData(raw: string): JsonBody {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new HttpClientError('Request data is not valid JSON', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  if (typeof parsed !== 'object' || parsed === null) {
    throw new HttpClientError('Request data must be a JSON object or array', { data: raw });
  }
  return Array.isArray(parsed) ? parsed : { ...parsed };
}

export function createApiCommand(getContext: () => HarnessContext): Command {
  const apiCommand = new Command('api').description('呼叫受測服務的端點');

  /**
   * qah api list
   */
  apiCommand
    .command('list')
    .description('列出已註冊的端點')
    .action((_options: unknown, cmd: Command) => {
      const { format } = cmd.optsWithGlobals<{ format: string }>();
      const endpoints = getContext().getRegistry().list();

      if (format === 'table') {
        console.log(
          formatTable(endpoints, [
            { key: 'name', label: 'NAME' },
            { key: 'method', label: 'METHOD' },
            { key: 'path', label: 'PATH' },
            { key: 'description', label: 'DESCRIPTION' },
          ])
        );
        return;
      }
      console.log(formatJSON(endpoints));
    });

  /**
   * qah api call <name>
   * 非 2xx → exit 2
   */
  apiCommand
    .command('call <name>')
    .description('以目前的 token 呼叫端點')
    .option('-p, --param <key=value>', '路徑參數（可重複）', collectParam, {})
    .option('-d, --data <json>', 'JSON 請求內容')
    .action(async (name: string, options: { param: Record<string, string>; data?: string }) => {
      try {
        const context = getContext();
        const endpoint = context.getRegistry().resolve(name, options.param);
        const data = options.data === undefined ? undefined : parseJsonData(options.data);

        const { code, body } = await loggers.cli.trackAsync(`api call ${name}`, () =>
          context.getHttpHandler().request(endpoint.method, endpoint, { data })
        );

        console.log(formatJSON({ code, body }));
        if (code < 200 || code >= 300) {
          process.exitCode = ExitCode.API_ERROR;
        }
      } catch (error) {
        reportError(error, `呼叫 ${name}`);
      }
    });

  return apiCommand;
}
