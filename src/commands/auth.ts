/**
 * Auth Command
 * 取得（或刷新）存取 token
 */

import { Command } from 'commander';
import { maskSecret } from '../lib/logger.js';
import { formatJSON, reportError } from '../utils/output.js';
import type { HarnessContext } from '../lib/harness-context.js';

export function createAuthCommand(getContext: () => HarnessContext): Command {
  const authCommand = new Command('auth').description('認證相關操作');

  /**
   * qah auth token
   * ConfigError → exit 3，AuthError → exit 2
   */
  authCommand
    .command('token')
    .description('登入並輸出 access token')
    .option('--reveal', '輸出完整 token')
    .action(async (options: { reveal?: boolean }) => {
      try {
        const tokenCache = getContext().getTokenCache();
        const accessToken = await tokenCache.getAccessToken();
        console.log(
          formatJSON({
            state: tokenCache.getState(),
            accessToken: options.reveal ? accessToken : maskSecret(accessToken),
          })
        );
      } catch (error) {
        reportError(error, '取得 token');
      }
    });

  return authCommand;
}
