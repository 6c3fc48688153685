/**
 * customized_config 解析
 * 格式：k1=v1,k2=v2,...,zone_env=<section>
 */

import type { ParsedOverrides } from '../types/config.js';

export const OVERRIDES_ENV_VAR = 'customized_config';

const ZONE_ENV_KEY = 'zone_env';

/**
 * 解析覆寫字串
 * - 每個片段只按第一個 '=' 分割（值可以包含 '='）
 * - 沒有 '=' 的片段或空鍵直接略過
 * - 重複的鍵以最後一個為準
 */
export function parseOverrides(value: string | undefined): ParsedOverrides {
  const overrides: Record<string, string> = {};
  if (!value || !value.trim()) {
    return { overrides };
  }

  for (const raw of value.split(',')) {
    const item = raw.trim();
    const eq = item.indexOf('=');
    if (eq === -1) continue;

    const key = item.slice(0, eq).trim().toLowerCase();
    if (!key) continue;

    overrides[key] = item.slice(eq + 1).trim();
  }

  const zoneEnv = overrides[ZONE_ENV_KEY];
  delete overrides[ZONE_ENV_KEY];

  return zoneEnv ? { overrides, zoneEnv } : { overrides };
}
