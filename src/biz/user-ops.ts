/**
 * User Biz Ops
 * 使用者業務流程 - 產生測試資料、經由 App 層呼叫並檢查預期狀態碼
 */

import { randomInt } from 'node:crypto';
import { HarnessError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { UserApiClient } from '../apps/user-api.js';

export const USERNAME_PREFIX = 'auto_user_';

const LETTERS = 'abcdefghijklmnopqrstuvwxyz';
const SEXES = ['man', 'woman'] as const;

export type UserSex = (typeof SEXES)[number];

export type UserPayload = {
  username: string;
  name: string;
  phone: string;
  email: string;
  sex: UserSex;
  roles: string[];
  is_active: boolean;
};

function randomLetters(size: number): string {
  return Array.from({ length: size }, () => LETTERS[randomInt(LETTERS.length)]).join('');
}

/**
 * 隨機的新使用者資料；overrides 覆寫對應欄位
 */
export function buildUserPayload(overrides: Partial<UserPayload> = {}): UserPayload {
  const username = `${USERNAME_PREFIX}${randomLetters(3)}`;
  return {
    username,
    name: username,
    phone: `1340${randomInt(1_000_000, 10_000_000)}`,
    email: `auto.mail.${randomInt(1, 10_000_000)}@example.com`,
    sex: SEXES[randomInt(SEXES.length)],
    roles: [],
    is_active: randomInt(2) === 1,
    ...overrides,
  };
}

export class UserBizOps {
  private users: UserApiClient;

  constructor(users: UserApiClient) {
    this.users = users;
  }

  /**
   * 建立一個隨機使用者；非 201 拋出 HarnessError
   */
  async createUser(overrides: Partial<UserPayload> = {}): Promise<unknown> {
    const payload = buildUserPayload(overrides);
    const { code, data } = await this.users.createUser(payload);

    if (code !== 201) {
      throw new HarnessError(`Create user failed with status ${code}`, {
        expected: 201,
        code,
        username: payload.username,
      });
    }

    loggers.biz.info('User created', { username: payload.username });
    return data;
  }
}
