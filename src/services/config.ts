/**
 * Config Resolver
 * 分層設定解析 - base → default → product → zone → env，後載入者覆寫先載入者
 */

import fs from 'node:fs';
import path from 'node:path';
import ini from 'ini';
import { ConfigError } from '../lib/errors.js';
import { parseOverrides, OVERRIDES_ENV_VAR } from '../lib/env-overrides.js';
import { loggers } from '../lib/logger.js';
import { BASE_KEYS } from '../types/config.js';
import type {
  BaseKey,
  ConfigNamespace,
  ConfigResolverOptions,
  LoadOptions,
} from '../types/config.js';

export const DEFAULT_SECTION = 'default';
export const BASE_SECTION = 'base';
export const BASE_CONFIG_FILE = 'env.ini';
export const DEFAULT_CONFIG_FILE = 'config_default.ini';

export type Namespace = Map<string, Map<string, string>>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toConfigValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map((item) => String(item)).join(',');
  }
  if (value === null || value === undefined) {
    return '';
  }
  return String(value);
}

function sectionOf(namespace: Namespace, name: string): Map<string, string> {
  let section = namespace.get(name);
  if (!section) {
    section = new Map();
    namespace.set(name, section);
  }
  return section;
}

/**
 * 將 ini 解析結果攤平成 section → key → value
 * - section 標頭之前的鍵歸入 default
 * - [a.b] 會被 ini 解析成巢狀物件，這裡還原成 "a.b"
 */
function flattenInto(namespace: Namespace, parsed: Record<string, unknown>, prefix: string | null): void {
  for (const [key, value] of Object.entries(parsed)) {
    if (isPlainObject(value)) {
      const name = prefix ? `${prefix}.${key}` : key;
      sectionOf(namespace, name);
      flattenInto(namespace, value, name);
      continue;
    }
    sectionOf(namespace, prefix ?? DEFAULT_SECTION).set(key.toLowerCase(), toConfigValue(value));
  }
}

function sectionEntries(source: ConfigNamespace | Namespace, name: string): Array<[string, string]> {
  if (source instanceof Map) {
    const section = source.get(name);
    return section ? [...section] : [];
  }
  const section = source[name];
  return section ? Object.entries(section) : [];
}

const COMMENT_LINE = /^\s*[;#]/;
const SECTION_HEADER = /^\s*\[[^\]]*\]\s*$/;
const ASSIGNMENT = /^([^=]+)=(.*)$/;

/**
 * 值一律以 JSON 字串交給 ini 解析：; 與 # 不當成行內註解，引號原樣保留
 */
function quoteValues(content: string): string {
  return content
    .split(/\r?\n/)
    .map((line) => {
      if (COMMENT_LINE.test(line) || SECTION_HEADER.test(line)) {
        return line;
      }
      const match = ASSIGNMENT.exec(line);
      return match ? `${match[1]}=${JSON.stringify(match[2].trim())}` : line;
    })
    .join('\n');
}

/**
 * 以 key = value 原樣寫出，與 quoteValues 的讀取方式對稱
 */
function formatIni(namespace: Namespace): string {
  const blocks = [...namespace].map(([section, entries]) =>
    [`[${section}]`, ...[...entries].map(([key, value]) => `${key} = ${value}`)].join('\n')
  );
  return `${blocks.join('\n\n')}\n`;
}

function readIniFile(file: string): Record<string, unknown> {
  let content: string;
  try {
    content = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Unable to read config file ${file}`, {
      file,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  const parsed: unknown = ini.parse(quoteValues(content));
  return isPlainObject(parsed) ? parsed : {};
}

function isFile(file: string): boolean {
  return fs.existsSync(file) && fs.statSync(file).isFile();
}

function isDirectory(dir: string): boolean {
  return fs.existsSync(dir) && fs.statSync(dir).isDirectory();
}

/**
 * 依序讀取多個 ini 檔並合併（不存在的檔案略過）
 */
export function readSources(sources: readonly string[]): Namespace {
  const namespace: Namespace = new Map();
  for (const file of sources) {
    if (!isFile(file)) {
      loggers.config.debug('Config source skipped (not found)', { file });
      continue;
    }
    flattenInto(namespace, readIniFile(file), null);
    loggers.config.debug('Config source loaded', { file });
  }
  return namespace;
}

export class ConfigResolver {
  private rootDir: string;
  private env: NodeJS.ProcessEnv;
  private namespace: Namespace = new Map();

  constructor(options: ConfigResolverOptions = {}) {
    this.rootDir = options.rootDir || path.join(process.cwd(), 'config', 'env');
    this.env = options.env ?? process.env;
    sectionOf(this.namespace, DEFAULT_SECTION);
  }

  getRootDir(): string {
    return this.rootDir;
  }

  /**
   * 依序載入設定檔並合併到目前的命名空間
   * 同一 section 內，後面的檔案逐鍵覆寫前面的檔案
   */
  load(sources: readonly string[], options: LoadOptions = {}): this {
    const loaded = readSources(sources);
    for (const [name, values] of loaded) {
      const section = sectionOf(this.namespace, name);
      for (const [key, value] of values) {
        section.set(key, value);
      }
    }

    if (options.requireBase) {
      this.assertBase();
    }
    return this;
  }

  /**
   * 重新建立設定
   * 先讀 env.ini 與 config_default.ini，再依產品目錄是否存在決定分層或舊式載入
   */
  reload(): this {
    this.namespace = new Map();
    sectionOf(this.namespace, DEFAULT_SECTION);

    this.load(
      [path.join(this.rootDir, BASE_CONFIG_FILE), path.join(this.rootDir, DEFAULT_CONFIG_FILE)],
      { requireBase: true }
    );

    return this.resolveProductLayer(this.getProduct(), this.getZone(), this.getEnv());
  }

  /**
   * 產品層設定
   * - 存在 <product>/ 目錄：依序合併 common.ini、<zone>/common.ini、<zone>/<env>.ini
   * - 否則使用舊式 config_<product>.ini，將 <zone>_<env> 段落複製到 default
   */
  resolveProductLayer(product: string, zone: string, env: string): this {
    const productPath = path.join(this.rootDir, product);

    if (isDirectory(productPath)) {
      const zonePath = path.join(productPath, zone);
      loggers.config.debug('Hierarchical config load', { product, zone, env });
      return this.load([
        path.join(productPath, 'common.ini'),
        path.join(zonePath, 'common.ini'),
        path.join(zonePath, `${env}.ini`),
      ]);
    }

    return this.legacyLoad(product, `${zone}_${env}`);
  }

  private legacyLoad(product: string, zoneEnv: string): this {
    sectionOf(this.namespace, DEFAULT_SECTION);
    const source = readSources([path.join(this.rootDir, `config_${product}.ini`)]);

    const customized = this.env[OVERRIDES_ENV_VAR];
    if (customized) {
      loggers.config.info('Applying customized_config overrides', { product });
      return this.applyOverrides(customized, source);
    }

    const section = source.get(zoneEnv);
    if (!section) {
      loggers.config.warn('Legacy config section not found', { product, section: zoneEnv });
      return this;
    }
    for (const [key, value] of section) {
      this.set(DEFAULT_SECTION, key, value);
    }
    return this;
  }

  /**
   * 套用 "k1=v1,k2=v2,zone_env=<section>" 形式的覆寫
   * zone_env 指定的 section 會先整段複製到 default，再套用字面覆寫
   */
  applyOverrides(value: string, source?: ConfigNamespace | Namespace): this {
    sectionOf(this.namespace, DEFAULT_SECTION);

    const { overrides, zoneEnv } = parseOverrides(value);

    if (zoneEnv && source) {
      for (const [key, sectionValue] of sectionEntries(source, zoneEnv)) {
        this.set(DEFAULT_SECTION, key, sectionValue);
      }
    }

    for (const [key, overrideValue] of Object.entries(overrides)) {
      this.set(DEFAULT_SECTION, key, overrideValue);
    }
    return this;
  }

  /**
   * 取得設定值；缺少時回傳 fallback，不會拋出錯誤
   */
  get(section: string, key: string): string | undefined;
  get(section: string, key: string, fallback: string): string;
  get(section: string, key: string, fallback?: string): string | undefined {
    return this.namespace.get(section)?.get(key.toLowerCase()) ?? fallback;
  }

  getValue(key: string, section: string = DEFAULT_SECTION): string | undefined {
    return this.get(section, key);
  }

  has(section: string, key: string): boolean {
    return this.namespace.get(section)?.has(key.toLowerCase()) ?? false;
  }

  /**
   * 僅寫入記憶體，不會寫回檔案
   */
  set(section: string, key: string, value: string): void {
    sectionOf(this.namespace, section).set(key.toLowerCase(), value);
  }

  sections(): string[] {
    return [...this.namespace.keys()];
  }

  snapshot(): ConfigNamespace {
    const result: ConfigNamespace = {};
    for (const [name, values] of this.namespace) {
      result[name] = Object.fromEntries(values);
    }
    return result;
  }

  getZone(): string {
    return this.getBase('zone');
  }

  getProduct(): string {
    return this.getBase('product');
  }

  getEnv(): string {
    return this.getBase('env');
  }

  getZoneEnv(): string {
    return `${this.getZone()}_${this.getEnv()}`;
  }

  private getBase(key: BaseKey): string {
    const value = this.get(BASE_SECTION, key);
    if (!value) {
      throw new ConfigError(`Missing required base key: ${key}`, { section: BASE_SECTION, key });
    }
    return value;
  }

  private assertBase(): void {
    const missing = BASE_KEYS.filter((key) => !this.get(BASE_SECTION, key));
    if (missing.length > 0) {
      throw new ConfigError(`Missing required base keys: ${missing.join(', ')}`, {
        section: BASE_SECTION,
        missing,
        rootDir: this.rootDir,
      });
    }
  }

  /**
   * 更新 env.ini 的 base 段落（會寫回檔案），並同步到記憶體
   */
  updateBase(key: string, value: string): void {
    const file = path.join(this.rootDir, BASE_CONFIG_FILE);
    const namespace = readSources([file]);
    sectionOf(namespace, BASE_SECTION).set(key.toLowerCase(), value);

    fs.mkdirSync(this.rootDir, { recursive: true });
    fs.writeFileSync(file, formatIni(namespace), 'utf-8');
    this.set(BASE_SECTION, key, value);

    loggers.config.info('Base config updated', { file, key });
  }
}
