import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import ini from 'ini';
import { ConfigResolver, readSources } from '../../src/services/config.js';
import { ConfigError } from '../../src/lib/errors.js';
import { setLogLevel } from '../../src/lib/logger.js';

function writeIni(root: string, relative: string, content: string): string {
  const file = path.join(root, relative);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, 'utf-8');
  return file;
}

describe('ConfigResolver', () => {
  let rootDir: string;

  beforeEach(() => {
    // 使用暫時目錄進行測試
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'qah-config-'));
    setLogLevel('error');
  });

  afterEach(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('load', () => {
    it('should let later sources override earlier ones key by key', () => {
      const first = writeIni(rootDir, 'a.ini', '[default]\nhost = a.example.com\nuser = alice\n');
      const second = writeIni(rootDir, 'b.ini', '[default]\nhost = b.example.com\n');

      const config = new ConfigResolver({ rootDir, env: {} }).load([first, second]);

      expect(config.get('default', 'host')).toBe('b.example.com');
      expect(config.get('default', 'user')).toBe('alice');
    });

    it('should skip sources that do not exist', () => {
      const existing = writeIni(rootDir, 'a.ini', '[default]\nhost = a.example.com\n');

      const config = new ConfigResolver({ rootDir, env: {} }).load([
        path.join(rootDir, 'missing.ini'),
        existing,
      ]);

      expect(config.getValue('host')).toBe('a.example.com');
    });

    it('should throw ConfigError listing every missing base key', () => {
      const file = writeIni(rootDir, 'env.ini', '[base]\nzone = boe\n');
      const config = new ConfigResolver({ rootDir, env: {} });

      expect(() => config.load([file], { requireBase: true })).toThrow(ConfigError);
      expect(() => config.load([file], { requireBase: true })).toThrow(
        'Missing required base keys: product, env'
      );
    });

    it('should store keys lower-cased and look them up case-insensitively', () => {
      const file = writeIni(rootDir, 'a.ini', '[default]\nLogin_URL = /login\n');

      const config = new ConfigResolver({ rootDir, env: {} }).load([file]);

      expect(config.get('default', 'login_url')).toBe('/login');
      expect(config.get('default', 'LOGIN_URL')).toBe('/login');
      expect(config.has('default', 'Login_Url')).toBe(true);
    });

    it('should keep ; and # inside values and leave quotes as written', () => {
      const file = writeIni(
        rootDir,
        'a.ini',
        '[default]\npassword = abc#123\nurl = https://h.example.com/#/login\nsecret = x;y\nquoted = "q"\n; comment line\n# another\n'
      );

      const config = new ConfigResolver({ rootDir, env: {} }).load([file]);

      expect(config.snapshot().default).toEqual({
        password: 'abc#123',
        url: 'https://h.example.com/#/login',
        secret: 'x;y',
        quoted: '"q"',
      });
    });

    it('should place keys before any section header into default', () => {
      const file = writeIni(rootDir, 'a.ini', 'timeout = 5\n[other]\nkey = value\n');

      const config = new ConfigResolver({ rootDir, env: {} }).load([file]);

      expect(config.getValue('timeout')).toBe('5');
      expect(config.get('other', 'key')).toBe('value');
    });
  });

  describe('reload (hierarchical)', () => {
    beforeEach(() => {
      writeIni(rootDir, 'env.ini', '[base]\nzone = boe\nproduct = demo\nenv = test\n');
      writeIni(rootDir, 'config_default.ini', '[default]\nhost = default.example.com\ntimeout = 30\n');
      writeIni(rootDir, 'demo/common.ini', '[default]\nuser = qa\nhost = common.example.com\n');
      writeIni(rootDir, 'demo/boe/common.ini', '[default]\nregion = boe-1\n');
      writeIni(rootDir, 'demo/boe/test.ini', '[default]\nhost = foo.example.com\n');
    });

    it('should resolve host from the env layer', () => {
      const config = new ConfigResolver({ rootDir, env: {} }).reload();

      expect(config.getValue('host')).toBe('foo.example.com');
    });

    it('should keep keys from every layer', () => {
      const config = new ConfigResolver({ rootDir, env: {} }).reload();

      expect(config.getValue('timeout')).toBe('30');
      expect(config.getValue('user')).toBe('qa');
      expect(config.getValue('region')).toBe('boe-1');
    });

    it('should expose the base triple and zone_env', () => {
      const config = new ConfigResolver({ rootDir, env: {} }).reload();

      expect(config.getZone()).toBe('boe');
      expect(config.getProduct()).toBe('demo');
      expect(config.getEnv()).toBe('test');
      expect(config.getZoneEnv()).toBe(`${config.getZone()}_${config.getEnv()}`);
    });

    it('should start from an empty namespace on every reload', () => {
      const config = new ConfigResolver({ rootDir, env: {} }).reload();
      config.set('default', 'scratch', 'value');

      config.reload();

      expect(config.has('default', 'scratch')).toBe(false);
    });

    it('should fail when env.ini is missing a base key', () => {
      writeIni(rootDir, 'env.ini', '[base]\nzone = boe\nproduct = demo\n');

      expect(() => new ConfigResolver({ rootDir, env: {} }).reload()).toThrow(
        'Missing required base keys: env'
      );
    });
  });

  describe('reload (legacy)', () => {
    beforeEach(() => {
      writeIni(rootDir, 'env.ini', '[base]\nzone = boe\nproduct = legacy\nenv = test\n');
      writeIni(rootDir, 'config_default.ini', '[default]\ntimeout = 30\n');
      writeIni(
        rootDir,
        'config_legacy.ini',
        '[boe_test]\nhost = boe.example.com\nuser = qa\n\n[boe_staging]\nhost = staging.example.com\n'
      );
    });

    it('should copy the <zone>_<env> section into default', () => {
      const config = new ConfigResolver({ rootDir, env: {} }).reload();

      expect(config.getValue('host')).toBe('boe.example.com');
      expect(config.getValue('user')).toBe('qa');
      expect(config.getValue('timeout')).toBe('30');
    });

    it('should apply customized_config instead of the zone_env section', () => {
      const env = { customized_config: 'zone_env=boe_staging,user=override' };

      const config = new ConfigResolver({ rootDir, env }).reload();

      expect(config.getValue('host')).toBe('staging.example.com');
      expect(config.getValue('user')).toBe('override');
    });

    it('should leave default untouched when the section does not exist', () => {
      writeIni(rootDir, 'env.ini', '[base]\nzone = boe\nproduct = legacy\nenv = missing\n');

      const config = new ConfigResolver({ rootDir, env: {} }).reload();

      expect(config.has('default', 'host')).toBe(false);
      expect(config.getValue('timeout')).toBe('30');
    });
  });

  describe('applyOverrides', () => {
    it('should copy the named section and then apply literal overrides', () => {
      const config = new ConfigResolver({ rootDir, env: {} });
      const source = { boe_test: { host: 'boe.example.com', user: 'qa' } };

      config.applyOverrides('zone_env=boe_test,user=alice', source);

      expect(config.getValue('host')).toBe('boe.example.com');
      expect(config.getValue('user')).toBe('alice');
      expect(config.has('default', 'zone_env')).toBe(false);
    });

    it('should ignore malformed fragments', () => {
      const config = new ConfigResolver({ rootDir, env: {} });

      config.applyOverrides('noequals,=empty,key=value');

      expect(config.snapshot().default).toEqual({ key: 'value' });
    });
  });

  describe('get', () => {
    it('should return the fallback for a missing key', () => {
      const config = new ConfigResolver({ rootDir, env: {} });

      expect(config.get('default', 'missing')).toBeUndefined();
      expect(config.get('default', 'missing', 'fallback')).toBe('fallback');
      expect(config.get('nope', 'missing', 'fallback')).toBe('fallback');
    });

    it('should throw ConfigError when a base key is read before loading', () => {
      const config = new ConfigResolver({ rootDir, env: {} });

      expect(() => config.getZone()).toThrow('Missing required base key: zone');
    });
  });

  describe('updateBase', () => {
    it('should write the key to env.ini and keep other sections', () => {
      writeIni(rootDir, 'env.ini', '[base]\nzone = boe\nproduct = demo\nenv = test\n\n[extra]\nnote = kept\n');
      const config = new ConfigResolver({ rootDir, env: {} });

      config.updateBase('Env', 'staging');

      const written = ini.parse(fs.readFileSync(path.join(rootDir, 'env.ini'), 'utf-8'));
      expect(written.base).toEqual({ zone: 'boe', product: 'demo', env: 'staging' });
      expect(written.extra).toEqual({ note: 'kept' });
      expect(config.get('base', 'env')).toBe('staging');
    });

    it('should write values as key = value and read them back unchanged', () => {
      writeIni(rootDir, 'env.ini', '[base]\nzone = boe\nproduct = demo\nenv = test\n\n[extra]\nnote = a#b;c\n');
      const config = new ConfigResolver({ rootDir, env: {} });

      config.updateBase('env', 'staging');

      const file = path.join(rootDir, 'env.ini');
      expect(fs.readFileSync(file, 'utf-8')).toBe(
        '[base]\nzone = boe\nproduct = demo\nenv = staging\n\n[extra]\nnote = a#b;c\n'
      );
      expect(readSources([file]).get('extra')?.get('note')).toBe('a#b;c');
    });

    it('should create env.ini when it does not exist', () => {
      const nested = path.join(rootDir, 'nested');
      const config = new ConfigResolver({ rootDir: nested, env: {} });

      config.updateBase('zone', 'prod');

      const written = ini.parse(fs.readFileSync(path.join(nested, 'env.ini'), 'utf-8'));
      expect(written.base).toEqual({ zone: 'prod' });
    });
  });

  describe('readSources', () => {
    it('should restore dotted section names', () => {
      const file = writeIni(rootDir, 'a.ini', '[service.user]\nhost = user.example.com\n');

      const namespace = readSources([file]);

      expect(namespace.get('service.user')?.get('host')).toBe('user.example.com');
    });
  });
});
