import { describe, it, expect } from 'vitest';
import { loadMigrationConfig, splitList } from '../../../src/utils/config-loader.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('splitList()', () => {
  it('should trim items and drop blanks', () => {
    expect(splitList(' app/a, ,b/c ')).toEqual(['app/a', 'b/c']);
  });
});

describe('loadMigrationConfig()', () => {
  it('should apply defaults', () => {
    const config = loadMigrationConfig({ options: {}, env: {}, configFile: {} });

    expect(config).toEqual({
      source: { url: 'http://127.0.0.1:5986' },
      target: { url: 'http://127.0.0.1:5984' },
      quiet: false,
      requestTimeoutSeconds: 30,
      selection: { databases: [], allDbs: false, includeSystem: false },
      replicate: { filterDeleted: false, stallTimeoutSeconds: 300, pollIntervalMs: 1000 },
      rebuild: { timeoutSeconds: 5, views: [] },
      delete: { force: false },
    });
  });

  it('should prefer CLI options over the config file', () => {
    const config = loadMigrationConfig({
      options: { target: 'http://cluster.test:5984', stallTimeout: 60, views: 'app/a,app/b' },
      env: {},
      configFile: {
        source: 'http://node.test:5986',
        target: 'http://ignored.test:5984',
        replicate: { stallTimeoutSeconds: 120, filterDeleted: true },
        rebuild: { views: ['other/x'], timeoutSeconds: 9 },
      },
    });

    expect(config.source.url).toBe('http://node.test:5986');
    expect(config.target.url).toBe('http://cluster.test:5984');
    expect(config.replicate).toEqual({ filterDeleted: true, stallTimeoutSeconds: 60, pollIntervalMs: 1000 });
    expect(config.rebuild).toEqual({ timeoutSeconds: 9, views: ['app/a', 'app/b'] });
  });

  it('should be frozen', () => {
    const config = loadMigrationConfig({ options: {}, env: {}, configFile: {} });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.replicate)).toBe(true);
    expect(Object.isFrozen(config.source)).toBe(true);
  });

  it('should read the password from the environment when only a login is given', () => {
    const config = loadMigrationConfig({
      options: { login: 'admin' },
      env: { COUCHLIFT_PASSWORD: 'test-secret' },
      configFile: {},
    });

    expect(config.credentials).toEqual({ login: 'admin', password: 'test-secret' });
  });

  it('should ignore an environment password without a login', () => {
    const config = loadMigrationConfig({
      options: {},
      env: { COUCHLIFT_PASSWORD: 'test-secret' },
      configFile: {},
    });

    expect(config.credentials).toBeUndefined();
  });

  it('should reject a login without any password', () => {
    expect(() => loadMigrationConfig({ options: { login: 'admin' }, env: {}, configFile: {} })).toThrow(
      ConfigError,
    );
  });

  it('should reject a password without a login', () => {
    expect(() =>
      loadMigrationConfig({ options: { password: 'test-secret' }, env: {}, configFile: {} }),
    ).toThrow('A password was given without a login');
  });

  it('should reject URLs that are not http(s)', () => {
    expect(() =>
      loadMigrationConfig({ options: { source: 'ftp://node.test' }, env: {}, configFile: {} }),
    ).toThrow('source URL must use http or https, got ftp:');
    expect(() =>
      loadMigrationConfig({ options: { target: 'not a url' }, env: {}, configFile: {} }),
    ).toThrow('Invalid target URL: not a url');
  });

  it('should reject non-positive timeouts', () => {
    expect(() =>
      loadMigrationConfig({ options: { stallTimeout: 0 }, env: {}, configFile: {} }),
    ).toThrow('stall timeout must be a positive integer, got 0');
  });

  it('should carry the database selection', () => {
    const config = loadMigrationConfig({
      options: { allDbs: true, includeSystem: true },
      databases: [],
      env: {},
      configFile: {},
    });

    expect(config.selection).toEqual({ databases: [], allDbs: true, includeSystem: true });
  });
});
