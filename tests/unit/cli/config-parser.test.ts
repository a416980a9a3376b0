import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseConfigFile, validateConfigDocument } from '../../../src/cli/config/parser.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('parseConfigFile()', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'couchlift-config-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should parse a YAML file', () => {
    const path = join(dir, 'migrate.yaml');
    writeFileSync(
      path,
      [
        'source: http://node.test:5986',
        'target: http://cluster.test:5984',
        'credentials:',
        '  login: admin',
        '  password: test-secret',
        'replicate:',
        '  filterDeleted: true',
        '  stallTimeoutSeconds: 120',
        'rebuild:',
        '  views:',
        '    - app/by_date',
      ].join('\n'),
    );

    expect(parseConfigFile(path)).toEqual({
      source: 'http://node.test:5986',
      target: 'http://cluster.test:5984',
      credentials: { login: 'admin', password: 'test-secret' },
      replicate: { filterDeleted: true, stallTimeoutSeconds: 120 },
      rebuild: { views: ['app/by_date'] },
    });
  });

  it('should parse a JSON file', () => {
    const path = join(dir, 'migrate.json');
    writeFileSync(path, JSON.stringify({ delete: { force: true }, requestTimeoutSeconds: 10 }));

    expect(parseConfigFile(path)).toEqual({ delete: { force: true }, requestTimeoutSeconds: 10 });
  });

  it('should treat an empty YAML file as an empty config', () => {
    const path = join(dir, 'empty.yml');
    writeFileSync(path, '');

    expect(parseConfigFile(path)).toEqual({});
  });

  it('should reject unsupported extensions', () => {
    const path = join(dir, 'migrate.toml');
    writeFileSync(path, 'source = "x"');

    expect(() => parseConfigFile(path)).toThrow('Unsupported config file format');
  });

  it('should report unreadable files as ConfigError', () => {
    expect(() => parseConfigFile(join(dir, 'missing.yaml'))).toThrow(ConfigError);
  });

  it('should report malformed JSON as ConfigError', () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ "source": ');

    expect(() => parseConfigFile(path)).toThrow(`Failed to parse config file: ${path}`);
  });
});

describe('validateConfigDocument()', () => {
  it('should list the offending paths', () => {
    let caught: unknown;
    try {
      validateConfigDocument({ replicate: { stallTimeoutSeconds: 'soon' } }, 'migrate.yaml');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      details: { problems: ['/replicate/stallTimeoutSeconds must be integer'] },
    });
  });

  it('should reject unknown keys', () => {
    expect(() => validateConfigDocument({ sorce: 'http://typo.test' }, 'migrate.yaml')).toThrow(
      'Invalid config file: migrate.yaml',
    );
  });
});
