/**
 * Tests for reading constref.json
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_AUTOLOAD_PATHS,
  loadProjectConfig,
  parseProjectConfig,
} from '../src/config/ProjectConfig.js';
import { ConfigError } from '../src/base/errors.js';

describe('parseProjectConfig', () => {
  it('should fill in defaults', () => {
    const config = parseProjectConfig({});

    expect(config.autoloadPaths.map(root => root.path)).toEqual([...DEFAULT_AUTOLOAD_PATHS]);
    expect(config.collapse).toEqual([]);
    expect(config.ignore).toEqual([]);
    expect(config.inflections).toEqual({});
    expect(config.acronyms).toEqual([]);
  });

  it('should accept plain and namespaced autoload paths', () => {
    const config = parseProjectConfig({
      autoloadPaths: ['app/models', { path: 'lib', namespace: 'Acme' }],
      inflections: { oauth: 'OAuth' },
      acronyms: ['HTML'],
    });

    expect(config.autoloadPaths).toEqual([{ path: 'app/models' }, { path: 'lib', namespace: 'Acme' }]);
    expect(config.inflections).toEqual({ oauth: 'OAuth' });
    expect(config.acronyms).toEqual(['HTML']);
  });

  it('should reject malformed fields', () => {
    expect(() => parseProjectConfig([])).toThrow(ConfigError);
    expect(() => parseProjectConfig({ autoloadPaths: 'app/models' })).toThrow('"autoloadPaths" must be an array');
    expect(() => parseProjectConfig({ autoloadPaths: [{ namespace: 'Acme' }] })).toThrow('"autoloadPaths[0]"');
    expect(() => parseProjectConfig({ collapse: [1] })).toThrow('"collapse" must be an array of strings');
    expect(() => parseProjectConfig({ inflections: { oauth: 1 } })).toThrow('"inflections.oauth" must be a string');
  });
});

describe('loadProjectConfig', () => {
  let projectRoot: string;

  beforeEach(async () => {
    projectRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'constref-config-'));
  });

  afterEach(async () => {
    await fs.rm(projectRoot, { recursive: true, force: true });
  });

  it('should use defaults when constref.json is absent', async () => {
    const config = await loadProjectConfig(projectRoot);

    expect(config.autoloadPaths.map(root => root.path)).toEqual([...DEFAULT_AUTOLOAD_PATHS]);
  });

  it('should read constref.json', async () => {
    await fs.writeFile(path.join(projectRoot, 'constref.json'), JSON.stringify({ autoloadPaths: ['lib'] }));

    const config = await loadProjectConfig(projectRoot);

    expect(config.autoloadPaths).toEqual([{ path: 'lib' }]);
  });

  it('should fail for an explicit path that does not exist', async () => {
    await expect(loadProjectConfig(projectRoot, 'config/missing.json')).rejects.toThrow('ENOENT');
  });

  it('should report invalid JSON as a config error', async () => {
    await fs.writeFile(path.join(projectRoot, 'constref.json'), '{ "autoloadPaths": ');

    await expect(loadProjectConfig(projectRoot)).rejects.toBeInstanceOf(ConfigError);
  });
});
