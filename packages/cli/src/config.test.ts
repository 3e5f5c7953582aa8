import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  parseSimpleYaml,
  validateConfig,
  generateDefaultConfig,
  loadConfigFile,
  findConfig,
  writeConfigFile,
  CONFIG_FILES,
} from './config.js';

describe('parseSimpleYaml', () => {
  it('parses empty content', () => {
    expect(parseSimpleYaml('')).toEqual({});
  });

  it('ignores comments', () => {
    const yaml = `
# This is a comment
# Another comment
`;
    expect(parseSimpleYaml(yaml)).toEqual({});
  });

  it('parses include and exclude arrays', () => {
    const yaml = `
include:
  - "**/*.css"
  - 'src/**/*.css'
exclude:
  - "**/dist/**"
`;
    expect(parseSimpleYaml(yaml)).toEqual({
      include: ['**/*.css', 'src/**/*.css'],
      exclude: ['**/dist/**'],
    });
  });

  it('parses scalar settings', () => {
    const yaml = `
maxDepth: 16
maxFailures: 2
selectorMode: structured
typedUnits: true
`;
    expect(parseSimpleYaml(yaml)).toEqual({
      maxDepth: 16,
      maxFailures: 2,
      selectorMode: 'structured',
      typedUnits: true,
    });
  });

  it('ignores unknown keys', () => {
    expect(parseSimpleYaml('maxScore: 60')).toEqual({});
  });

  it('rejects an invalid selector mode', () => {
    expect(() => parseSimpleYaml('selectorMode: fancy')).toThrow(
      'Invalid YAML config: "selectorMode" must be "folded" or "structured"'
    );
  });
});

describe('validateConfig', () => {
  it('rejects values that are not objects', () => {
    expect(() => validateConfig([], 'test.json')).toThrow('Invalid test.json: expected an object');
    expect(() => validateConfig(null)).toThrow('Invalid config: expected an object');
  });

  it('rejects mistyped keys', () => {
    expect(() => validateConfig({ include: '**/*.css' })).toThrow(
      'Invalid config: "include" must be an array of strings'
    );
    expect(() => validateConfig({ maxDepth: -1 })).toThrow('Invalid config: "maxDepth" must be a non-negative integer');
    expect(() => validateConfig({ typedUnits: 'yes' })).toThrow('Invalid config: "typedUnits" must be a boolean');
  });
});

describe('generateDefaultConfig', () => {
  it('generates valid JSON with the defaults', () => {
    expect(JSON.parse(generateDefaultConfig())).toEqual({
      include: ['**/*.css'],
      exclude: ['**/node_modules/**', '**/dist/**', '**/vendor/**'],
      maxDepth: 64,
      selectorMode: 'folded',
      typedUnits: false,
      maxFailures: 0,
    });
  });
});

describe('CONFIG_FILES', () => {
  it('lists the supported config file names', () => {
    expect(CONFIG_FILES).toEqual([
      '.cssastrc',
      '.cssastrc.json',
      'cssast.config.json',
      '.cssastrc.yaml',
      '.cssastrc.yml',
    ]);
  });
});

describe('file operations', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'css-ast-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('loads a JSON config file', async () => {
    const configPath = path.join(tempDir, '.cssastrc.json');
    await fs.writeFile(configPath, JSON.stringify({ maxDepth: 10, include: ['src/**/*.css'] }));

    expect(await loadConfigFile(configPath)).toEqual({ maxDepth: 10, include: ['src/**/*.css'] });
  });

  it('loads a YAML config file', async () => {
    const configPath = path.join(tempDir, '.cssastrc.yml');
    await fs.writeFile(configPath, 'typedUnits: true\n');

    expect(await loadConfigFile(configPath)).toEqual({ typedUnits: true });
  });

  it('names the file of an invalid JSON config', async () => {
    const configPath = path.join(tempDir, 'cssast.config.json');
    await fs.writeFile(configPath, JSON.stringify({ maxFailures: 'none' }));

    await expect(loadConfigFile(configPath)).rejects.toThrow(
      'Invalid cssast.config.json: "maxFailures" must be a non-negative integer'
    );
  });

  it('finds a config file in a parent directory', async () => {
    const nested = path.join(tempDir, 'a', 'b');
    await fs.mkdir(nested, { recursive: true });
    await fs.writeFile(path.join(tempDir, '.cssastrc'), JSON.stringify({ maxFailures: 3 }));

    expect(await findConfig(nested)).toEqual({ maxFailures: 3 });
  });

  it('prefers the first config file name in the list', async () => {
    await fs.writeFile(path.join(tempDir, '.cssastrc.json'), JSON.stringify({ maxDepth: 1 }));
    await fs.writeFile(path.join(tempDir, '.cssastrc.yaml'), 'maxDepth: 2\n');

    expect(await findConfig(tempDir)).toEqual({ maxDepth: 1 });
  });

  it('writes the default config file', async () => {
    const configPath = await writeConfigFile(tempDir);

    expect(configPath).toBe(path.join(tempDir, '.cssastrc.json'));
    expect(await fs.readFile(configPath, 'utf-8')).toBe(generateDefaultConfig());
  });

  it('writes a config file with a custom name', async () => {
    const configPath = await writeConfigFile(tempDir, 'cssast.config.json');
    expect(path.basename(configPath)).toBe('cssast.config.json');
  });
});
