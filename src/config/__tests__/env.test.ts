import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, realpath, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { envFileDirs, loadConfig, loadEnvFiles } from '../env.js';
import { ConfigError } from '../../utils/errors.js';

const FULL_ENV = {
  FEATURES_PATH: '/src/test/resources/features/',
  INTERACTIONS_PATH: '/src/test/java/interactions/',
  PAGES_PATH: '/src/test/java/pages/',
  STEPS_PATH: '/src/test/java/steps/',
  LOCATOR_CLASS_PATH: 'import com.app.Locator',
};

describe('loadConfig', () => {
  it('maps each path variable to its role', () => {
    expect(loadConfig(FULL_ENV)).toEqual({
      pathSegments: {
        Features: '/src/test/resources/features/',
        Interactions: '/src/test/java/interactions/',
        Pages: '/src/test/java/pages/',
        Steps: '/src/test/java/steps/',
      },
      locatorQualifier: 'import com.app.Locator',
      repositoryName: null,
    });
  });

  it('leaves the locator qualifier null when unset or blank', () => {
    const { LOCATOR_CLASS_PATH: _, ...withoutQualifier } = FULL_ENV;

    expect(loadConfig(withoutQualifier).locatorQualifier).toBeNull();
    expect(loadConfig({ ...FULL_ENV, LOCATOR_CLASS_PATH: '   ' }).locatorQualifier).toBeNull();
  });

  it('reads the optional repository name', () => {
    expect(loadConfig({ ...FULL_ENV, REPOSITORY_NAME: ' shop-tests ' }).repositoryName).toBe('shop-tests');
  });

  it('lists every missing path variable', () => {
    const env = { ...FULL_ENV, PAGES_PATH: undefined, STEPS_PATH: '' };

    try {
      loadConfig(env);
      expect.fail('should have thrown');
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err).toMatchObject({
        message: 'Missing environment variable(s): PAGES_PATH, STEPS_PATH',
        missing: ['PAGES_PATH', 'STEPS_PATH'],
        code: 'CONFIG_ERROR',
      });
    }
  });
});

// ---------------------------------------------------------------------------
// .env discovery
// ---------------------------------------------------------------------------

describe('loadEnvFiles', () => {
  let root: string;
  let sub: string;

  beforeEach(async () => {
    root = await realpath(await mkdtemp(join(tmpdir(), 'env-test-')));
    sub = join(root, 'src', 'test');
    await mkdir(sub, { recursive: true });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('lists directories from the start up to the root', () => {
    expect(envFileDirs(sub, root)).toEqual([sub, join(root, 'src'), root]);
    expect(envFileDirs(root, root)).toEqual([root]);
  });

  it('only looks in the start directory when it is outside the root', () => {
    expect(envFileDirs(root, sub)).toEqual([root]);
  });

  it('finds the root .env when started from a subdirectory', async () => {
    await writeFile(
      join(root, '.env'),
      'FEATURES_PATH=features\nINTERACTIONS_PATH=interactions\nPAGES_PATH=pages\nSTEPS_PATH=steps\n',
    );
    const env: Record<string, string | undefined> = {};

    const loaded = loadEnvFiles(sub, root, env);

    expect(loaded).toEqual([join(root, '.env')]);
    expect(loadConfig(env).pathSegments).toEqual({
      Features: 'features',
      Interactions: 'interactions',
      Pages: 'pages',
      Steps: 'steps',
    });
  });

  it('lets the nearest file and the real environment win', async () => {
    await writeFile(join(root, '.env'), 'PAGES_PATH=root-pages\nSTEPS_PATH=root-steps\nFEATURES_PATH=root-features\n');
    await writeFile(join(sub, '.env'), 'PAGES_PATH=sub-pages\n');
    const env: Record<string, string | undefined> = { FEATURES_PATH: 'shell-features' };

    const loaded = loadEnvFiles(sub, root, env);

    expect(loaded).toEqual([join(sub, '.env'), join(root, '.env')]);
    expect(env).toEqual({
      FEATURES_PATH: 'shell-features',
      PAGES_PATH: 'sub-pages',
      STEPS_PATH: 'root-steps',
    });
  });
});
