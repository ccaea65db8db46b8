import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadEnvironment } from './environment';

describe('loadEnvironment', () => {
  const keys = ['CONFIG', 'LOG_LEVEL', 'HOST', 'CORS_ORIGINS'];
  const saved = new Map<string, string | undefined>();
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'llm-mock-env-'));
    for (const key of keys) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('reads the settings path and log level from an env file', async () => {
    const envFile = join(dir, '.env');
    writeFileSync(envFile, 'CONFIG=custom-settings.yaml\nLOG_LEVEL=debug\n');

    const env = await loadEnvironment([envFile]);

    expect(env.CONFIG).toBe('custom-settings.yaml');
    expect(env.LOG_LEVEL).toBe('debug');
  });

  it('prefers the first env file that sets a key', async () => {
    const local = join(dir, '.env.local');
    const shared = join(dir, '.env');
    writeFileSync(local, 'CONFIG=local.yaml\n');
    writeFileSync(shared, 'CONFIG=shared.yaml\nLOG_LEVEL=warn\n');

    const env = await loadEnvironment([local, shared]);

    expect(env.CONFIG).toBe('local.yaml');
    expect(env.LOG_LEVEL).toBe('warn');
  });

  it('applies defaults without any env file', async () => {
    const env = await loadEnvironment([join(dir, 'missing.env')]);

    expect(env.CONFIG).toBe('config.yaml');
    expect(env.LOG_LEVEL).toBe('info');
    expect(env.HOST).toBe('0.0.0.0');
  });

  it('rejects an invalid log level', async () => {
    const envFile = join(dir, '.env');
    writeFileSync(envFile, 'LOG_LEVEL=loud\n');

    await expect(loadEnvironment([envFile])).rejects.toThrow(/LOG_LEVEL/);
  });
});
