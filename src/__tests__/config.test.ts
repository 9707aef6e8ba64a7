import { describe, it, expect } from 'vitest';
import path from 'path';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      host: '127.0.0.1',
      port: 5000,
      postsFile: path.resolve(process.cwd(), 'blog_posts.json'),
      corsOrigins: [],
      logRequests: true,
    });
  });

  it.each([
    ['HOST', '0.0.0.0', 'host', '0.0.0.0'],
    ['PORT', '8080', 'port', 8080],
    ['LOG_REQUESTS', 'false', 'logRequests', false],
    ['LOG_REQUESTS', '0', 'logRequests', false],
    ['LOG_REQUESTS', 'yes', 'logRequests', true],
  ] as const)('uses %s=%s from env', (envKey, envVal, field, expected) => {
    expect(loadConfig({ [envKey]: envVal })[field]).toBe(expected);
  });

  it('ignores a non-numeric port', () => {
    expect(loadConfig({ PORT: 'abc' }).port).toBe(5000);
  });

  it('resolves the posts file against the working directory', () => {
    expect(loadConfig({ POSTS_FILE: 'data/posts.json' }).postsFile).toBe(path.resolve(process.cwd(), 'data/posts.json'));
  });

  it('splits and trims CORS origins', () => {
    expect(loadConfig({ CORS_ORIGINS: 'http://localhost:5173, http://example.test ,' }).corsOrigins).toEqual([
      'http://localhost:5173',
      'http://example.test',
    ]);
  });
});
