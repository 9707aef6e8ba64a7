import path from 'path';

export interface AppConfig {
  host: string;
  port: number;
  postsFile: string;
  corsOrigins: string[];
  logRequests: boolean;
}

const DEFAULT_PORT = 5000;

const parsePort = (value: string | undefined): number => {
  const port = parseInt(value ?? '', 10);
  return Number.isNaN(port) ? DEFAULT_PORT : port;
};

const parseList = (value: string | undefined): string[] =>
  (value ?? '').split(',').map(item => item.trim()).filter(item => item.length > 0);

/** Read configuration from environment variables (after dotenv has run) */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    host: env.HOST || '127.0.0.1',
    port: parsePort(env.PORT),
    postsFile: path.resolve(process.cwd(), env.POSTS_FILE || 'blog_posts.json'),
    corsOrigins: parseList(env.CORS_ORIGINS),
    logRequests: env.LOG_REQUESTS !== 'false' && env.LOG_REQUESTS !== '0',
  };
}
