import dotenv from 'dotenv';
dotenv.config();

import { createApp } from './app';
import { loadConfig } from './config';
import { PostStore } from './models/postModel';
import { JsonFileRepository } from './models/postRepository';

const config = loadConfig();
const store = new PostStore(new JsonFileRepository(config.postsFile));
const app = createApp(store, config);

const server = app.listen(config.port, config.host, () => {
  console.log(`[server] Listening on http://${config.host}:${config.port}`);
  console.log(`[server] Posts file: ${config.postsFile}`);
});

server.on('error', (err) => {
  console.error('[server] Fatal:', err);
  process.exit(1);
});

for (const sig of ['SIGINT', 'SIGTERM'] as const) {
  process.on(sig, () => {
    console.log(`\n[server] ${sig} received, shutting down...`);
    server.close(() => process.exit(0));
  });
}
