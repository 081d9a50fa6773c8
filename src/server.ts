import 'dotenv/config';
import { serve } from '@hono/node-server';
import { loadEnv } from './config';
import { createApp } from './index';

const env = loadEnv();
const app = createApp();

serve(
  {
    fetch: (request) => app.fetch(request, env),
    port: env.PORT,
    hostname: env.HOST,
  },
  (info) => {
    console.log(`Audit Conformity API ${env.API_VERSION} listening on ${info.address}:${info.port} (${env.ENVIRONMENT})`);
    console.log(`Reports directory: ${env.REPORTS_DIR}`);
  },
);
