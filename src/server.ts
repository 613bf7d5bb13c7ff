/**
 * Node entry point: reads `.env`, builds the app and serves it.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { loadConfig } from './config';
import { createApp } from './app';

const config = loadConfig(process.env);

serve({ fetch: createApp(config), port: config.port }, (info) => {
	console.log(`Quiz chronicle backend listening on http://localhost:${info.port}`);
});
