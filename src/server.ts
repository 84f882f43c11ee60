import dotenv from 'dotenv';
import http from 'http';
import { createApp } from './app.js';
import { EmailGeneratorService } from './services/emailGeneratorService.js';
import { loadConfig } from './utils/config.js';
import { GeminiClient, maskKey } from './utils/gemini.js';

dotenv.config();

const config = loadConfig();
const service = new EmailGeneratorService(new GeminiClient(config.gemini));
const app = createApp({ service, corsOrigins: config.corsOrigins });
const server = http.createServer(app);

server.listen(config.port, () => {
  console.log(`API listening on :${config.port}`);
  console.log(`Gemini endpoint ${config.gemini.apiUrl} (key ${maskKey(config.gemini.apiKey)})`);
});
