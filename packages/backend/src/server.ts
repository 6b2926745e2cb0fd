import { getConfig } from './config.js';
import { createApp } from './app.js';

const config = getConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.log(`[po-tools] Backend running on http://localhost:${config.port}`);
  console.log(`[po-tools] Upload dir: ${config.uploadDir}`);
  console.log(`[po-tools] Reports kept for ${Math.round(config.reportTtlMs / 1000)}s`);
});
