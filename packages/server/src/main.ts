import 'dotenv/config';
import { loadConfig } from './config/env';
import { buildServer } from './index';

const config = loadConfig();
const app = buildServer({ config });

app.listen({ port: config.port, host: config.host }, (err) => {
  if (err) {
    console.error(`❌ Failed to start server: ${err.message}`);
    process.exit(1);
  }
  console.log(`\n🚀 Server listening at http://${config.host}:${config.port}`);
});
