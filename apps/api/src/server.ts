import 'dotenv/config';
import { createStorageProvider, describeStorageConfig } from '@carecomply/storage';
import { createApp } from './app';
import { loadApiConfig, validateApiConfig } from './config';

const config = loadApiConfig(process.env);

// Startup validation: log warnings for dangerous production misconfigurations
function logStartupConfig(): void {
  const { warnings, errors } = validateApiConfig(config);

  if (warnings.length > 0) {
    console.warn('\n[STARTUP] Configuration warnings:');
    warnings.forEach((w) => console.warn(`  ⚠️  ${w}`));
  }

  if (errors.length > 0) {
    console.error('\n[STARTUP] Configuration errors:');
    errors.forEach((e) => console.error(`  ❌  ${e}`));
  }

  if (warnings.length === 0 && errors.length === 0) {
    console.log('[STARTUP] Configuration looks good.');
  }

  console.log(`[STARTUP] Documents: ${describeStorageConfig(config.storage.documents)}`);
  console.log(`[STARTUP] Results: ${describeStorageConfig(config.storage.results)}`);
  console.log(`[STARTUP] Summary path: ${config.summaryLocation.basePath}/{yyyy}/{mm}/user_{id}/${config.summaryLocation.fileName}`);
  console.log(`[STARTUP] Auth: ${config.auth.clerkSecretKey ? 'Clerk JWT' : 'Test tokens only'}`);
  console.log(`[STARTUP] NODE_ENV: ${config.nodeEnv}`);
}

logStartupConfig();

const { app } = createApp({
  config,
  documentsStorage: createStorageProvider(config.storage.documents),
  resultsStorage: createStorageProvider(config.storage.results),
});

app.listen(config.port, () => {
  console.log(`\nCompliance API server running on http://localhost:${config.port}\n`);
});
