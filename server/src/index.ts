import { createApp } from './app.js';
import { type AppConfig, loadConfig } from './config.js';
import { ConfigError } from './errors.js';
import { setLogLevel } from './logger.js';
import { createNarrator } from './narrative.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    console.error(e.message);
    return process.exit(1);
  }
}

function main() {
  const config = readConfig();
  setLogLevel(config.logLevel);

  const narrator = createNarrator(config.narrative);
  const app = createApp(config, { narrator });

  app.listen(config.port, () => {
    console.log(`Model auditor listening on http://localhost:${config.port}`);
    if (!narrator) {
      console.warn('⚠️  No narrative provider configured (NARRATIVE_PROVIDER / GEMINI_API_KEY). /api/audit/narrative will return the report only.');
    } else {
      console.log(`Narrative provider: ${narrator.name}`);
    }
  });
}

main();
