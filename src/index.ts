#!/usr/bin/env node
import { runCli } from './cli';
import { loadConfig } from './config';
import { JsonFileHistoryStore } from './history-store';
import { ShadeAnalysisService } from './shade-analysis';

async function main(): Promise<number> {
  const config = loadConfig();
  const store = new JsonFileHistoryStore(config.historyFile, config.historyLimit);
  const service = new ShadeAnalysisService({
    outputDir: config.dataDir,
    store,
    debugMode: config.debugMode
  });

  return runCli(process.argv.slice(2), {
    service,
    store,
    defaultSystems: config.defaultSystems,
    defaultSamplingMode: config.defaultSamplingMode
  });
}

// Run the main function
if (require.main === module) {
  main()
    .then(exitCode => {
      process.exitCode = exitCode;
    })
    .catch(error => {
      console.error('❌ Error during processing:', error);
      process.exitCode = 1;
    });
}

export { main };
