#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig, hasCustomSearch } from '../../lib/config.js';
import { InvestigationOrchestrator } from '../../lib/orchestrator.js';
import { FactCheckServer } from './FactCheckServer.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const orchestrator = InvestigationOrchestrator.fromConfig(config);

  if (!hasCustomSearch(config)) {
    console.error('GOOGLE_API_KEY/GOOGLE_CSE_ID not set, evidence search starts with HTML scraping');
  }

  const server = new FactCheckServer(orchestrator);
  await server.run();
}

main().catch((error) => {
  console.error('Failed to start claim-credibility-mcp:', error);
  process.exit(1);
});
