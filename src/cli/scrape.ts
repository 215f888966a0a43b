#!/usr/bin/env node
import { openSession, waitForOperator } from '../agent/human';
import { ScrapeManager } from '../run/manager';
import { csvPath, logPath, resolveConfig } from '../schemas/config';
import { ZoonScraper } from '../scrapers/zoon';
import { overridesFromArgs, parseArgs } from './args';

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = resolveConfig(overridesFromArgs(args));
  console.log(`[start] ${ZoonScraper.name}: ${config.catalogUrl}, pages 1..${config.totalPages}`);

  const manager = new ScrapeManager(config, {
    openSession: () => openSession(config),
    confirm: () => waitForOperator('Pass the check in the browser window, then press Enter here...'),
  });
  const { places, progress } = await manager.run();

  console.log(`\n[done] CSV: ${csvPath(config)} | rows: ${places.length}`);
  console.log(`[done] LOG: ${logPath(config)}`);
  console.log(`[done] stopped: ${progress.stopReason}`);
}

if (require.main === module) {
  main().catch(e => { console.error(e); process.exit(1); });
}
