import { CONFIG, loadScraperOptions } from './config';
import { errorMessage } from './errors';
import { log, error as logError } from './logger';
import { ListingScraper } from './session';

(async function main() {
  log('Starting scraper with config:', CONFIG);
  try {
    const opts = await loadScraperOptions(CONFIG);
    const scraper = new ListingScraper(CONFIG.query, opts);
    const table = await scraper.run({ save: CONFIG.save, zip: CONFIG.zip, outputDir: CONFIG.outputDir });
    log(`Wrote ${table.rows.length} listings (${table.failures.length} failed).`);
  } catch (err) {
    logError('Scraper failed:', errorMessage(err));
    process.exitCode = 1;
  }
})();
