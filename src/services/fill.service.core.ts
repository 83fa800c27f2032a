import { Catalog } from '../core/catalog';
import { logger } from '../core/logger';
import { classifyInventoryLines, parseItems } from '../parser/line.parser';
import { renderReport, summarize } from '../report/report.renderer';
import { readTextFile } from '../utils/fsSafe';
import { incrementSimulations, recordDecisions } from '../utils/metrics';
import { processInventoryRequests } from './fill.service.process';
import { FillRunInput, FillRunResult, FillService, ProcessOptions } from './fill.service.types';

class FillServiceImpl implements FillService {
  run(input: FillRunInput, options?: ProcessOptions): FillRunResult {
    const catalog = new Catalog(parseItems(input.items, input.sources?.items));
    const lines = classifyInventoryLines(input.inventories);

    const results = processInventoryRequests(lines, catalog, options);
    const summary = results.map(summarize);

    incrementSimulations();
    recordDecisions({
      inventories: summary.length,
      stored: summary.reduce((total, entry) => total + entry.stored, 0),
      discarded: summary.reduce((total, entry) => total + entry.discarded, 0),
      unresolved: summary.reduce((total, entry) => total + entry.unresolved, 0),
    });

    logger.info({ items: catalog.size, lines: lines.length, inventories: results.length }, 'Simulation completed');

    return { catalog, results, report: renderReport(catalog, results), summary };
  }

  async runFiles(itemsPath: string, inventoriesPath: string, options?: ProcessOptions): Promise<FillRunResult> {
    const items = await readTextFile(itemsPath);
    const inventories = await readTextFile(inventoriesPath);
    return this.run({ items, inventories, sources: { items: itemsPath, inventories: inventoriesPath } }, options);
  }
}

// Export singleton instance
export const fillService = new FillServiceImpl();
