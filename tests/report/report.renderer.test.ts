import { describe, it, expect } from 'vitest';
import { renderReport, summarize, toInventoryView } from '../../src/report/report.renderer';
import { Catalog } from '../../src/core/catalog';
import { processInventoryRequests } from '../../src/services/fill.service.process';
import { classifyInventoryLines } from '../../src/parser/line.parser';

const catalog = new Catalog([
  { id: 1, name: 'Torch' },
  { id: 12, name: 'Rope' },
]);

describe('renderReport', () => {
  it('should render log, item list and storage summary', () => {
    const results = processInventoryRequests(classifyInventoryLines('# 4\n12 4\n1 1'), catalog, {
      unresolvedPolicy: 'drop',
    });

    expect(renderReport(catalog, results)).toBe(
      [
        'Processing Log:',
        'Stored    ( 4) Rope',
        'Discarded ( 1) Torch',
        '',
        'Item List:',
        '   1 Torch',
        '  12 Rope',
        '',
        'Storage Summary:',
        ' -Used  4 of  4 slots',
        '  ( 4) Rope',
        '',
      ].join('\n')
    );
  });

  it('should render empty sections when there are no inventories', () => {
    expect(renderReport(new Catalog([]), [])).toBe('Processing Log:\n\nItem List:\n\nStorage Summary:\n');
  });
});

describe('toInventoryView', () => {
  it('should expose capacity, occupancy, log and stored stacks', () => {
    const [result] = processInventoryRequests(classifyInventoryLines('# 10\n1 3\n12 9'), catalog);
    if (!result) {
      throw new Error('expected one inventory');
    }

    expect(toInventoryView(result)).toEqual({
      capacity: 10,
      occupied: 3,
      log: ['Stored    ( 3) Torch', 'Discarded ( 9) Rope'],
      stacks: [{ itemId: 1, name: 'Torch', quantity: 3, size: 3 }],
    });
    expect(summarize(result)).toEqual({ capacity: 10, occupied: 3, remaining: 7, stored: 1, discarded: 1, unresolved: 0 });
  });
});
