export * from './core/types';
export * from './core/errors';
export { Catalog } from './core/catalog';
export { Inventory, ItemStack, quantitySizer, slotSizer, sizerFor } from './core/inventory';
export { classifyInventoryLines, classifyLine, parseItems } from './parser/line.parser';
export { renderReport, summarize, toInventoryView } from './report/report.renderer';
export * from './services/fill.service';
