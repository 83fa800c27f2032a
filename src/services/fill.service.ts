export { fillService } from './fill.service.core';
export { processInventoryRequests, pairPositionally } from './fill.service.process';
export { segmentLines, splitOn } from './fill.service.segment';
export { allocateInventories } from './fill.service.allocate';
export { resolveRequests, resolveStacks } from './fill.service.resolve';
export { decide, formatLogEntry, formatUnresolvedEntry, recordDecision } from './fill.service.audit';
export type {
  FillRunInput,
  FillRunResult,
  FillService,
  LoggedInventory,
  ProcessOptions,
  StackResolution,
  UnresolvedRequest,
} from './fill.service.types';
