import { ParseError } from '../core/errors';
import {
  ClassifiedLine,
  ClassifiedLineSchema,
  Item,
  ItemSchema,
} from '../core/types';

const ITEM_LINE = /^(\d+)\s+(.*\S)$/;
const INVENTORY_LINE = /^#\s*(-?\d+)$/;
const STACK_LINE = /^(\d+)\s+(\d+)$/;

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Parse the items text: one `<id> <name>` per line, blank lines skipped.
 * Any other line is fatal.
 */
export function parseItems(text: string, source: string = 'items'): Item[] {
  const items: Item[] = [];

  splitLines(text).forEach((raw, index) => {
    const line = raw.trim();
    if (line.length === 0) {
      return;
    }

    const match = ITEM_LINE.exec(line);
    if (!match) {
      throw ParseError.invalidItemLine(source, index + 1, raw);
    }

    const parsed = ItemSchema.safeParse({ id: Number(match[1]), name: match[2] });
    if (!parsed.success) {
      throw ParseError.invalidItemLine(source, index + 1, raw);
    }
    items.push(parsed.data);
  });

  return items;
}

/**
 * Classify a single inventories line. Never fails: unrecognised text is kept
 * as an `other` record.
 */
export function classifyLine(raw: string): ClassifiedLine {
  const line = raw.trim();

  const marker = INVENTORY_LINE.exec(line);
  if (marker) {
    const parsed = ClassifiedLineSchema.safeParse({ kind: 'inventory', capacity: Number(marker[1]) });
    if (parsed.success) {
      return parsed.data;
    }
  }

  const stack = STACK_LINE.exec(line);
  if (stack) {
    const parsed = ClassifiedLineSchema.safeParse({
      kind: 'stack',
      itemId: Number(stack[1]),
      quantity: Number(stack[2]),
    });
    if (parsed.success) {
      return parsed.data;
    }
  }

  return { kind: 'other', text: raw };
}

/**
 * Classify every line of the inventories text, preserving order.
 */
export function classifyInventoryLines(text: string): ClassifiedLine[] {
  return splitLines(text).map(classifyLine);
}
