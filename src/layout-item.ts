/**
 * LayoutItem construction, copying and record conversion.
 */

import { UNPLACED } from './constants';
import type { LayoutItem, LayoutItemInit, LayoutItemRecord } from './types';

/**
 * Create a LayoutItem, filling constraint and flag defaults
 */
export function createLayoutItem(init: LayoutItemInit): LayoutItem {
	return {
		id: init.id,
		x: init.x,
		y: init.y,
		w: init.w,
		h: init.h,
		minW: init.minW ?? 1,
		minH: init.minH ?? 1,
		maxW: init.maxW ?? Infinity,
		maxH: init.maxH ?? Infinity,
		isStatic: init.isStatic ?? false,
		isDraggable: init.isDraggable,
		isResizable: init.isResizable,
		moved: init.moved ?? false,
	};
}

/**
 * Return a copy of `item` with `changes` applied
 */
export function updateItem(item: LayoutItem, changes: Partial<LayoutItem>): LayoutItem {
	return { ...item, ...changes };
}

/**
 * Whether the item still waits for auto-placement
 */
export function isUnplaced(item: LayoutItem): boolean {
	return item.x === UNPLACED || item.y === UNPLACED;
}

export function layoutItemToRecord(item: LayoutItem): LayoutItemRecord {
	return {
		id: item.id,
		x: item.x,
		y: item.y,
		w: item.w,
		h: item.h,
		minW: item.minW,
		minH: item.minH,
		// JSON has no Infinity
		maxW: Number.isFinite(item.maxW) ? item.maxW : null,
		maxH: Number.isFinite(item.maxH) ? item.maxH : null,
		isDraggable: item.isDraggable ?? null,
		isResizable: item.isResizable ?? null,
		isStatic: item.isStatic,
		moved: item.moved,
	};
}

function readInt(record: Record<string, unknown>, key: string, fallback: number): number {
	const value = record[key];
	return typeof value === 'number' && Number.isFinite(value) ? Math.trunc(value) : fallback;
}

function readMax(record: Record<string, unknown>, key: string): number {
	const value = record[key];
	return typeof value === 'number' && !Number.isNaN(value) ? value : Infinity;
}

function readFlag(record: Record<string, unknown>, key: string): boolean | undefined {
	const value = record[key];
	return typeof value === 'boolean' ? value : undefined;
}

/**
 * Build a LayoutItem from a generic key-value record (e.g. parsed JSON).
 * Numeric fields may be floats and are truncated; missing ones get defaults.
 *
 * @throws TypeError when `id` is missing or not a string
 */
export function layoutItemFromRecord(record: Record<string, unknown>): LayoutItem {
	const id = record['id'];
	if (typeof id !== 'string') {
		throw new TypeError(`[layout-item] record is missing a string id (got ${typeof id})`);
	}

	return createLayoutItem({
		id,
		x: readInt(record, 'x', 0),
		y: readInt(record, 'y', 0),
		w: readInt(record, 'w', 1),
		h: readInt(record, 'h', 1),
		minW: readInt(record, 'minW', 1),
		minH: readInt(record, 'minH', 1),
		maxW: readMax(record, 'maxW'),
		maxH: readMax(record, 'maxH'),
		isDraggable: readFlag(record, 'isDraggable'),
		isResizable: readFlag(record, 'isResizable'),
		isStatic: readFlag(record, 'isStatic') ?? false,
		moved: readFlag(record, 'moved') ?? false,
	});
}
