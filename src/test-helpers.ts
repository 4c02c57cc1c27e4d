/**
 * Shared fixtures for the engine tests
 */

import { createLayoutItem } from './layout-item';
import { collides, getItem } from './geometry';
import type { Layout, LayoutItem, LayoutItemInit } from './types';

type ItemExtras = Omit<LayoutItemInit, 'id' | 'x' | 'y' | 'w' | 'h'>;

/**
 * Shorthand for createLayoutItem with positional geometry
 */
export function item(
	id: string,
	x: number,
	y: number,
	w: number,
	h: number,
	extras: ItemExtras = {},
): LayoutItem {
	return createLayoutItem({ id, x, y, w, h, ...extras });
}

export function staticItem(id: string, x: number, y: number, w: number, h: number): LayoutItem {
	return item(id, x, y, w, h, { isStatic: true });
}

/**
 * Look up an item, failing the test when it is missing
 */
export function at(layout: Layout, id: string): LayoutItem {
	const found = getItem(layout, id);
	if (!found) throw new Error(`item "${id}" not in layout [${layout.map((it) => it.id).join(', ')}]`);
	return found;
}

/** `[x, y]` of the item with `id` */
export function pos(layout: Layout, id: string): [number, number] {
	const found = at(layout, id);
	return [found.x, found.y];
}

/**
 * Ids of static items whose position differs between `before` and `after`
 */
export function movedStatics(before: Layout, after: Layout): string[] {
	return before
		.filter((entry) => entry.isStatic)
		.filter((entry) => {
			const next = getItem(after, entry.id);
			return !next || next.x !== entry.x || next.y !== entry.y;
		})
		.map((entry) => entry.id);
}

// ============================================================================
// Random generators for property-based testing
// ============================================================================

export function randomInt(min: number, max: number): number {
	return Math.floor(Math.random() * (max - min + 1)) + min;
}

/**
 * Generate a valid (non-overlapping) layout using a packing algorithm.
 * Places items one at a time, finding a valid position for each.
 */
export function randomValidLayout(
	itemCount: number,
	columns: number,
	options: { staticChance?: number; maxRow?: number } = {},
): LayoutItem[] {
	const { staticChance = 0, maxRow = 50 } = options;
	const items: LayoutItem[] = [];

	for (let i = 0; i < itemCount; i++) {
		const w = randomInt(1, Math.min(3, columns));
		const h = randomInt(1, 3);
		const isStatic = Math.random() < staticChance;

		// Start on a random row so layouts have gaps to compact
		const startRow = randomInt(0, 6);
		let placed: LayoutItem | undefined;
		for (let y = startRow; y <= maxRow && !placed; y++) {
			const startCol = randomInt(0, columns - w);
			for (let step = 0; step <= columns - w && !placed; step++) {
				const x = (startCol + step) % (columns - w + 1);
				const candidate = item(`item-${i}`, x, y, w, h, { isStatic });
				if (!items.some((other) => collides(candidate, other))) {
					placed = candidate;
				}
			}
		}

		// Fallback: place at bottom if no space found
		if (!placed) {
			const bottomRow = Math.max(0, ...items.map((it) => it.y + it.h));
			placed = item(`item-${i}`, 0, bottomRow, w, h, { isStatic });
		}
		items.push(placed);
	}

	return items;
}

/**
 * ASCII dump of a layout: one character per cell, 'X' marks overlaps
 */
export function formatGrid(layout: Layout, columns: number): string {
	if (layout.length === 0) return '(empty grid)';

	const rows = Math.max(...layout.map((it) => it.y + it.h));
	const grid: string[][] = [];
	for (let r = 0; r < rows; r++) {
		grid.push(Array<string>(columns).fill('.'));
	}

	for (const entry of layout) {
		const mark = entry.id.replace('item-', '').slice(-1);
		for (let r = Math.max(entry.y, 0); r < entry.y + entry.h && r < rows; r++) {
			for (let c = Math.max(entry.x, 0); c < entry.x + entry.w && c < columns; c++) {
				grid[r][c] = grid[r][c] === '.' ? mark : 'X';
			}
		}
	}

	return grid.map((row, i) => `${i.toString().padStart(2)}: ${row.join('')}`).join('\n');
}
