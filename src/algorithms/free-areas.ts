/**
 * Free-space queries over a layout.
 *
 * Areas are computed inside the occupied band of the grid (rows 0 to
 * bottom(layout)); everything below it is free by definition.
 */

import { bottom } from '../geometry';
import type { GridRect, Layout } from '../types';

export interface FreeArea extends GridRect {
	id: string;
}

/**
 * 2D occupancy grid: occupied[row][col]
 */
function occupancy(layout: Layout, columns: number, rows: number): boolean[][] {
	const occupied: boolean[][] = [];
	for (let r = 0; r < rows; r++) {
		occupied.push(new Array<boolean>(columns).fill(false));
	}

	for (const item of layout) {
		for (let r = Math.max(item.y, 0); r < Math.min(item.y + item.h, rows); r++) {
			for (let c = Math.max(item.x, 0); c < Math.min(item.x + item.w, columns); c++) {
				occupied[r][c] = true;
			}
		}
	}

	return occupied;
}

function contains(outer: GridRect, inner: GridRect): boolean {
	return (
		inner.x >= outer.x &&
		inner.y >= outer.y &&
		inner.x + inner.w <= outer.x + outer.w &&
		inner.y + inner.h <= outer.y + outer.h
	);
}

/**
 * Every maximal free rectangle, sorted top-to-bottom then left-to-right.
 * An empty layout has a single full-width area one row high.
 */
export function findFreeAreas(layout: Layout, columns: number): FreeArea[] {
	if (layout.length === 0) {
		return [{ id: 'free_area_0', x: 0, y: 0, w: columns, h: 1 }];
	}

	const rows = bottom(layout);
	const occupied = occupancy(layout, columns, rows);

	// Histogram of free cells stacked above each column, row by row
	const heights = new Array<number>(columns).fill(0);
	const candidates = new Map<string, GridRect>();

	for (let r = 0; r < rows; r++) {
		for (let c = 0; c < columns; c++) {
			heights[c] = occupied[r][c] ? 0 : heights[c] + 1;
		}

		for (let c = 0; c < columns; c++) {
			let minHeight = heights[c];
			for (let k = c; k >= 0; k--) {
				minHeight = Math.min(minHeight, heights[k]);
				if (minHeight === 0) break;
				const rect = { x: k, y: r - minHeight + 1, w: c - k + 1, h: minHeight };
				candidates.set(`${rect.x},${rect.y},${rect.w},${rect.h}`, rect);
			}
		}
	}

	const all = Array.from(candidates.values());
	const maximal = all.filter((rect) => !all.some((other) => other !== rect && contains(other, rect)));

	return maximal
		.sort((a, b) => a.y - b.y || a.x - b.x)
		.map((rect, i) => ({ id: `free_area_${i}`, ...rect }));
}

/**
 * Maximal free runs within each row
 */
export function findHorizontalFreeAreas(layout: Layout, columns: number): FreeArea[] {
	if (layout.length === 0) {
		return [{ id: 'free_area_0', x: 0, y: 0, w: columns, h: 1 }];
	}

	const rows = bottom(layout);
	const occupied = occupancy(layout, columns, rows);
	const areas: FreeArea[] = [];

	for (let r = 0; r < rows; r++) {
		let c = 0;
		while (c < columns) {
			if (occupied[r][c]) {
				c++;
				continue;
			}
			const start = c;
			while (c < columns && !occupied[r][c]) c++;
			areas.push({ id: `free_area_${areas.length}`, x: start, y: r, w: c - start, h: 1 });
		}
	}

	return areas;
}

export function firstFreeArea(layout: Layout, columns: number): FreeArea | undefined {
	return findFreeAreas(layout, columns)[0];
}

/**
 * First free area starting on the row of the lowest item's top edge
 */
export function lastRowFreeArea(layout: Layout, columns: number): FreeArea | undefined {
	if (layout.length === 0) return undefined;

	const lastRow = Math.max(...layout.map((item) => item.y));
	return findFreeAreas(layout, columns).find((area) => area.y === lastRow);
}

/**
 * Whether an item of the given size fits inside one of the free areas
 */
export function canItemFit(
	layout: Layout,
	columns: number,
	size: { w: number; h: number },
): boolean {
	return findFreeAreas(layout, columns).some((area) => size.w <= area.w && size.h <= area.h);
}
