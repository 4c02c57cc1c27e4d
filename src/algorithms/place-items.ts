/**
 * Bulk placement, defragmentation and bounds correction.
 */

import { PLACEMENT_SAFETY_LIMIT } from '../constants';
import { bottom, collides, firstCollision, sortLayoutItems, statics } from '../geometry';
import { isUnplaced, updateItem } from '../layout-item';
import type { Layout, LayoutItem, PlaceNewItemsOptions } from '../types';
import { noCompactor } from './compactor';
import { settle } from './compact-utils';

const DEBUG = false;
function log(...args: unknown[]) {
	if (DEBUG) console.log('[place-items]', ...args);
}

/**
 * Append `newItems` to `existingLayout`.
 *
 * Items with explicit coordinates are appended as-is. Items marked unplaced
 * (x or y of -1) are laid out left-to-right, top-to-bottom starting at the
 * bottom of the existing layout, so existing arrangements are never filled in
 * or moved. Cells taken by the appended items are skipped.
 *
 * @example
 * placeNewItems([], [createLayoutItem({ id: 'a', x: -1, y: -1, w: 2, h: 2 })], 4);
 * // -> a at (0, 0)
 */
export function placeNewItems(
	existingLayout: Layout,
	newItems: Layout,
	columns: number,
	options: PlaceNewItemsOptions = {},
): LayoutItem[] {
	const { safetyLimit = PLACEMENT_SAFETY_LIMIT } = options;

	const toPlace = newItems.filter((item) => isUnplaced(item));
	const result: LayoutItem[] = [
		...existingLayout,
		...newItems.filter((item) => !isUnplaced(item)),
	];

	if (toPlace.length === 0) return result;

	let cursorX = 0;
	let cursorY = bottom(existingLayout);

	for (const item of toPlace) {
		let placed = false;

		for (let attempt = 0; attempt < safetyLimit && !placed; attempt++) {
			// An item wider than the grid still gets a row of its own at x = 0
			if (cursorX > 0 && cursorX + item.w > columns) {
				cursorX = 0;
				cursorY++;
				continue;
			}

			const candidate = updateItem(item, { x: cursorX, y: cursorY });
			if (firstCollision(result, candidate)) {
				cursorX++;
				continue;
			}

			result.push(candidate);
			cursorX += item.w;
			placed = true;
		}

		if (!placed) {
			const fallback = updateItem(item, { x: 0, y: bottom(result) });
			console.warn(
				`[place-items] no free slot for "${item.id}" after ${safetyLimit} attempts; appending at row ${fallback.y}`,
			);
			result.push(fallback);
			cursorX = item.w;
			cursorY = fallback.y;
		}
	}

	return result;
}

/**
 * Defragment the layout: every non-static item, in reading order, moves to
 * the first free cell scanning from the top-left. Statics stay put and act
 * as walls. Items wider than the grid go below everything else.
 */
export function optimizeLayout(layout: Layout, columns: number): LayoutItem[] {
	const placed: LayoutItem[] = layout.filter((item) => item.isStatic);
	const ordered = sortLayoutItems(
		layout.filter((item) => !item.isStatic),
		'y',
	);
	const result = new Map<string, LayoutItem>();

	for (const item of ordered) {
		let spot: LayoutItem | undefined;

		if (item.w <= columns) {
			// The first row below everything placed is always free
			const lastRow = bottom(placed);
			for (let y = 0; y <= lastRow && !spot; y++) {
				for (let x = 0; x + item.w <= columns; x++) {
					const candidate = updateItem(item, { x, y });
					if (!firstCollision(placed, candidate)) {
						spot = candidate;
						break;
					}
				}
			}
		}

		if (!spot) {
			spot = updateItem(item, { x: 0, y: bottom(placed) });
			log('appended oversized item', item.id, 'at row', spot.y);
		}

		placed.push(spot);
		result.set(item.id, spot);
	}

	return noCompactor.compact(settle(layout, result), columns);
}

/**
 * Fit the layout into `columns` after the column count changed.
 *
 * Non-static items sticking out on the right shift left; items starting left
 * of the grid are stretched to the full width at x = 0. Static items are never
 * moved sideways or resized: a static that overlaps a non-static item accepted
 * earlier in the pass is pushed down one row at a time until it is clear of
 * those items and of the other statics (at their corrected positions). Statics
 * that already overlapped each other in the input are left overlapping.
 */
export function correctBounds(layout: Layout, columns: number): LayoutItem[] {
	const accepted: LayoutItem[] = [];
	const originalStatics = statics(layout);
	const staticPositions = new Map<string, LayoutItem>();
	for (const entry of originalStatics) staticPositions.set(entry.id, entry);

	const blocked = (original: LayoutItem, candidate: LayoutItem): boolean => {
		if (accepted.some((other) => collides(other, candidate))) return true;
		return originalStatics.some((other) => {
			const placed = staticPositions.get(other.id) ?? other;
			return collides(placed, candidate) && !collides(other, original);
		});
	};

	return layout.map((item) => {
		let current = item;

		if (!current.isStatic) {
			if (current.x + current.w > columns) {
				current = updateItem(current, { x: columns - current.w });
			}
			if (current.x < 0) {
				current = updateItem(current, { x: 0, w: columns });
			}
			accepted.push(current);
			return current;
		}

		while (blocked(item, current)) {
			current = updateItem(current, { y: current.y + 1 });
		}
		if (current !== item) log('pushed static', item.id, 'down to row', current.y);
		staticPositions.set(item.id, current);
		return current;
	});
}
