/**
 * Rising-tide (skyline) compaction.
 *
 * Near-linear alternative to gravity compaction for large layouts. A `tide`
 * array holds, per lane (column for vertical, row for horizontal), the first
 * free coordinate along the main axis. Each item lands on the highest tide
 * under its span and raises it. Statics are not moved: they raise the tide
 * when reached in sort order, and each candidate position is checked against
 * them so nothing lands on top of one further down.
 */

import { collides, statics } from '../geometry';
import { updateItem } from '../layout-item';
import type { Axis, CompactOptions, Layout, LayoutItem } from '../types';
import { farEdge, settle, span } from './compact-utils';

const DEBUG = false;
function log(...args: unknown[]) {
	if (DEBUG) console.log('[compact]', ...args);
}

function placeAt(item: LayoutItem, axis: Axis, main: number, cross: number): LayoutItem {
	return axis === 'y'
		? updateItem(item, { x: cross, y: main })
		: updateItem(item, { x: main, y: cross });
}

function raiseTide(tide: number[], from: number, to: number, level: number): void {
	for (let k = from; k < to; k++) {
		if (tide[k] < level) tide[k] = level;
	}
}

/**
 * @param axis - main axis: 'y' compacts up, 'x' compacts left
 * @param lanes - lane count across the main axis (columns for 'y', rows for 'x');
 *   widened when items reach further
 */
export function compactRisingTide(
	layout: Layout,
	axis: Axis,
	lanes: number,
	options: CompactOptions = {},
): LayoutItem[] {
	if (options.allowOverlap) return [...layout];

	const cross: Axis = axis === 'y' ? 'x' : 'y';

	let laneCount = Math.max(lanes, 0);
	for (const item of layout) {
		laneCount = Math.max(laneCount, farEdge(item, cross));
	}
	const tide = new Array<number>(laneCount).fill(0);

	const sorted = [...layout].sort(
		(a, b) => a[axis] - b[axis] || a[cross] - b[cross] || Number(b.isStatic) - Number(a.isStatic),
	);
	const obstacles = statics(layout).sort((a, b) => a[axis] - b[axis] || a[cross] - b[cross]);
	let cursor = 0;

	const result = new Map<string, LayoutItem>();

	for (const item of sorted) {
		const from = Math.max(item[cross], 0);
		const to = Math.min(from + span(item, cross), laneCount);

		if (item.isStatic) {
			raiseTide(tide, from, to, farEdge(item, axis));
			continue;
		}

		let main = 0;
		for (let k = from; k < to; k++) {
			if (tide[k] > main) main = tide[k];
		}

		// Statics ending at or before the lowest tide can never be hit again
		const lowTide = Math.min(...tide);
		while (cursor < obstacles.length && farEdge(obstacles[cursor], axis) <= lowTide) {
			cursor++;
		}

		let candidate = placeAt(item, axis, main, from);
		let i = cursor;
		while (i < obstacles.length) {
			const obstacle = obstacles[i];
			// Sorted along the main axis: the rest start beyond the candidate
			if (obstacle[axis] >= farEdge(candidate, axis)) break;
			if (collides(candidate, obstacle)) {
				candidate = placeAt(item, axis, farEdge(obstacle, axis), from);
				// A later static may now sit under the shifted candidate
				i = cursor;
				continue;
			}
			i++;
		}

		log('placed', item.id, { main: candidate[axis], cross: from });
		raiseTide(tide, from, to, farEdge(candidate, axis));
		result.set(item.id, candidate);
	}

	return settle(layout, result);
}
