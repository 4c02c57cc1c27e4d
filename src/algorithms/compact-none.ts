/**
 * Overlap resolution without gravity.
 *
 * Items are visited in reading order along the push axis. Statics are placed
 * first and never move; every other item is pushed forward past whatever it
 * collides with until it is clear.
 */

import { COLLISION_RETRY_LIMIT } from '../constants';
import { firstCollision, sortLayoutItems, statics } from '../geometry';
import { updateItem } from '../layout-item';
import type { Axis, CompactOptions, Layout, LayoutItem } from '../types';
import { pushPast, settle } from './compact-utils';

const DEBUG = false;
function log(...args: unknown[]) {
	if (DEBUG) console.log('[compact]', ...args);
}

function resolvePositions(
	layout: Layout,
	columns: number,
	axis: Axis,
): Map<string, LayoutItem> {
	const placed = statics(layout);
	const resolved = new Map<string, LayoutItem>();
	const movable = sortLayoutItems(
		layout.filter((item) => !item.isStatic),
		axis,
	);

	for (const item of movable) {
		let current = item;
		let attempts = 0;
		let collider = firstCollision(placed, current);

		while (collider && attempts < COLLISION_RETRY_LIMIT) {
			current = pushPast(current, collider, axis, columns);
			collider = firstCollision(placed, current);
			attempts++;
		}

		if (collider) {
			console.warn(
				`[compact] gave up resolving "${item.id}" after ${attempts} attempts; it still overlaps "${collider.id}"`,
			);
		}
		if (current !== item) log('pushed', item.id, { x: current.x, y: current.y });

		placed.push(current);
		resolved.set(item.id, current);
	}

	return resolved;
}

/**
 * Resolve overlaps only. Items that had to move are marked `moved`.
 */
export function resolveOverlaps(layout: Layout, columns: number, axis: Axis = 'y'): LayoutItem[] {
	const resolved = resolvePositions(layout, columns, axis);
	return layout.map((item) => {
		const next = resolved.get(item.id);
		if (!next || next === item) return item;
		return updateItem(next, { moved: true });
	});
}

/**
 * Compaction entry point of the "none" strategy: resolve overlaps and clear
 * the `moved` flags, without pulling anything toward the origin.
 */
export function compactNone(
	layout: Layout,
	columns: number,
	axis: Axis = 'y',
	options: CompactOptions = {},
): LayoutItem[] {
	if (options.allowOverlap) return [...layout];
	return settle(layout, resolvePositions(layout, columns, axis));
}
