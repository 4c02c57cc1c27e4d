/**
 * Gravity compaction (vertical and horizontal).
 *
 * Items are processed in reading order along the gravity axis. Statics are
 * anchors: they sit in the placed set from the start and never move. Each
 * other item first slides toward the origin while it is clear, then is pushed
 * past anything it still collides with. A push cascades onto later items of
 * the pass so they start their own turn below (or right of) the pushed item.
 */

import { COLLISION_RETRY_LIMIT } from '../constants';
import { collides, firstCollision, sortLayoutItems, statics } from '../geometry';
import { updateItem } from '../layout-item';
import type { Axis, CompactOptions, Layout, LayoutItem } from '../types';
import { farEdge, moveAlong, settle } from './compact-utils';

const DEBUG = false;
function log(...args: unknown[]) {
	if (DEBUG) console.log('[compact]', ...args);
}

interface PushEntry {
	index: number;
	item: LayoutItem;
}

/**
 * Push every later, non-static item of the pass that collides with `pusher`
 * to the pusher's far edge, and keep going from each pushed item.
 * Worklist instead of recursion so long chains cannot exhaust the stack.
 */
function cascadePush(working: LayoutItem[], fromIndex: number, pusher: LayoutItem, axis: Axis): void {
	const pending: PushEntry[] = [{ index: fromIndex, item: pusher }];
	const visited = new Set<string>([pusher.id]);
	let steps = 0;

	for (let entry = pending.pop(); entry; entry = pending.pop()) {
		const edge = farEdge(entry.item, axis);

		for (let j = entry.index + 1; j < working.length; j++) {
			const other = working[j];
			if (other.isStatic || visited.has(other.id)) continue;
			// Pass order is sorted along the axis: nothing further can reach back
			if (other[axis] > edge) break;
			if (!collides(entry.item, other)) continue;

			if (++steps > COLLISION_RETRY_LIMIT) {
				console.warn(`[compact] cascade from "${pusher.id}" stopped after ${COLLISION_RETRY_LIMIT} pushes`);
				return;
			}

			const pushed = moveAlong(other, axis, edge);
			working[j] = pushed;
			visited.add(other.id);
			pending.push({ index: j, item: pushed });
		}
	}
}

function compactItem(
	placed: readonly LayoutItem[],
	working: LayoutItem[],
	index: number,
	axis: Axis,
	columns: number,
): LayoutItem {
	const start = working[index];
	let current = start.x < 0 || start.y < 0
		? updateItem(start, { x: Math.max(start.x, 0), y: Math.max(start.y, 0) })
		: start;

	// Slide toward the origin; stops on the first step that collides (or at 0)
	while (current[axis] > 0 && !firstCollision(placed, current)) {
		current = moveAlong(current, axis, current[axis] - 1);
	}

	let attempts = 0;
	for (
		let collider = firstCollision(placed, current);
		collider;
		collider = firstCollision(placed, current)
	) {
		if (++attempts > COLLISION_RETRY_LIMIT) {
			console.warn(`[compact] gave up placing "${start.id}" after ${COLLISION_RETRY_LIMIT} attempts`);
			break;
		}

		current = moveAlong(current, axis, farEdge(collider, axis));
		if (axis === 'x' && current.x + current.w > columns) {
			// Ran off the right edge: continue on the next row
			current = updateItem(current, { x: 0, y: current.y + 1 });
		}
		cascadePush(working, index, current, axis);
	}

	if (current.x !== start.x || current.y !== start.y) {
		log('compacted', start.id, { from: [start.x, start.y], to: [current.x, current.y] });
	}
	working[index] = current;
	return current;
}

/**
 * Compact toward the origin along `axis` ('y' = gravity up, 'x' = gravity left)
 */
export function compactWithGravity(
	layout: Layout,
	axis: Axis,
	columns: number,
	options: CompactOptions = {},
): LayoutItem[] {
	if (options.allowOverlap) return [...layout];

	const working = sortLayoutItems(layout, axis);
	const placed = statics(layout);
	const result = new Map<string, LayoutItem>();

	for (let i = 0; i < working.length; i++) {
		if (working[i].isStatic) continue;
		const next = compactItem(placed, working, i, axis, columns);
		placed.push(next);
		result.set(next.id, next);
	}

	return settle(layout, result);
}
