/**
 * Move/drag resolver.
 *
 * Places one item at a target cell, then pushes whatever it now overlaps
 * downward, breadth-first, until the displacement has settled.
 */

import { DEFAULT_MAX_ITERATIONS } from '../constants';
import { allCollisions, getItem } from '../geometry';
import { updateItem } from '../layout-item';
import type { Layout, LayoutItem, MoveElementOptions } from '../types';
import { getCompactor } from './compactor';

const DEBUG = false;
function log(...args: unknown[]) {
	if (DEBUG) console.log('[move-element]', ...args);
}

/**
 * Calculate the layout after moving `item` to `(x, y)`.
 *
 * Every item overlapping a moved item is pushed to just below it and in turn
 * pushes what it overlaps. Each item is pushed at most once. When a moving
 * item hits a static one it jumps below the static and is re-checked before
 * anything else.
 *
 * With `preventCollision` the result goes through the configured strategy's
 * overlap resolution, since two items pushed to the same row may still overlap.
 *
 * @returns The input layout itself when nothing needs to change
 */
export function moveElement(
	layout: Layout,
	item: LayoutItem,
	x: number,
	y: number,
	options: MoveElementOptions,
): Layout {
	const {
		columns,
		compactType = 'vertical',
		preventCollision = false,
		force = false,
		maxIterations = DEFAULT_MAX_ITERATIONS,
	} = options;

	if (item.isStatic) return layout;

	const current = getItem(layout, item.id) ?? item;
	if (current.isStatic) return layout;

	if (
		!force &&
		current.x === x &&
		current.y === y &&
		current.w === item.w &&
		current.h === item.h
	) {
		return layout;
	}

	const target = updateItem(current, { x, y, moved: true });

	// Map keeps input order; an item missing from the layout is appended
	const positions = new Map<string, LayoutItem>();
	for (const entry of layout) positions.set(entry.id, entry);
	positions.set(target.id, target);

	// FIFO with a movable head so re-checks can jump the line
	const queue: LayoutItem[] = [target];
	let head = 0;
	const processed = new Set<string>([target.id]);

	const limit = Math.max(maxIterations, layout.length * 2);
	let iterations = 0;

	while (head < queue.length) {
		if (++iterations > limit) {
			console.warn(
				`[move-element] propagation for "${item.id}" exceeded ${limit} iterations; returning partial layout`,
			);
			break;
		}

		const mover = queue[head++];
		const colliders = allCollisions(positions.values(), mover).sort((a, b) => a.y - b.y);

		for (const collider of colliders) {
			if (processed.has(collider.id)) continue;

			if (collider.isStatic) {
				// Jump below the obstacle; the remaining collisions are stale now
				const jumped = updateItem(mover, { y: collider.y + collider.h, moved: true });
				positions.set(mover.id, jumped);
				queue[--head] = jumped;
				log('jumped static', mover.id, 'past', collider.id, '->', jumped.y);
				break;
			}

			const pushed = updateItem(collider, { y: mover.y + mover.h, moved: true });
			processed.add(collider.id);
			positions.set(collider.id, pushed);
			queue.push(pushed);
			log('pushed', collider.id, 'to row', pushed.y, 'by', mover.id);
		}
	}

	const result = Array.from(positions.values());
	if (!preventCollision) return result;

	return getCompactor(compactType).resolveCollisions(result, columns);
}
