/**
 * Cluster mover: drags a group of items as one rigid block.
 */

import { CLUSTER_ID } from '../constants';
import { boundingBox, getItem } from '../geometry';
import { createLayoutItem, updateItem } from '../layout-item';
import type { GridRect, Layout, LayoutItem, MoveClusterOptions } from '../types';
import { moveElement } from './move-element';

const DEBUG = false;
function log(...args: unknown[]) {
	if (DEBUG) console.log('[cluster]', ...args);
}

/**
 * Smallest rectangle enclosing `items`; a zero-sized rect at the origin when empty
 */
export function calculateBoundingBox(items: Layout): GridRect {
	return boundingBox(items) ?? { x: 0, y: 0, w: 0, h: 0 };
}

/**
 * Move the items whose ids are in `ids` so their bounding box's top-left
 * lands on `(x, y)`.
 *
 * The bounding box travels through moveElement as a single virtual item,
 * pushing the other items out of the way. Whatever offset the box ends up
 * with (it may be pushed past a static item) is applied to every member.
 * Static items never join a cluster; they stay behind as obstacles.
 */
export function moveCluster(
	layout: Layout,
	ids: Iterable<string>,
	x: number,
	y: number,
	options: MoveClusterOptions,
): Layout {
	const requested = new Set(ids);
	const members = layout.filter((item) => requested.has(item.id) && !item.isStatic);
	const idSet = new Set(members.map((item) => item.id));
	const box = boundingBox(members);
	if (!box) return layout;

	const virtual = createLayoutItem({ id: CLUSTER_ID, ...box });
	const obstacles = layout.filter((item) => !idSet.has(item.id));

	const resolved = moveElement([...obstacles, virtual], virtual, x, y, {
		columns: options.columns,
		compactType: options.compactType,
		preventCollision: options.preventCollision,
		maxIterations: options.maxIterations,
	});

	const landed = getItem(resolved, CLUSTER_ID) ?? virtual;
	const dx = landed.x - box.x;
	const dy = landed.y - box.y;
	log('cluster delta', { dx, dy, members: members.length });

	const resolvedById = new Map<string, LayoutItem>();
	for (const item of resolved) resolvedById.set(item.id, item);

	return layout.map((item) => {
		if (idSet.has(item.id)) {
			return updateItem(item, { x: item.x + dx, y: item.y + dy, moved: true });
		}
		return resolvedById.get(item.id) ?? item;
	});
}
