/**
 * Helpers shared by the compaction strategies
 */

import { updateItem } from '../layout-item';
import type { Axis, Layout, LayoutItem } from '../types';

/** Span of an item along `axis` */
export function span(item: LayoutItem, axis: Axis): number {
	return axis === 'y' ? item.h : item.w;
}

/** Coordinate just past the far edge of `item` along `axis` */
export function farEdge(item: LayoutItem, axis: Axis): number {
	return item[axis] + span(item, axis);
}

export function moveAlong(item: LayoutItem, axis: Axis, coord: number): LayoutItem {
	return axis === 'y' ? updateItem(item, { y: coord }) : updateItem(item, { x: coord });
}

/**
 * Push `item` just past `collider` along `axis`.
 * On the x axis an item pushed over the right edge wraps to the start of the next row.
 */
export function pushPast(
	item: LayoutItem,
	collider: LayoutItem,
	axis: Axis,
	columns: number,
): LayoutItem {
	const pushed = moveAlong(item, axis, farEdge(collider, axis));
	if (axis === 'x' && pushed.x + pushed.w > columns) {
		return updateItem(pushed, { x: 0, y: pushed.y + 1 });
	}
	return pushed;
}

/**
 * Rebuild the layout in input order from the positions a compaction pass chose.
 * Untouched items keep their identity; everything else comes back with `moved: false`.
 */
export function settle(layout: Layout, placed: ReadonlyMap<string, LayoutItem>): LayoutItem[] {
	return layout.map((original) => {
		const next = placed.get(original.id) ?? original;
		if (next.x === original.x && next.y === original.y && !original.moved) {
			return original;
		}
		return updateItem(next, { moved: false });
	});
}
