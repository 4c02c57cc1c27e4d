/**
 * Pure geometry and collision queries - no layout changes happen here.
 */

import type { Axis, GridRect, Layout, LayoutItem } from './types';

/**
 * Check if two items overlap. An item never collides with itself (same id).
 */
export function collides(a: LayoutItem, b: LayoutItem): boolean {
	if (a.id === b.id) return false;
	if (a.x + a.w <= b.x) return false; // a is left of b
	if (a.x >= b.x + b.w) return false; // a is right of b
	if (a.y + a.h <= b.y) return false; // a is above b
	if (a.y >= b.y + b.h) return false; // a is below b
	return true;
}

/**
 * First element of `candidates`, in iteration order, colliding with `item`
 */
export function firstCollision(
	candidates: Iterable<LayoutItem>,
	item: LayoutItem,
): LayoutItem | undefined {
	for (const candidate of candidates) {
		if (collides(candidate, item)) return candidate;
	}
	return undefined;
}

/**
 * Every element of `candidates` colliding with `item`
 */
export function allCollisions(
	candidates: Iterable<LayoutItem>,
	item: LayoutItem,
): LayoutItem[] {
	const collisions: LayoutItem[] = [];

	const left = item.x;
	const right = item.x + item.w;
	const top = item.y;
	const bottomEdge = item.y + item.h;

	for (const other of candidates) {
		if (other.id === item.id) continue;
		if (right <= other.x) continue;
		if (left >= other.x + other.w) continue;
		if (bottomEdge <= other.y) continue;
		if (top >= other.y + other.h) continue;
		collisions.push(other);
	}

	return collisions;
}

export function statics(layout: Layout): LayoutItem[] {
	return layout.filter((item) => item.isStatic);
}

/**
 * Lowest edge of the layout (first fully empty row), 0 when empty
 */
export function bottom(layout: Layout): number {
	let max = 0;
	for (const item of layout) {
		const edge = item.y + item.h;
		if (edge > max) max = edge;
	}
	return max;
}

/**
 * Comparator for reading order along `axis`: `(y, x)` for 'y', `(x, y)` for 'x'
 */
export function compareByAxis(axis: Axis): (a: LayoutItem, b: LayoutItem) => number {
	return axis === 'y'
		? (a, b) => a.y - b.y || a.x - b.x
		: (a, b) => a.x - b.x || a.y - b.y;
}

/**
 * Stable sort into reading order along `axis`. Returns a new array.
 */
export function sortLayoutItems(layout: Layout, axis: Axis = 'y'): LayoutItem[] {
	return [...layout].sort(compareByAxis(axis));
}

/**
 * Smallest rectangle enclosing every item, undefined for an empty list
 */
export function boundingBox(items: Layout): GridRect | undefined {
	if (items.length === 0) return undefined;

	let minX = Infinity;
	let minY = Infinity;
	let maxX = -Infinity;
	let maxY = -Infinity;
	for (const item of items) {
		minX = Math.min(minX, item.x);
		minY = Math.min(minY, item.y);
		maxX = Math.max(maxX, item.x + item.w);
		maxY = Math.max(maxY, item.y + item.h);
	}

	return { x: minX, y: minY, w: maxX - minX, h: maxY - minY };
}

/**
 * Check if any items in the layout overlap.
 * Pairs of static items are ignored: callers may stack obstacles on purpose.
 * @returns Array of overlapping pairs, empty if no overlaps
 */
export function findOverlaps(layout: Layout): Array<[LayoutItem, LayoutItem]> {
	const overlaps: Array<[LayoutItem, LayoutItem]> = [];
	for (let i = 0; i < layout.length; i++) {
		for (let j = i + 1; j < layout.length; j++) {
			const a = layout[i];
			const b = layout[j];
			if (a.isStatic && b.isStatic) continue;
			if (collides(a, b)) overlaps.push([a, b]);
		}
	}
	return overlaps;
}

export function getItem(layout: Layout, id: string): LayoutItem | undefined {
	return layout.find((item) => item.id === id);
}
