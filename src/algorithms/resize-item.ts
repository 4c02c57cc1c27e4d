/**
 * Resize resolver: "try shrink, fall back to push" with all-or-nothing rollback.
 */

import { allCollisions, getItem } from '../geometry';
import { updateItem } from '../layout-item';
import type { Layout, LayoutItem, ResizeItemOptions } from '../types';
import { verticalCompactor } from './compactor';
import { moveElement } from './move-element';

const DEBUG = false;
function log(...args: unknown[]) {
	if (DEBUG) console.log('[resize-item]', ...args);
}

function clampSize(item: LayoutItem): LayoutItem {
	const w = Math.min(Math.max(item.w, item.minW), item.maxW);
	const h = Math.min(Math.max(item.h, item.minH), item.maxH);
	return w === item.w && h === item.h ? item : updateItem(item, { w, h });
}

/**
 * Shrink every collider horizontally so it no longer overlaps `resized`.
 * Atomic: returns undefined (and changes nothing) if any collider is static
 * or would drop below its minimum width.
 */
function tryShrinkCollisions(
	layout: Layout,
	resized: LayoutItem,
	collisions: readonly LayoutItem[],
): LayoutItem[] | undefined {
	const shrunk = new Map<string, LayoutItem>();

	for (const collision of collisions) {
		if (collision.isStatic) return undefined;

		if (resized.x < collision.x) {
			// Expanding right: give up the collider's left part
			const overlap = resized.x + resized.w - collision.x;
			const w = collision.w - overlap;
			if (w < collision.minW) return undefined;
			shrunk.set(collision.id, updateItem(collision, { x: collision.x + overlap, w, moved: true }));
		} else {
			// Expanding left: give up the collider's right part
			const overlap = collision.x + collision.w - resized.x;
			const w = collision.w - overlap;
			if (w < collision.minW) return undefined;
			shrunk.set(collision.id, updateItem(collision, { w }));
		}
	}

	return layout.map((item) => shrunk.get(item.id) ?? item);
}

/**
 * Calculate the layout after giving `resizedItem` its new geometry.
 *
 * @returns The input layout itself when the resize is refused or reverted
 */
export function resizeItem(
	layout: Layout,
	resizedItem: LayoutItem,
	options: ResizeItemOptions,
): Layout {
	const { behavior, columns, preventCollision = false, maxIterations } = options;

	const existing = getItem(layout, resizedItem.id);
	if (!existing || existing.isStatic || existing.isResizable === false) return layout;

	const resized = clampSize(resizedItem);
	const substituted = layout.map((item) => (item.id === resized.id ? resized : item));
	const collisions = allCollisions(substituted, resized);

	if (collisions.length === 0) return substituted;

	if (behavior === 'shrink') {
		const shrunk = tryShrinkCollisions(substituted, resized, collisions);
		if (shrunk) return shrunk;
		log('shrink failed for', resized.id, '- falling back to push');
	}

	const pushed = moveElement(substituted, resized, resized.x, resized.y, {
		columns,
		compactType: 'vertical',
		preventCollision: false,
		force: true,
		maxIterations,
	});

	if (!preventCollision) return pushed;

	// The resized item must stay where it was asked to be and clear of statics
	const final = getItem(pushed, resized.id);
	if (
		!final ||
		final.x !== resized.x ||
		final.y !== resized.y ||
		allCollisions(pushed, final).some((other) => other.isStatic)
	) {
		log('resize of', resized.id, 'blocked by a static item - reverting');
		return layout;
	}

	// Several items may have been pushed onto the same row
	return verticalCompactor.resolveCollisions(pushed, columns);
}
