/**
 * Compaction strategy registry.
 *
 * Strategies are plain objects implementing Compactor, selected by their
 * CompactType tag.
 *
 * Usage:
 *   const next = compact(layout, 'vertical', 12);
 *   const clean = getCompactor('horizontal').resolveCollisions(layout, 12);
 */

import type { Axis, CompactOptions, CompactType, Compactor, Layout, LayoutItem } from '../types';
import { compactWithGravity } from './compact-gravity';
import { compactNone, resolveOverlaps } from './compact-none';
import { compactRisingTide } from './compact-rising-tide';

export const verticalCompactor: Compactor = {
	type: 'vertical',
	axis: 'y',
	compact: (layout, columns, options) => compactWithGravity(layout, 'y', columns, options),
	resolveCollisions: (layout, columns) => resolveOverlaps(layout, columns, 'y'),
};

export const horizontalCompactor: Compactor = {
	type: 'horizontal',
	axis: 'x',
	compact: (layout, columns, options) => compactWithGravity(layout, 'x', columns, options),
	resolveCollisions: (layout, columns) => resolveOverlaps(layout, columns, 'x'),
};

export const fastVerticalCompactor: Compactor = {
	type: 'fast-vertical',
	axis: 'y',
	compact: (layout, columns, options) => compactRisingTide(layout, 'y', columns, options),
	resolveCollisions: (layout, columns) => resolveOverlaps(layout, columns, 'y'),
};

/**
 * `columns` keeps its meaning here: overlaps are first resolved wrapping at it
 * like the horizontal strategy, so the tide never carries an item past the
 * right edge. The row lanes come from the items' own extent.
 */
export const fastHorizontalCompactor: Compactor = {
	type: 'fast-horizontal',
	axis: 'x',
	compact: (layout, columns, options = {}) =>
		options.allowOverlap
			? [...layout]
			: compactRisingTide(resolveOverlaps(layout, columns, 'x'), 'x', 0, options),
	resolveCollisions: (layout, columns) => resolveOverlaps(layout, columns, 'x'),
};

/**
 * Strategy without gravity: it only resolves overlaps, pushing along `axis`.
 */
export function createNoCompactor(axis: Axis = 'y'): Compactor {
	return {
		type: 'none',
		axis,
		compact: (layout, columns, options) => compactNone(layout, columns, axis, options),
		resolveCollisions: (layout, columns) => resolveOverlaps(layout, columns, axis),
	};
}

export const noCompactor: Compactor = createNoCompactor('y');

const compactors: Record<CompactType, Compactor> = {
	vertical: verticalCompactor,
	horizontal: horizontalCompactor,
	none: noCompactor,
	'fast-vertical': fastVerticalCompactor,
	'fast-horizontal': fastHorizontalCompactor,
};

export function getCompactor(type: CompactType): Compactor {
	return compactors[type];
}

/**
 * Compact `layout` with the strategy named by `compactType`
 */
export function compact(
	layout: Layout,
	compactType: CompactType,
	columns: number,
	options: CompactOptions = {},
): LayoutItem[] {
	return getCompactor(compactType).compact(layout, columns, options);
}
