/**
 * Insertion, removal and column-count changes, each followed by compaction.
 */

import { UNPLACED } from '../constants';
import { updateItem } from '../layout-item';
import type { CompactType, Layout, LayoutChangeOptions, LayoutItem } from '../types';
import { compact } from './compactor';
import { correctBounds, placeNewItems } from './place-items';

/**
 * Add items to the layout. Unplaced items are laid along the bottom row by
 * placeNewItems and compaction pulls them into any gaps above.
 */
export function addItems(
	layout: Layout,
	items: Layout,
	options: LayoutChangeOptions,
): LayoutItem[] {
	const { columns, compactType } = options;
	return compact(placeNewItems(layout, items, columns), compactType, columns);
}

export function removeItem(
	layout: Layout,
	id: string,
	options: LayoutChangeOptions,
): LayoutItem[] {
	return compact(
		layout.filter((item) => item.id !== id),
		options.compactType,
		options.columns,
	);
}

/**
 * Recompute the layout for a new column count
 */
export function changeColumns(
	layout: Layout,
	columns: number,
	compactType: CompactType,
): LayoutItem[] {
	return compact(correctBounds(layout, columns), compactType, columns);
}

/**
 * Restore a layout cached for this column count while keeping it in sync
 * with the current one: cached positions win for items present in both,
 * items removed since are dropped, and items added since are auto-placed
 * at the bottom.
 */
export function reconcileLayouts(
	cached: Layout,
	current: Layout,
	options: LayoutChangeOptions,
): LayoutItem[] {
	const { columns, compactType } = options;
	const currentIds = new Set(current.map((item) => item.id));
	const cachedIds = new Set(cached.map((item) => item.id));

	const kept = cached.filter((item) => currentIds.has(item.id));
	const added = current
		.filter((item) => !cachedIds.has(item.id))
		.map((item) => updateItem(item, { x: UNPLACED, y: UNPLACED }));

	const merged = added.length > 0 ? placeNewItems(kept, added, columns) : kept;
	return compact(merged, compactType, columns);
}
