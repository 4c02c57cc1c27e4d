/**
 * Drop placeholder for items dragged in from outside the grid.
 *
 * The caller keeps the layout from before the drag-over started and passes it
 * on every update, so the placeholder never accumulates pushes from earlier
 * frames.
 */

import { PLACEHOLDER_ID } from '../constants';
import { getItem } from '../geometry';
import { createLayoutItem, updateItem } from '../layout-item';
import type { GridRect, Layout, LayoutChangeOptions, LayoutItem } from '../types';
import { compact } from './compactor';
import { moveElement } from './move-element';

/**
 * Layout with the placeholder pushed into place at `rect`
 */
export function showPlaceholder(
	baseLayout: Layout,
	rect: GridRect,
	options: LayoutChangeOptions,
): Layout {
	const { columns, compactType } = options;

	const placeholder = createLayoutItem({ id: PLACEHOLDER_ID, ...rect, isDraggable: true });
	const withPlaceholder = [...removePlaceholder(baseLayout), placeholder];

	// Forced: the placeholder already sits at the target in this layout
	const moved = moveElement(withPlaceholder, placeholder, rect.x, rect.y, {
		columns,
		compactType,
		force: true,
	});

	// Without compaction keep the pushed result as-is
	return compactType === 'none' ? moved : compact(moved, compactType, columns);
}

export function removePlaceholder(layout: Layout): LayoutItem[] {
	return layout.filter((item) => item.id !== PLACEHOLDER_ID);
}

/**
 * Turn the placeholder into a real item called `newId` at the spot it was
 * pushed to. Returns the layout unchanged when there is no placeholder.
 */
export function commitPlaceholder(
	layout: Layout,
	newId: string,
	options: LayoutChangeOptions,
): Layout {
	const placeholder = getItem(layout, PLACEHOLDER_ID);
	if (!placeholder) return layout;

	const item = updateItem(placeholder, { id: newId, isStatic: false, moved: false });
	const replaced = layout.map((entry) => (entry.id === PLACEHOLDER_ID ? item : entry));

	// Also covers 'none', whose compaction still resolves overlaps
	return compact(replaced, options.compactType, options.columns);
}
